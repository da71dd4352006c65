import {
  PostTypeError,
  UnknownIdentifierError,
  ValidationError,
} from "@/errors";
import { logger } from "@/lib/logger";
import { Metadata, TracedData } from "@/traced-data";
import { GraphComment, GraphPost, PostType } from "@/types";
import { UuidTable } from "@/uuid";
import {
  normalizeIsoString,
  utcNowAsIsoString,
  validateUtcIsoString,
} from "./time";

const VIDEO_ATTACHMENT_TYPES = new Set(["video_inline", "video_direct_response"]);
const PHOTO_ATTACHMENT_TYPES = new Set(["photo"]);

/**
 * Key the pseudonymous author id is stored under in every traced comment.
 */
export const FACEBOOK_UUID_KEY = "avf_facebook_id";

/**
 * Derives the type of a post from its attachments.
 * @param post - Post in the format returned by the Graph API, fetched with the `attachments` field
 * @returns "photo", "video", or undefined if the post has no attachments
 */
export const cleanPostType = (post: GraphPost): PostType | undefined => {
  let postType: PostType | undefined;
  for (const attachment of post.attachments?.data ?? []) {
    if (VIDEO_ATTACHMENT_TYPES.has(attachment.type)) {
      if (postType === "photo") {
        throw new PostTypeError("Post mixes photo and video attachments", post.id);
      }
      postType = "video";
    } else if (PHOTO_ATTACHMENT_TYPES.has(attachment.type)) {
      if (postType === "video") {
        throw new PostTypeError("Post mixes photo and video attachments", post.id);
      }
      postType = "photo";
    } else {
      throw new PostTypeError(
        `Unsupported attachment type '${attachment.type}'`,
        post.id
      );
    }
  }

  return postType;
};

const authorIdOf = (comment: GraphComment): string => {
  if (comment.from === undefined) {
    throw new ValidationError(
      `Comment '${comment.id}' has no 'from' field; request it and use a token that can see comment authors`
    );
  }
  return comment.from.id;
};

/**
 * Converts raw comments to TracedData. Every field of a comment is stored
 * under `<datasetName>.<field>`, next to the pseudonymous id of its author.
 * @param user - Identifier of the user running the conversion, recorded in the metadata
 * @param uuidTable - Table the comment authors' ids are pseudonymized through
 */
export const convertFacebookCommentsToTracedData = async (
  user: string,
  datasetName: string,
  rawComments: GraphComment[],
  uuidTable: UuidTable
): Promise<TracedData[]> => {
  logger.info(
    `Converting ${rawComments.length} Facebook comments to TracedData...`,
    { datasetName }
  );

  const facebookIds = new Set(rawComments.map(authorIdOf));
  const facebookToUuidLut = await uuidTable.dataToUuidBatch(facebookIds);

  const tracedComments: TracedData[] = [];
  for (const comment of rawComments) {
    const authorId = authorIdOf(comment);
    const uuid = facebookToUuidLut[authorId];
    if (uuid === undefined) {
      throw new UnknownIdentifierError(authorId);
    }

    const createdTime = validateUtcIsoString(
      normalizeIsoString(comment.created_time)
    );

    const commentDict: Record<string, unknown> = {
      [FACEBOOK_UUID_KEY]: uuid,
    };
    for (const [key, value] of Object.entries({
      ...comment,
      created_time: createdTime,
    })) {
      commentDict[`${datasetName}.${key}`] = value;
    }

    tracedComments.push(
      new TracedData(
        commentDict,
        new Metadata(user, Metadata.getCallLocation(), utcNowAsIsoString())
      )
    );
  }

  logger.info(
    `Converted ${tracedComments.length} Facebook comments to TracedData`,
    { datasetName, count: tracedComments.length }
  );

  return tracedComments;
};
