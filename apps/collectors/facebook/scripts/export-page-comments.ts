import "dotenv/config";
import { createWriteStream, WriteStream } from "fs";
import { parseArgs } from "util";
import { config } from "../src/config";
import { connectDB, disconnectDB } from "../src/config/db";
import { logger } from "../src/lib/logger";
import { FacebookClient } from "../src/services/facebook.service";
import { writeTracedDataJsonl } from "../src/traced-data";
import { cleanPostType, convertFacebookCommentsToTracedData } from "../src/utils/mappers";
import { MongoUuidTable } from "../src/uuid";

const USAGE =
  "Usage: export-page-comments --page <page-id> --user <email> --dataset <name> " +
  "--out <traced.jsonl> [--raw-out <raw.jsonl>] [--after <iso-date>] [--before <iso-date>]";

const parseDate = (name: string, value: string | undefined): Date | undefined => {
  if (value === undefined) return undefined;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`--${name} '${value}' is not a valid date`);
  }
  return date;
};

const closeStream = (stream: WriteStream): Promise<void> =>
  new Promise((resolve, reject) => {
    stream.once("error", reject);
    stream.end(() => resolve());
  });

async function exportPageComments() {
  const { values } = parseArgs({
    options: {
      page: { type: "string" },
      user: { type: "string" },
      dataset: { type: "string" },
      out: { type: "string" },
      "raw-out": { type: "string" },
      after: { type: "string" },
      before: { type: "string" },
    },
  });

  const { page, user, dataset, out } = values;
  if (!page || !user || !dataset || !out) {
    throw new Error(USAGE);
  }
  const { accessToken } = config.facebook;
  if (!accessToken) {
    throw new Error("FACEBOOK_ACCESS_TOKEN must be set to run the export");
  }
  const createdAfter = parseDate("after", values.after);
  const createdBefore = parseDate("before", values.before);

  await connectDB();

  const client = new FacebookClient(accessToken);
  const uuidTable = new MongoUuidTable(config.uuidTable.name, config.uuidTable.prefix);
  const tracedOut = createWriteStream(out, { flags: "a" });
  const rawOut = values["raw-out"]
    ? createWriteStream(values["raw-out"], { flags: "a" })
    : undefined;

  try {
    const posts = await client.getPostsPublishedByPage(page, {
      fields: ["attachments", "created_time", "message"],
      createdAfter,
      createdBefore,
    });

    let exported = 0;
    for (const post of posts) {
      const postType = cleanPostType(post);
      logger.info(`Exporting comments on ${postType ?? "text"} post '${post.id}'`, {
        postId: post.id,
      });

      const comments = await client.getAllCommentsOnPost(
        post.id,
        ["from", "parent", "attachments", "created_time", "message"],
        rawOut
      );
      const traced = await convertFacebookCommentsToTracedData(
        user,
        dataset,
        comments,
        uuidTable
      );
      writeTracedDataJsonl(traced, tracedOut);
      exported += traced.length;
    }

    logger.info(`Exported ${exported} comments from ${posts.length} posts`, {
      pageId: page,
      count: exported,
    });
  } finally {
    await closeStream(tracedOut);
    if (rawOut) await closeStream(rawOut);
    await disconnectDB();
  }
}

exportPageComments().catch(async (error) => {
  logger.error("Export failed", {
    error: error instanceof Error ? error : String(error),
  });
  await logger.flushAndExit(1);
});
