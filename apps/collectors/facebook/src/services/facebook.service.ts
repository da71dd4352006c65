import { config } from "@/config";
import { GraphApiError, MetricShapeError } from "@/errors";
import {
  createGraphHttpClient,
  createGraphLimiter,
  GRAPH_API_HOST,
} from "@/lib/graphClient";
import { logger } from "@/lib/logger";
import {
  GraphComment,
  GraphPage,
  GraphParams,
  GraphPost,
  LineSink,
  MetricValue,
  RawMetric,
} from "@/types";
import { dateToFacebookTime } from "@/utils/time";
import type { AxiosInstance } from "axios";
import Bottleneck from "bottleneck";

// For paged requests, the number of records to request in each page
export const MAX_RESULTS_PER_PAGE = 100;

export type GraphHttpClient = Pick<AxiosInstance, "get">;

export interface FacebookClientOptions {
  httpClient?: GraphHttpClient;
  limiter?: Bottleneck;
  graphApiVersion?: string;
}

export interface PagePostsQuery {
  fields?: string[];
  /** Inclusive start of the created_time range */
  createdAfter?: Date;
  /** Exclusive end of the created_time range */
  createdBefore?: Date;
}

export class FacebookClient {
  private readonly http: GraphHttpClient;
  private readonly limiter: Bottleneck;
  private readonly baseUrl: string;

  constructor(
    private readonly accessToken: string,
    options: FacebookClientOptions = {}
  ) {
    this.http = options.httpClient ?? createGraphHttpClient();
    this.limiter = options.limiter ?? createGraphLimiter();
    this.baseUrl = `${GRAPH_API_HOST}/${options.graphApiVersion ?? config.facebook.graphApiVersion}`;
  }

  /**
   * Gets the post with the given id.
   * @param postId - Id of the post to download
   * @param fields - Fields to include in the returned post. `id` is always included.
   */
  async getPost(
    postId: string,
    fields: string[] = ["created_time", "message", "id"]
  ): Promise<GraphPost> {
    logger.info(`Fetching post '${postId}'...`, { postId });
    return this.makeGetRequest<GraphPost>(`/${postId}`, {
      fields: fields.join(","),
    });
  }

  /**
   * Gets every post published by a page, optionally restricted to a
   * created_time range.
   * @param pageId - Id of the page to download the posts from
   * @returns Posts in the order the Graph API pages them
   */
  async getPostsPublishedByPage(
    pageId: string,
    {
      fields = ["attachments", "created_time", "message"],
      createdAfter,
      createdBefore,
    }: PagePostsQuery = {}
  ): Promise<GraphPost[]> {
    let logStr = `Fetching all posts published by page '${pageId}'`;
    if (createdAfter !== undefined) {
      logStr += `, created after ${createdAfter.toISOString()}`;
    }
    if (createdBefore !== undefined) {
      logStr += `, created before ${createdBefore.toISOString()}`;
    }
    logger.debug(`${logStr}...`, { pageId });

    const params: GraphParams = {
      fields: fields.join(","),
      limit: MAX_RESULTS_PER_PAGE,
    };
    if (createdAfter !== undefined) {
      params.since = dateToFacebookTime(createdAfter);
    }
    if (createdBefore !== undefined) {
      params.until = dateToFacebookTime(createdBefore);
    }

    const posts = await this.makePagedGetRequest<GraphPost>(
      `/${pageId}/published_posts`,
      params
    );
    logger.info(`Fetched ${posts.length} posts`, {
      pageId,
      count: posts.length,
    });

    return posts;
  }

  /**
   * Gets all the comments on a post that are visible to this token, including
   * comments which are replies to other comments.
   * @param rawExportLog - Sink the raw downloaded comments are written to as a single JSON line
   */
  async getAllCommentsOnPost(
    postId: string,
    fields: string[] = ["parent", "attachments", "created_time", "message"],
    rawExportLog?: LineSink
  ): Promise<GraphComment[]> {
    logger.info(`Fetching all comments on post '${postId}'...`, { postId });
    const comments = await this.makePagedGetRequest<GraphComment>(
      `/${postId}/comments`,
      {
        fields: fields.join(","),
        limit: MAX_RESULTS_PER_PAGE,
        filter: "stream",
      }
    );
    logger.info(`Fetched ${comments.length} comments`, {
      postId,
      count: comments.length,
    });

    if (rawExportLog !== undefined) {
      logger.info(`Logging ${comments.length} fetched comments...`);
      rawExportLog.write(`${JSON.stringify(comments)}\n`);
      logger.info("Logged fetched comments");
    } else {
      logger.debug(
        "Not logging the raw export (argument 'rawExportLog' was undefined)"
      );
    }

    return comments;
  }

  /**
   * Gets the metrics on a post in the full format returned by the Graph API.
   * See `getMetricsForPost` for a flat metric -> value map.
   */
  async getRawMetricsForPost(
    postId: string,
    metrics: string[]
  ): Promise<RawMetric[]> {
    const response = await this.makeGetRequest<GraphPage<RawMetric>>(
      `/${postId}/insights`,
      { metric: metrics.join(",") }
    );
    if (response.data === undefined) {
      throw new GraphApiError(
        `Insights response for post '${postId}' did not contain a 'data' field: ` +
          JSON.stringify(response)
      );
    }
    return response.data;
  }

  /**
   * Gets the metrics on a post as a map of metric name -> value.
   * @throws MetricShapeError if any metric has other than exactly one value
   */
  async getMetricsForPost(
    postId: string,
    metrics: string[]
  ): Promise<Record<string, MetricValue>> {
    const rawMetrics = await this.getRawMetricsForPost(postId, metrics);

    const cleanedMetrics: Record<string, MetricValue> = {};
    for (const metric of rawMetrics) {
      const [only, ...extra] = metric.values;
      if (only === undefined || extra.length > 0) {
        throw new MetricShapeError(metric.name, metric.values.length);
      }
      cleanedMetrics[metric.name] = only.value;
    }

    return cleanedMetrics;
  }

  private async makeGetRequest<T>(
    endpoint: string,
    params: GraphParams = {}
  ): Promise<T> {
    const response = await this.limiter.schedule(() =>
      this.http.get<T>(`${this.baseUrl}${endpoint}`, {
        params: { ...params, access_token: this.accessToken },
      })
    );
    return response.data;
  }

  /**
   * Requests the first page of `endpoint` then follows `paging.next` until the
   * Graph API stops returning one.
   */
  private async makePagedGetRequest<T>(
    endpoint: string,
    params: GraphParams = {}
  ): Promise<T[]> {
    const firstPage = await this.makeGetRequest<GraphPage<T>>(endpoint, params);
    const result = [...(await this.requirePageData(firstPage))];

    let nextUrl = firstPage.paging?.next;
    while (nextUrl !== undefined) {
      const url = nextUrl;
      // The next-page URL already carries the token and cursor
      const response = await this.limiter.schedule(() =>
        this.http.get<GraphPage<T>>(url)
      );
      const page = response.data;

      result.push(...(await this.requirePageData(page)));
      nextUrl = page.paging?.next;
    }

    return result;
  }

  private async requirePageData<T>(page: GraphPage<T>): Promise<T[]> {
    if (page.data === undefined) {
      logger.error(
        "Response from Facebook did not contain a 'data' field. " +
          "The returned data is probably an error message",
        { response: page }
      );
      return logger.flushAndExit(1);
    }
    return page.data;
  }
}
