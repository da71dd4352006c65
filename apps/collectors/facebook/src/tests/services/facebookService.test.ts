import { MetricShapeError } from "@/errors";
import { logger } from "@/lib/logger";
import { FacebookClient } from "@/services/facebook.service";
import Bottleneck from "bottleneck";

const BASE_URL = "https://graph.facebook.com/v8.0";

const page = (data: unknown[] | undefined, next?: string) => ({
  data: { data, paging: next ? { next } : { cursors: { before: "b" } } },
});

describe("FacebookClient", () => {
  let get: jest.Mock;
  let limiter: Bottleneck;
  let client: FacebookClient;

  beforeEach(() => {
    get = jest.fn();
    limiter = new Bottleneck({ maxConcurrent: 1 });
    client = new FacebookClient("test-token", {
      httpClient: { get },
      limiter,
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("getPost requests the post with the given fields and token", async () => {
    get.mockResolvedValue({ data: { id: "123_456", message: "hi" } });

    const post = await client.getPost("123_456");

    expect(post).toEqual({ id: "123_456", message: "hi" });
    expect(get).toHaveBeenCalledWith(`${BASE_URL}/123_456`, {
      params: { fields: "created_time,message,id", access_token: "test-token" },
    });
  });

  it("uses the configured graph api version in the base url", async () => {
    const versioned = new FacebookClient("test-token", {
      httpClient: { get },
      limiter: new Bottleneck({ maxConcurrent: 1 }),
      graphApiVersion: "v19.0",
    });
    get.mockResolvedValue({ data: { id: "1" } });

    await versioned.getPost("1", ["id"]);

    expect(get).toHaveBeenCalledWith("https://graph.facebook.com/v19.0/1", {
      params: { fields: "id", access_token: "test-token" },
    });
  });

  it("getPostsPublishedByPage concatenates every page in order", async () => {
    const next1 = `${BASE_URL}/page-1/published_posts?after=c1`;
    const next2 = `${BASE_URL}/page-1/published_posts?after=c2`;
    get
      .mockResolvedValueOnce(page([{ id: "1" }, { id: "2" }], next1))
      .mockResolvedValueOnce(page([{ id: "3" }], next2))
      .mockResolvedValueOnce(page([{ id: "4" }, { id: "5" }]));

    const posts = await client.getPostsPublishedByPage("page-1");

    expect(posts.map((p) => p.id)).toEqual(["1", "2", "3", "4", "5"]);
    expect(get).toHaveBeenCalledTimes(3);
    expect(get).toHaveBeenNthCalledWith(
      1,
      `${BASE_URL}/page-1/published_posts`,
      {
        params: {
          fields: "attachments,created_time,message",
          limit: 100,
          access_token: "test-token",
        },
      }
    );
    expect(get).toHaveBeenNthCalledWith(2, next1);
    expect(get).toHaveBeenNthCalledWith(3, next2);
  });

  it("converts the created_time range to Zulu time since/until params", async () => {
    get.mockResolvedValue(page([]));

    await client.getPostsPublishedByPage("page-1", {
      fields: ["message"],
      createdAfter: new Date("2020-03-01T00:00:00+03:00"),
      createdBefore: new Date(Date.UTC(2020, 2, 8, 12, 30, 15, 250)),
    });

    expect(get).toHaveBeenCalledWith(`${BASE_URL}/page-1/published_posts`, {
      params: {
        fields: "message",
        limit: 100,
        since: "2020-02-29T21:00:00Z",
        until: "2020-03-08T12:30:15.250Z",
        access_token: "test-token",
      },
    });
  });

  it("getAllCommentsOnPost requests the stream filter", async () => {
    get.mockResolvedValue(page([{ id: "c1" }]));

    const comments = await client.getAllCommentsOnPost("123_456", [
      "message",
    ]);

    expect(comments).toEqual([{ id: "c1" }]);
    expect(get).toHaveBeenCalledWith(`${BASE_URL}/123_456/comments`, {
      params: {
        fields: "message",
        limit: 100,
        filter: "stream",
        access_token: "test-token",
      },
    });
  });

  it("getAllCommentsOnPost writes the raw comments as a single json line", async () => {
    const first = {
      id: "c1",
      from: { id: "u1" },
      created_time: "2020-01-01T00:00:00+0000",
    };
    const second = {
      id: "c2",
      from: { id: "u2" },
      created_time: "2020-01-02T00:00:00+0000",
    };
    get
      .mockResolvedValueOnce(page([first], `${BASE_URL}/123_456/comments?after=x`))
      .mockResolvedValueOnce(page([second]));
    const lines: string[] = [];

    await client.getAllCommentsOnPost("123_456", undefined, {
      write: (chunk: string) => lines.push(chunk),
    });

    expect(lines).toEqual([
      '[{"id":"c1","from":{"id":"u1"},"created_time":"2020-01-01T00:00:00+0000"},' +
        '{"id":"c2","from":{"id":"u2"},"created_time":"2020-01-02T00:00:00+0000"}]\n',
    ]);
  });

  it("schedules every request, next pages included, through the limiter", async () => {
    const schedule = jest.spyOn(limiter, "schedule");
    get
      .mockResolvedValueOnce(page([{ id: "1" }], `${BASE_URL}/p/comments?after=a`))
      .mockResolvedValueOnce(page([{ id: "2" }]))
      .mockResolvedValueOnce({ data: { id: "p" } });

    await client.getAllCommentsOnPost("p");
    await client.getPost("p");

    expect(schedule).toHaveBeenCalledTimes(3);
    expect(get).toHaveBeenCalledTimes(3);
  });

  it("logs and exits the process when the first page has no data field", async () => {
    const error = jest.spyOn(logger, "error");
    const exit = jest
      .spyOn(logger, "flushAndExit")
      .mockRejectedValue(new Error("process exited"));
    get.mockResolvedValue({
      data: { error: { message: "Invalid OAuth access token.", code: 190 } },
    });

    await expect(client.getPostsPublishedByPage("page-1")).rejects.toThrow(
      "process exited"
    );
    expect(exit).toHaveBeenCalledWith(1);
    expect(error).toHaveBeenCalledWith(
      "Response from Facebook did not contain a 'data' field. " +
        "The returned data is probably an error message",
      {
        response: {
          error: { message: "Invalid OAuth access token.", code: 190 },
        },
      }
    );
  });

  it("exits the process when a later page has no data field", async () => {
    const exit = jest
      .spyOn(logger, "flushAndExit")
      .mockRejectedValue(new Error("process exited"));
    get
      .mockResolvedValueOnce(page([{ id: "1" }], `${BASE_URL}/p/comments?after=a`))
      .mockResolvedValueOnce({ data: { error: { message: "rate limited" } } });

    await expect(client.getAllCommentsOnPost("p")).rejects.toThrow(
      "process exited"
    );
    expect(exit).toHaveBeenCalledWith(1);
    expect(get).toHaveBeenCalledTimes(2);
  });

  describe("metrics", () => {
    const twoValued = {
      name: "post_impressions",
      period: "day",
      values: [{ value: 10 }, { value: 12 }],
    };

    it("getMetricsForPost flattens single-valued metrics", async () => {
      get.mockResolvedValue({
        data: {
          data: [
            { name: "post_impressions", period: "lifetime", values: [{ value: 42 }] },
            {
              name: "post_reactions_by_type_total",
              period: "lifetime",
              values: [{ value: { like: 3, love: 1 } }],
            },
          ],
        },
      });

      const metrics = await client.getMetricsForPost("123_456", [
        "post_impressions",
        "post_reactions_by_type_total",
      ]);

      expect(metrics).toEqual({
        post_impressions: 42,
        post_reactions_by_type_total: { like: 3, love: 1 },
      });
      expect(get).toHaveBeenCalledWith(`${BASE_URL}/123_456/insights`, {
        params: {
          metric: "post_impressions,post_reactions_by_type_total",
          access_token: "test-token",
        },
      });
    });

    it("getMetricsForPost rejects a metric with two values", async () => {
      get.mockResolvedValue({ data: { data: [twoValued] } });

      const result = client.getMetricsForPost("123_456", ["post_impressions"]);

      await expect(result).rejects.toThrow(MetricShapeError);
      await expect(result).rejects.toThrow(
        "Metric post_impressions has 2 values"
      );
    });

    it("getRawMetricsForPost returns a metric with two values as-is", async () => {
      get.mockResolvedValue({ data: { data: [twoValued] } });

      const metrics = await client.getRawMetricsForPost("123_456", [
        "post_impressions",
      ]);

      expect(metrics).toEqual([twoValued]);
    });

    it("getRawMetricsForPost throws on an error payload", async () => {
      get.mockResolvedValue({ data: { error: { message: "Unsupported get request." } } });

      await expect(
        client.getRawMetricsForPost("123_456", ["post_impressions"])
      ).rejects.toThrow("did not contain a 'data' field");
    });
  });
});
