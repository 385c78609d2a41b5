import { describe, it, expect, vi } from "vitest";
import { StackExchangeClient, type FetchLike } from "../../src/core/fetch/stack-exchange-client.js";
import { ApiError, NetworkError, RateLimitError } from "../../src/infra/errors.js";

const BASE_URL = "https://api.stackexchange.com/2.2/";

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, ...init });
}

function createClient(fetch: FetchLike, key?: string) {
  const sleep = vi.fn((_ms: number) => Promise.resolve());
  const client = new StackExchangeClient({
    baseUrl: BASE_URL,
    key,
    fetch,
    retry: { maxRetries: 2, baseDelayMs: 10, jitter: false, sleep },
  });
  return { client, sleep };
}

describe("StackExchangeClient", () => {
  it("should build query URLs without undefined parameters", () => {
    const { client } = createClient(vi.fn<FetchLike>(), "test-key");

    const url = client.buildUrl("questions/no-answers", {
      fromdate: 1,
      todate: 2,
      tagged: "rails",
      page: undefined,
    });

    expect(url).toBe(
      "https://api.stackexchange.com/2.2/questions/no-answers?fromdate=1&todate=2&tagged=rails&key=test-key"
    );
  });

  it("should return the total of a count request", async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ total: 7 }));
    const { client } = createClient(fetch);

    const total = await client.countTotal("questions", { filter: "total" });

    expect(total).toBe(7);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch).toHaveBeenCalledWith("https://api.stackexchange.com/2.2/questions?filter=total", {
      headers: { Accept: "application/json" },
    });
  });

  it("should wait for the backoff the API asks for when throttled", async () => {
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse({ backoff: 2 }, { status: 429 }))
      .mockResolvedValueOnce(jsonResponse({ total: 5 }));
    const { client, sleep } = createClient(fetch);

    await expect(client.countTotal("questions")).resolves.toBe(5);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it("should fall back to the Retry-After header", async () => {
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(
        new Response("slow down", { status: 429, headers: { "Retry-After": "3" } })
      )
      .mockResolvedValueOnce(jsonResponse({ total: 1 }));
    const { client, sleep } = createClient(fetch);

    await expect(client.countTotal("questions")).resolves.toBe(1);
    expect(sleep).toHaveBeenCalledWith(3000);
  });

  it("should treat a 400 throttle_violation body as a rate limit", async () => {
    const throttled = {
      error_id: 502,
      error_name: "throttle_violation",
      error_message: "too many requests from this IP, more requests available in 4 seconds",
    };
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse(throttled, { status: 400, statusText: "Bad Request" }))
      .mockResolvedValueOnce(jsonResponse({ total: 6 }));
    const { client, sleep } = createClient(fetch);

    await expect(client.countTotal("questions")).resolves.toBe(6);
    expect(sleep).toHaveBeenCalledWith(4000);
  });

  it("should stop when the quota lockout outlasts the retry budget", async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(
      jsonResponse(
        {
          error_id: 502,
          error_name: "throttle_violation",
          error_message: "too many requests from this IP, more requests available in 80000 seconds",
        },
        { status: 400 }
      )
    );
    const { client, sleep } = createClient(fetch);

    const error = await client.get("questions").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfter: 80000 });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("should retry server errors with backoff", async () => {
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(new Response("oops", { status: 503, statusText: "Unavailable" }))
      .mockResolvedValueOnce(jsonResponse({ total: 9 }));
    const { client, sleep } = createClient(fetch);

    await expect(client.countTotal("questions")).resolves.toBe(9);
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(10);
  });

  it("should give up after the configured retries", async () => {
    const fetch = vi
      .fn<FetchLike>()
      .mockImplementation(() => Promise.reject(new TypeError("fetch failed")));
    const { client } = createClient(fetch);

    await expect(client.get("questions")).rejects.toBeInstanceOf(NetworkError);
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it("should not retry client errors", async () => {
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValue(new Response("bad tag", { status: 400, statusText: "Bad Request" }));
    const { client } = createClient(fetch);

    const error = await client.get("questions").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      status: 400,
      message: "Stack Exchange API error: 400 Bad Request - bad tag",
    });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("should reject count responses without a total", async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ items: [] }));
    const { client } = createClient(fetch);

    await expect(client.countTotal("questions")).rejects.toBeInstanceOf(ApiError);
  });
});
