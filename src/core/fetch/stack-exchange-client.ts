import { z } from "zod";
import { ApiError, NetworkError, RateLimitError } from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";
import { withRetry, type RetryOptions } from "../../infra/retry.js";

const log = logger.child("stackexchange");

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number | undefined>;

export interface StackExchangeClientOptions {
  baseUrl: string;
  /** Application key; raises the daily request quota */
  key?: string;
  fetch?: FetchLike;
  retry?: RetryOptions;
}

const TotalResponseSchema = z.object({
  total: z.number().int().nonnegative(),
});

const ThrottleBodySchema = z.object({
  backoff: z.number().nonnegative().optional(),
});

// Quota and per-IP throttling arrive as HTTP 400 with error_id 502
const ErrorBodySchema = z.object({
  error_id: z.number().optional(),
  error_name: z.string().optional(),
  error_message: z.string().optional(),
});

const THROTTLE_ERROR_ID = 502;

function parseErrorBody(text: string): z.infer<typeof ErrorBodySchema> | undefined {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = ErrorBodySchema.safeParse(body);
  return parsed.success ? parsed.data : undefined;
}

/** "... more requests available in 80000 seconds" */
function secondsFromThrottleMessage(message: string | undefined): number | undefined {
  const match = message === undefined ? null : /available in (\d+) seconds/.exec(message);
  return match?.[1] === undefined ? undefined : Number(match[1]);
}

async function readJson(response: Response): Promise<unknown> {
  try {
    return (await response.json()) as unknown;
  } catch {
    return undefined;
  }
}

function retryAfterSeconds(response: Response, body: unknown): number | undefined {
  const parsed = ThrottleBodySchema.safeParse(body);
  if (parsed.success && parsed.data.backoff !== undefined) {
    return parsed.data.backoff;
  }
  const header = response.headers.get("retry-after");
  if (header === null) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * Minimal Stack Exchange API client: GET requests with query parameters,
 * retried on throttling and transient failures.
 */
export class StackExchangeClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: StackExchangeClientOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
  }

  buildUrl(path: string, params: QueryParams = {}): string {
    const url = new URL(path, this.options.baseUrl);
    for (const [name, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(name, String(value));
      }
    }
    if (this.options.key) {
      url.searchParams.set("key", this.options.key);
    }
    return url.toString();
  }

  async get(path: string, params: QueryParams = {}): Promise<unknown> {
    const url = this.buildUrl(path, params);
    return withRetry(() => this.request(url), this.options.retry);
  }

  /** Request with `filter=total` semantics and return the `total` field */
  async countTotal(path: string, params: QueryParams = {}): Promise<number> {
    const body = await this.get(path, params);
    const result = TotalResponseSchema.safeParse(body);
    if (!result.success) {
      throw new ApiError(`Stack Exchange response for ${path} has no total`, 200);
    }
    return result.data.total;
  }

  private async request(url: string): Promise<unknown> {
    log.debug(`GET ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers: { Accept: "application/json" } });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(
        `Stack Exchange request failed: ${message}`,
        error instanceof Error ? error : undefined
      );
    }

    if (response.status === 429) {
      const body = await readJson(response);
      throw new RateLimitError("Stack Exchange API throttled the request", retryAfterSeconds(response, body));
    }

    if (response.status >= 500) {
      throw new NetworkError(`Stack Exchange API error: ${response.status} ${response.statusText}`);
    }

    if (!response.ok) {
      const text = await response.text();
      const body = parseErrorBody(text);
      if (body?.error_name === "throttle_violation" || body?.error_id === THROTTLE_ERROR_ID) {
        throw new RateLimitError(
          `Stack Exchange API throttled the request: ${body.error_message ?? "throttle_violation"}`,
          secondsFromThrottleMessage(body.error_message)
        );
      }
      throw new ApiError(
        `Stack Exchange API error: ${response.status} ${response.statusText} - ${text}`,
        response.status
      );
    }

    return readJson(response);
  }
}
