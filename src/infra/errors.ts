export class QuarterlyMetricsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error,
    public readonly isRetryable: boolean = false
  ) {
    super(message);
    this.name = "QuarterlyMetricsError";
  }
}

export class ConfigurationError extends QuarterlyMetricsError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIGURATION_ERROR", cause);
    this.name = "ConfigurationError";
  }
}

export class QuarterNotFoundError extends QuarterlyMetricsError {
  constructor(public readonly quarterStart: number) {
    super(
      `No quarter stored for ${new Date(quarterStart * 1000).toISOString()}`,
      "QUARTER_NOT_FOUND"
    );
    this.name = "QuarterNotFoundError";
  }
}

export class ProjectNotFoundError extends QuarterlyMetricsError {
  constructor(public readonly projectName: string) {
    super(`No stored data for project ${projectName}`, "PROJECT_NOT_FOUND");
    this.name = "ProjectNotFoundError";
  }
}

export class MalformedDateError extends QuarterlyMetricsError {
  constructor(public readonly input: unknown) {
    const shown = typeof input === "string" ? JSON.stringify(input) : String(input);
    super(`Cannot resolve a calendar date from ${shown}`, "MALFORMED_DATE");
    this.name = "MalformedDateError";
  }
}

export class DegenerateAggregationError extends QuarterlyMetricsError {
  constructor(
    public readonly available: number,
    public readonly required: number
  ) {
    super(
      `Trailing year needs ${required} quarters but only ${available} are stored`,
      "DEGENERATE_AGGREGATION"
    );
    this.name = "DegenerateAggregationError";
  }
}

export class InvalidArgumentError extends QuarterlyMetricsError {
  constructor(message: string) {
    super(message, "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
  }
}

export class SnapshotError extends QuarterlyMetricsError {
  constructor(message: string, cause?: Error) {
    super(message, "SNAPSHOT_ERROR", cause);
    this.name = "SnapshotError";
  }
}

export class RateLimitError extends QuarterlyMetricsError {
  constructor(
    message: string,
    public readonly retryAfter?: number
  ) {
    super(message, "RATE_LIMIT_ERROR");
    this.name = "RateLimitError";
  }
}

export class NetworkError extends QuarterlyMetricsError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", cause, true);
    this.name = "NetworkError";
  }
}

export class ApiError extends QuarterlyMetricsError {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message, "API_ERROR");
    this.name = "ApiError";
  }
}

export function isQuarterlyMetricsError(error: unknown): error is QuarterlyMetricsError {
  return error instanceof QuarterlyMetricsError;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof QuarterlyMetricsError) {
    return error.isRetryable;
  }
  // fetch() rejects with a TypeError whose message carries the socket failure
  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    return (
      msg.includes("econnreset") ||
      msg.includes("econnrefused") ||
      msg.includes("etimedout") ||
      msg.includes("socket hang up") ||
      msg.includes("fetch failed")
    );
  }
  return false;
}
