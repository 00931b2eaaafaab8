/**
 * Custom error classes for repository enumeration
 */

export class RateLimitError extends Error {
  constructor(
    message: string,
    public readonly resetAt: Date | null = null
  ) {
    super(message);
    this.name = "RateLimitError";
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

export class AbuseLimitError extends Error {
  constructor(
    message: string,
    public readonly retryAfter?: number
  ) {
    super(message);
    this.name = "AbuseLimitError";
    Object.setPrototypeOf(this, AbuseLimitError.prototype);
  }
}

export class GitHubAPIError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "GitHubAPIError";
    Object.setPrototypeOf(this, GitHubAPIError.prototype);
  }
}

export class PaginationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PaginationError";
    Object.setPrototypeOf(this, PaginationError.prototype);
  }
}

/**
 * A remote payload that does not fit the fixed record schema
 */
export class MalformedRecordError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = "MalformedRecordError";
    Object.setPrototypeOf(this, MalformedRecordError.prototype);
  }
}

/**
 * An existing output file that cannot be resumed from
 */
export class MalformedOutputError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = "MalformedOutputError";
    Object.setPrototypeOf(this, MalformedOutputError.prototype);
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}
