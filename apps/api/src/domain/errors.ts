import type { ZodIssue } from "zod";

export class ScoutError extends Error {
  readonly code: string;
  readonly retryable: boolean;

  constructor(code: string, message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

/** Catalog transport failure, or a response the catalog should not have sent. */
export class NetworkError extends ScoutError {
  readonly statusCode: number | null;

  constructor(message: string, options?: { statusCode?: number | null; retryable?: boolean; cause?: unknown }) {
    super("network_error", message, options);
    this.statusCode = options?.statusCode ?? null;
  }
}

export class RateLimitError extends ScoutError {
  readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null) {
    super("rate_limited", message, { retryable: false });
    this.retryAfterMs = retryAfterMs;
  }
}

export class CacheError extends ScoutError {
  constructor(message: string, cause?: unknown) {
    super("cache_error", message, { cause });
  }
}

export class ConfigError extends ScoutError {
  readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, issues: ZodIssue[] = []) {
    super("config_error", message);
    this.issues = issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message
    }));
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
