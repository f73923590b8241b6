import { request } from "undici";
import { NetworkError, RateLimitError, errorMessage } from "../domain/errors.js";

const USER_AGENT = "ServerScout/0.1";

export type RetryOptions = {
  attempts?: number;
  initialDelayMs?: number;
  timeoutMs?: number;
};

function isRetryableStatus(statusCode: number): boolean {
  return statusCode === 408 || statusCode === 425 || statusCode >= 500;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function headerValue(header: string | string[] | undefined): string | undefined {
  return Array.isArray(header) ? header[0] : header;
}

export function parseRetryAfter(value: string | undefined, now = Date.now()): number | null {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) {
    return null;
  }
  return Math.max(0, at - now);
}

export async function withRetries<T>(options: RetryOptions, run: () => Promise<T>): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  let nextDelay = Math.max(10, options.initialDelayMs ?? 400);
  let attempt = 0;
  let lastError: unknown;

  while (attempt < attempts) {
    try {
      return await run();
    } catch (error) {
      const retryable = !(
        typeof error === "object" &&
        error !== null &&
        "retryable" in error &&
        error.retryable === false
      );
      lastError = error;
      attempt += 1;
      if (!retryable || attempt >= attempts) {
        break;
      }
      await delay(nextDelay);
      nextDelay *= 2;
    }
  }

  throw lastError instanceof Error ? lastError : new Error(String(lastError));
}

/**
 * GET a JSON document. Transport failures and 5xx responses are retried with exponential
 * backoff; 429 becomes a RateLimitError and is never retried here. Callers validate the payload.
 */
export async function fetchJsonWithRetry(url: string, retryOptions: RetryOptions = {}): Promise<unknown> {
  const timeoutMs = retryOptions.timeoutMs ?? 30_000;

  return withRetries(retryOptions, async () => {
    let currentUrl = url;
    let redirects = 0;
    while (redirects < 6) {
      let response: Awaited<ReturnType<typeof request>>;
      try {
        response = await request(currentUrl, {
          headers: {
            "user-agent": USER_AGENT,
            accept: "application/json"
          },
          headersTimeout: timeoutMs,
          bodyTimeout: timeoutMs
        });
      } catch (error) {
        throw new NetworkError(`Request to ${currentUrl} failed: ${errorMessage(error)}`, { retryable: true, cause: error });
      }

      if (response.statusCode >= 300 && response.statusCode < 400) {
        await response.body.dump();
        const location = headerValue(response.headers.location);
        if (!location) {
          throw new NetworkError(`Redirect response missing location for ${currentUrl}`, { statusCode: response.statusCode });
        }
        currentUrl = new URL(location, currentUrl).toString();
        redirects += 1;
        continue;
      }

      if (response.statusCode === 429) {
        await response.body.dump();
        const retryAfterMs = parseRetryAfter(headerValue(response.headers["retry-after"]));
        throw new RateLimitError(`Catalog rate limit reached for ${currentUrl}`, retryAfterMs);
      }

      if (response.statusCode >= 400) {
        const message = await response.body.text();
        throw new NetworkError(`Failed to fetch ${currentUrl}, status=${response.statusCode}: ${message.slice(0, 300)}`, {
          statusCode: response.statusCode,
          retryable: isRetryableStatus(response.statusCode)
        });
      }

      try {
        return await response.body.json();
      } catch (error) {
        throw new NetworkError(`Invalid JSON from ${currentUrl}: ${errorMessage(error)}`, { retryable: true, cause: error });
      }
    }

    throw new NetworkError(`Too many redirects while fetching ${url}`);
  });
}
