import { err, ok, type Result } from "neverthrow";

type HttpMethod = "GET" | "POST";

export type HttpJsonRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  retryAfterMs?: number;
  cause?: unknown;
};

export type HttpJsonClientOptions = {
  /** Minimum spacing between the starts of two requests made through this client. */
  minIntervalMs?: number;
  /** Upper bound on a server-requested `Retry-After` wait. */
  maxRetryAfterMs?: number;
};

const DEFAULT_MAX_RETRY_AFTER_MS = 30_000;

/**
 * Reads a `Retry-After` header given either as delta-seconds or as an HTTP date.
 */
export const parseRetryAfter = (
  value: string | null,
  now: number = Date.now(),
): number | undefined => {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const at = Date.parse(trimmed);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
};

/**
 * Centralizes HTTP JSON IO so adapters share one timeout/retry/status parsing policy.
 * Response bodies are returned as `unknown`; adapters validate their own payloads.
 */
export class HttpJsonClient {
  private nextSlotAt = 0;

  constructor(private readonly options: HttpJsonClientOptions = {}) {}

  /**
   * Executes JSON requests with bounded retries. A `Retry-After` header replaces the linear backoff.
   */
  async requestJson(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      await this.throttle();
      const response = await this.performRequest(request);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!failure.retryable || !hasAttemptsLeft) {
        return response;
      }

      await this.delay(
        failure.retryAfterMs === undefined
          ? request.retryDelayMs * attempt
          : Math.min(
              failure.retryAfterMs,
              this.options.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS,
            ),
      );
    }

    return err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });
  }

  private async throttle(): Promise<void> {
    const interval = this.options.minIntervalMs ?? 0;
    if (interval <= 0) {
      return;
    }

    const now = Date.now();
    const startAt = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = startAt + interval;
    if (startAt > now) {
      await this.delay(startAt - now);
    }
  }

  private async performRequest(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
          ...(retryAfterMs === undefined ? {} : { retryAfterMs }),
        });
      }

      try {
        const payload: unknown = await response.json();
        return ok(payload);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
