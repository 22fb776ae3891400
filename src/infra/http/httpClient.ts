import { err, ok, type Result } from "neverthrow";
import { logger } from "../../shared/logger/logger";

type HttpMethod = "GET" | "POST";

export type HttpRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  signal?: AbortSignal;
};

export type HttpClientErrorCode =
  | "timeout"
  | "aborted"
  | "transport_error"
  | "non_success_status"
  | "invalid_json";

export type HttpClientError = {
  code: HttpClientErrorCode;
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

/**
 * Centralizes HTTP IO so adapters share one timeout/retry/status parsing policy.
 */
export class HttpClient {
  /**
   * Executes JSON requests with bounded retries; the payload is left `unknown` for the adapter to validate.
   */
  async requestJson(
    request: HttpRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    return this.withRetries(request, async (response) => {
      try {
        return ok(await response.json());
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }
    });
  }

  /**
   * Same policy as `requestJson` for endpoints that return markup or plain text.
   */
  async requestText(
    request: HttpRequest,
  ): Promise<Result<string, HttpClientError>> {
    return this.withRetries(request, async (response) =>
      ok(await response.text()),
    );
  }

  private async withRetries<T>(
    request: HttpRequest,
    readBody: (response: Response) => Promise<Result<T, HttpClientError>>,
  ): Promise<Result<T, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(request, readBody);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!failure.retryable || !hasAttemptsLeft) {
        return response;
      }

      logger.debug(
        { url: request.url, attempt, code: failure.code },
        "Retrying HTTP request",
      );
      await this.delay(request.retryDelayMs * attempt);
    }

    return err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });
  }

  private async performRequest<T>(
    request: HttpRequest,
    readBody: (response: Response) => Promise<Result<T, HttpClientError>>,
  ): Promise<Result<T, HttpClientError>> {
    if (request.signal?.aborted) {
      return err(this.abortedError(request.signal.reason));
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
    const forwardAbort = () => controller.abort();
    request.signal?.addEventListener("abort", forwardAbort, { once: true });

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

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      return await readBody(response);
    } catch (error) {
      if (request.signal?.aborted) {
        return err(this.abortedError(request.signal.reason ?? error));
      }

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
      request.signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private abortedError(cause: unknown): HttpClientError {
    return {
      code: "aborted",
      message: "HTTP request was aborted by the caller.",
      retryable: false,
      cause,
    };
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
