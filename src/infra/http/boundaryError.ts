/**
 * Shared HTTP-to-boundary error mapping for provider adapters.
 * Extracted to avoid duplicating status policy across GitHub, site and Ollama adapters.
 */
import type {
  AppBoundaryError,
  AppBoundarySource,
} from "../../core/entities/appError";
import type { HttpClientError } from "./httpClient";

export const mapHttpCode = (
  failure: Pick<HttpClientError, "code" | "httpStatus">,
): AppBoundaryError["code"] => {
  if (failure.httpStatus === 429) {
    return "rate_limited";
  }

  if (failure.httpStatus === 401 || failure.httpStatus === 403) {
    return "auth_invalid";
  }

  switch (failure.code) {
    case "timeout":
    case "aborted":
    case "invalid_json":
    case "transport_error":
      return failure.code;
    case "non_success_status":
      return "provider_error";
  }
};

export const fromHttpError = (
  source: AppBoundarySource,
  provider: string,
  operation: string,
  failure: HttpClientError,
): AppBoundaryError => ({
  source,
  code: mapHttpCode(failure),
  provider,
  operation,
  message: `${operation} failed: ${failure.message}`,
  retryable: failure.retryable,
  httpStatus: failure.httpStatus,
  cause: failure,
});
