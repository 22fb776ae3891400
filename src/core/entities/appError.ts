/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "aborted"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json"
  | "validation_error"
  | "dimension_mismatch"
  | "conversion_error"
  | "io_error"
  | "limit_exceeded"
  | "storage_error";

export type AppBoundarySource =
  | "github"
  | "site"
  | "file"
  | "pdf"
  | "llm"
  | "embedding"
  | "storage";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 * `operation` names the call that failed, e.g. `list_pull_requests acme/widget`.
 */
export type AppBoundaryError = {
  source: AppBoundarySource;
  code: AppBoundaryErrorCode;
  provider: string;
  operation: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Raised when a persisted enumeration or column value cannot be decoded.
 */
export type ConversionError = {
  code: "conversion_error";
  table: string;
  column: string;
  message: string;
  value?: unknown;
};
