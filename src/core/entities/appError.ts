/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "transport_error"
  | "non_success_status"
  | "invalid_json"
  | "malformed_response"
  | "config_invalid"
  | "validation_error"
  | "resolution_failed"
  | "index_unavailable"
  | "no_match"
  | "extraction_failed"
  | "content_too_short"
  | "write_failed";

export type AppBoundarySource =
  | "resolver"
  | "index"
  | "selector"
  | "extractor"
  | "writer"
  | "download";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: AppBoundarySource;
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};
