/**
 * Describes canonical error categories used at data source boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json";

/**
 * Describes a normalized boundary failure while preserving adapter provenance.
 */
export type AppBoundaryError = {
  source: "index_feed" | "index_file";
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Thrown when the data source cannot produce a dataset. Queries do not recover from it.
 */
export class DataSourceError extends Error {
  constructor(readonly boundary: AppBoundaryError) {
    super(boundary.message);
    this.name = "DataSourceError";
  }
}
