import type { ErrorRequestHandler, Response } from "express";
import type { Result } from "neverthrow";
import type { Logger } from "pino";
import type { ZodError } from "zod";
import { DataSourceError } from "../core/entities/appError";
import type { QueryError, QueryErrorCode } from "../core/entities/queryError";
import { describeValidationError } from "./requestSchemas";

const STATUS_BY_CODE: Record<QueryErrorCode, number> = {
  invalid_parameter: 400,
  industry_not_found: 404,
  company_not_found: 404,
  period_not_found: 404,
  rank_out_of_range: 404,
};

export const statusForQueryError = (error: QueryError): number =>
  STATUS_BY_CODE[error.code];

export const sendResult = <T>(
  res: Response,
  result: Result<T, QueryError>,
): void => {
  if (result.isErr()) {
    res.status(statusForQueryError(result.error)).json({ error: result.error });
    return;
  }
  res.status(200).json(result.value);
};

export const sendValidationError = (res: Response, error: ZodError): void => {
  res.status(400).json({
    error: {
      code: "invalid_parameter",
      message: describeValidationError(error),
    },
  });
};

type BodyParserError = { status: number; type?: unknown; message: string };

const isBodyParserError = (error: unknown): error is BodyParserError =>
  typeof error === "object" &&
  error !== null &&
  "status" in error &&
  typeof error.status === "number" &&
  error.status >= 400 &&
  error.status < 500 &&
  "message" in error &&
  typeof error.message === "string";

/**
 * Last-resort handler: data source outages become 502, malformed bodies 400, the rest 500.
 */
export const errorHandler =
  (log: Logger): ErrorRequestHandler =>
  (error: unknown, req, res, _next) => {
    if (error instanceof DataSourceError) {
      log.error(
        { boundary: { ...error.boundary, cause: undefined }, path: req.path },
        "Data source unavailable",
      );
      res.status(502).json({
        error: { code: "data_source_unavailable", message: error.message },
      });
      return;
    }

    if (isBodyParserError(error)) {
      res.status(error.status).json({
        error: {
          code: "invalid_parameter",
          message:
            error.type === "entity.parse.failed"
              ? "Request body must be valid JSON."
              : error.message,
        },
      });
      return;
    }

    log.error({ err: error, path: req.path }, "Unhandled request failure");
    res.status(500).json({
      error: { code: "internal_error", message: "Internal server error" },
    });
  };
