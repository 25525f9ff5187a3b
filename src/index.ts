#!/usr/bin/env node
import { runCli } from "./cli/main";
import { DataSourceError } from "./core/entities/appError";
import { logger } from "./shared/logger/logger";

const toErrorDetails = (error: unknown) => {
  if (error instanceof DataSourceError) {
    return {
      name: error.name,
      message: error.message,
      source: error.boundary.source,
      code: error.boundary.code,
      httpStatus: error.boundary.httpStatus,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};

runCli(process.argv).catch((error: unknown) => {
  logger.error({ error: toErrorDetails(error) }, "CLI failed");
  process.exit(1);
});
