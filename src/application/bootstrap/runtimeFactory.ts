import type { Logger } from "pino";
import { IndustryQueryService } from "../services/industryQueryService";
import type { AppEnv } from "../../shared/config/env";
import { logger as rootLogger } from "../../shared/logger/logger";
import type { IndexDataSourcePort } from "../../core/ports/outboundPorts";
import { FileIndexDataSource } from "../../infra/datasource/fileIndexDataSource";
import { RemoteIndexDataSource } from "../../infra/datasource/remoteIndexDataSource";
import { SystemClock } from "../../infra/system/systemPorts";

export type Runtime = {
  config: AppEnv;
  logger: Logger;
  dataSource: IndexDataSourcePort;
  queryService: IndustryQueryService;
};

const createDataSource = (config: AppEnv, logger: Logger): IndexDataSourcePort => {
  if (config.INDEX_SOURCE === "remote") {
    return new RemoteIndexDataSource(
      {
        url: config.INDEX_REMOTE_URL,
        method: config.INDEX_REMOTE_METHOD,
        timeoutMs: config.INDEX_REMOTE_TIMEOUT_MS,
        retries: config.INDEX_REMOTE_RETRIES,
        ttlSeconds: config.INDEX_CACHE_TTL_SECONDS,
      },
      new SystemClock(),
      logger.child({ module: "remote-index" }),
    );
  }

  return new FileIndexDataSource(
    config.INDEX_FILE_PATH,
    logger.child({ module: "file-index" }),
  );
};

/**
 * Composition root shared by the HTTP server and the CLI query commands.
 * Configuration is read here once; services only see their collaborators.
 */
export const createRuntime = (
  config: AppEnv,
  logger: Logger = rootLogger,
): Runtime => {
  const dataSource = createDataSource(config, logger);
  return {
    config,
    logger,
    dataSource,
    queryService: new IndustryQueryService(dataSource),
  };
};
