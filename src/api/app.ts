import express, { type Express, type RequestHandler } from "express";
import type { Logger } from "pino";
import type { IndustryQueryPort } from "../core/ports/inboundPorts";
import { bearerAuth } from "./bearerAuth";
import { errorHandler } from "./errorResponses";
import { buildQueryRouter } from "./routes";

export type AppDependencies = {
  queries: IndustryQueryPort;
  apiKey: string;
  logger: Logger;
};

const requestLogger =
  (log: Logger): RequestHandler =>
  (req, res, next) => {
    const startedAt = process.hrtime.bigint();
    res.on("finish", () => {
      log.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs:
            Number(process.hrtime.bigint() - startedAt) / 1_000_000,
        },
        "Request completed",
      );
    });
    next();
  };

/**
 * Builds the HTTP surface. The health check at `/` is the only route outside the bearer gate.
 */
export const createApp = ({ queries, apiKey, logger }: AppDependencies): Express => {
  const app = express();
  app.disable("x-powered-by");
  app.use(requestLogger(logger));

  app.get("/", (_req, res) => {
    res.status(200).type("text/plain").send("Healthy.");
  });

  app.use(bearerAuth(apiKey));
  app.use(express.json({ limit: "100kb" }));
  app.use(buildQueryRouter(queries));
  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });
  app.use(errorHandler(logger));

  return app;
};
