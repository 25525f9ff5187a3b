import pino, { type LevelWithSilent } from "pino";
import { env, type AppEnv } from "../config/env";

export const resolveLogLevel = (
  appEnv: Pick<AppEnv, "LOG_LEVEL" | "NODE_ENV">,
): LevelWithSilent => {
  if (appEnv.LOG_LEVEL) {
    return appEnv.LOG_LEVEL;
  }
  if (appEnv.NODE_ENV === "test") {
    return "silent";
  }
  return appEnv.NODE_ENV === "production" ? "info" : "debug";
};

export const logger = pino({
  name: "industry-index-api",
  level: resolveLogLevel(env),
  redact: {
    paths: ["req.headers.authorization", "headers.authorization", "*.apiKey"],
    censor: "[redacted]",
  },
});
