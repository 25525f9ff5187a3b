import "dotenv/config";
import { z } from "zod";

const supportedIndexSources = ["file", "remote"] as const;
const logLevels = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type IndexSourceName = (typeof supportedIndexSources)[number];

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  LOG_LEVEL: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.enum(logLevels).optional(),
  ),
  API_KEY: z.string().default(""),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(5000),
  INDEX_SOURCE: z.enum(supportedIndexSources).default("file"),
  INDEX_FILE_PATH: z.string().default("data/sample-index.json"),
  INDEX_REMOTE_URL: z
    .string()
    .url()
    .default("https://index.example.com/api/v1/index/industries"),
  INDEX_REMOTE_METHOD: z.enum(["GET", "POST"]).default("POST"),
  INDEX_REMOTE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  INDEX_REMOTE_RETRIES: z.coerce.number().int().min(0).default(2),
  INDEX_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(600),
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Parses the process environment. Throws a ZodError listing every invalid variable.
 */
export const loadEnv = (source: NodeJS.ProcessEnv = process.env): AppEnv =>
  envSchema.parse(source);

export const env: AppEnv = loadEnv();

/**
 * Warns when protected routes would reject every request.
 */
export const warnIfApiKeyMissing = (
  appEnv: AppEnv,
  warn: (message: string) => void,
): void => {
  if (!appEnv.API_KEY.trim() && appEnv.NODE_ENV !== "test") {
    warn(
      "API_KEY is empty; every request except the health check will be rejected with 401.",
    );
  }
};
