import { readFile } from "node:fs/promises";
import type { Logger } from "pino";
import { DataSourceError } from "../../core/entities/appError";
import type {
  IndexDataSourcePort,
  IndexReader,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { InMemoryIndexReader } from "./inMemoryIndexReader";
import { parseIndexPayload } from "./indexPayload";

const PROVIDER = "index-file";

/**
 * Loads a feed payload from disk once. Used for local development and offline runs.
 */
export class FileIndexDataSource implements IndexDataSourcePort {
  private loading: Promise<IndexReader> | null = null;

  constructor(
    private readonly filePath: string,
    private readonly log: Logger = logger.child({ module: "file-index" }),
  ) {}

  async open(): Promise<IndexReader> {
    if (!this.loading) {
      this.loading = this.load().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  private async load(): Promise<IndexReader> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (error) {
      throw new DataSourceError({
        source: "index_file",
        code: "config_invalid",
        provider: PROVIDER,
        message: `Unable to read index file '${this.filePath}'.`,
        retryable: false,
        cause: error,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new DataSourceError({
        source: "index_file",
        code: "invalid_json",
        provider: PROVIDER,
        message: `Index file '${this.filePath}' is not valid JSON.`,
        retryable: false,
        cause: error,
      });
    }

    const parsed = parseIndexPayload(raw);
    if (parsed.isErr()) {
      throw new DataSourceError({
        source: "index_file",
        code: "malformed_response",
        provider: PROVIDER,
        message: `Index file '${this.filePath}' did not match the expected shape.`,
        retryable: false,
        cause: parsed.error.issues,
      });
    }

    if (parsed.value.skippedEntries > 0) {
      this.log.warn(
        { filePath: this.filePath, skippedEntries: parsed.value.skippedEntries },
        "Skipped malformed ranking rows",
      );
    }

    this.log.info(
      { filePath: this.filePath, industries: parsed.value.industries.length },
      "Index file loaded",
    );
    return new InMemoryIndexReader(parsed.value);
  }
}
