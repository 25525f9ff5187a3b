import type { Logger } from "pino";
import {
  DataSourceError,
  type AppBoundaryError,
  type AppBoundaryErrorCode,
} from "../../core/entities/appError";
import type {
  ClockPort,
  IndexDataSourcePort,
  IndexReader,
} from "../../core/ports/outboundPorts";
import {
  HttpJsonClient,
  type HttpClientError,
  type HttpMethod,
} from "../http/httpJsonClient";
import { logger } from "../../shared/logger/logger";
import { InMemoryIndexReader } from "./inMemoryIndexReader";
import { parseIndexPayload } from "./indexPayload";

export type RemoteIndexDataSourceOptions = {
  url: string;
  method: HttpMethod;
  timeoutMs: number;
  retries: number;
  retryDelayMs?: number;
  ttlSeconds: number;
};

type LoadedDataset = {
  reader: IndexReader;
  loadedAt: number;
};

const PROVIDER = "index-feed";

/**
 * Serves the remote ranking feed from memory and refetches it once the TTL has passed.
 * A refresh swaps the whole dataset; readers already handed out keep the previous one.
 */
export class RemoteIndexDataSource implements IndexDataSourcePort {
  private current: LoadedDataset | null = null;
  private inFlight: Promise<IndexReader> | null = null;

  constructor(
    private readonly options: RemoteIndexDataSourceOptions,
    private readonly clock: ClockPort,
    private readonly log: Logger = logger.child({ module: "remote-index" }),
    private readonly httpClient = new HttpJsonClient(log),
  ) {}

  async open(): Promise<IndexReader> {
    const now = this.clock.now().getTime();
    if (
      this.current &&
      now - this.current.loadedAt < this.options.ttlSeconds * 1_000
    ) {
      return this.current.reader;
    }

    if (!this.inFlight) {
      this.inFlight = this.refresh().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async refresh(): Promise<IndexReader> {
    const startedAt = this.clock.now().getTime();
    const response = await this.httpClient.fetchJson({
      url: this.options.url,
      method: this.options.method,
      timeoutMs: this.options.timeoutMs,
      retries: this.options.retries,
      retryDelayMs: this.options.retryDelayMs ?? 250,
    });

    if (response.isErr()) {
      throw new DataSourceError(this.mapHttpFailure(response.error));
    }

    const parsed = parseIndexPayload(response.value);
    if (parsed.isErr()) {
      throw new DataSourceError({
        source: "index_feed",
        code: "malformed_response",
        provider: PROVIDER,
        message: "Index feed payload did not match the expected shape.",
        retryable: false,
        cause: parsed.error.issues,
      });
    }

    const payload = parsed.value;
    if (payload.skippedEntries > 0) {
      this.log.warn(
        { skippedEntries: payload.skippedEntries },
        "Skipped malformed ranking rows",
      );
    }

    const reader = new InMemoryIndexReader(payload);
    this.current = { reader, loadedAt: startedAt };
    this.log.info(
      {
        industries: payload.industries.length,
        durationMs: this.clock.now().getTime() - startedAt,
      },
      "Index feed refreshed",
    );
    return reader;
  }

  private mapHttpFailure(failure: HttpClientError): AppBoundaryError {
    return {
      source: "index_feed",
      code: this.mapHttpCode(failure),
      provider: PROVIDER,
      message: failure.message,
      retryable: failure.retryable,
      httpStatus: failure.httpStatus,
      cause: failure.cause,
    };
  }

  private mapHttpCode(failure: HttpClientError): AppBoundaryErrorCode {
    if (failure.code === "timeout") {
      return "timeout";
    }
    if (failure.code === "invalid_json") {
      return "invalid_json";
    }
    if (failure.code === "transport_error") {
      return "transport_error";
    }
    if (failure.httpStatus === 401 || failure.httpStatus === 403) {
      return "auth_invalid";
    }
    if (failure.httpStatus === 429) {
      return "rate_limited";
    }
    return "provider_error";
  }
}
