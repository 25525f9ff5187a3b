import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";

export type HttpMethod = "GET" | "POST";

export type HttpJsonRequest = {
  url: string;
  method: HttpMethod;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

const isRetryableStatus = (status: number): boolean =>
  status === 429 || status >= 500;

const isAbort = (error: unknown): boolean =>
  error instanceof DOMException && error.name === "AbortError";

/**
 * Downloads a JSON document. The body is returned unvalidated; callers parse it with their own schema.
 */
export class HttpJsonClient {
  constructor(private readonly log?: Logger) {}

  async fetchJson(
    request: HttpJsonRequest,
    attempt = 1,
  ): Promise<Result<unknown, HttpClientError>> {
    const result = await this.attempt(request);
    if (result.isOk() || !result.error.retryable || attempt > request.retries) {
      return result;
    }

    const delayMs = request.retryDelayMs * attempt;
    this.log?.warn(
      {
        url: request.url,
        attempt,
        delayMs,
        code: result.error.code,
        httpStatus: result.error.httpStatus,
      },
      "Retrying HTTP request",
    );
    await new Promise((resolve) => setTimeout(resolve, delayMs));
    return this.fetchJson(request, attempt + 1);
  }

  private async attempt(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const downloaded = await this.download(request);
    if (downloaded.isErr()) {
      return err(downloaded.error);
    }

    const { status, text } = downloaded.value;
    if (status < 200 || status >= 300) {
      return err({
        code: "non_success_status",
        message: `HTTP request failed with status ${status}.`,
        httpStatus: status,
        retryable: isRetryableStatus(status),
      });
    }

    try {
      const body: unknown = JSON.parse(text);
      return ok(body);
    } catch (jsonError) {
      return err({
        code: "invalid_json",
        message: "HTTP response body was not valid JSON.",
        retryable: false,
        cause: jsonError,
      });
    }
  }

  /** Reads the whole response body; the timeout covers headers and body. */
  private async download(
    request: HttpJsonRequest,
  ): Promise<Result<{ status: number; text: string }, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: { accept: "application/json" },
        signal: controller.signal,
      });
      return ok({ status: response.status, text: await response.text() });
    } catch (error) {
      if (isAbort(error)) {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${request.timeoutMs}ms.`,
          retryable: true,
          cause: error,
        });
      }
      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
