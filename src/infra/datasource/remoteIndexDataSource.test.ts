import { afterEach, describe, expect, it, vi } from "vitest";
import pino from "pino";
import { fixturePayload } from "../../__tests__/fixtures/indexFixture";
import { DataSourceError } from "../../core/entities/appError";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { RemoteIndexDataSource } from "./remoteIndexDataSource";

class FakeClock implements ClockPort {
  constructor(private current: number) {}

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

const silentLogger = pino({ level: "silent" });

const options = {
  url: "https://index.example.test/industries",
  method: "POST" as const,
  timeoutMs: 500,
  retries: 0,
  retryDelayMs: 1,
  ttlSeconds: 600,
};

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status });

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("RemoteIndexDataSource", () => {
  it("serves the cached dataset until the TTL expires", async () => {
    const fetchMock = vi.fn(async () => jsonResponse(fixturePayload));
    vi.stubGlobal("fetch", fetchMock);
    const clock = new FakeClock(Date.parse("2025-01-01T00:00:00.000Z"));
    const source = new RemoteIndexDataSource(options, clock, silentLogger);

    const first = await source.open();
    clock.advance(599_000);
    const cached = await source.open();
    clock.advance(1_000);
    const refreshed = await source.open();

    expect(cached).toBe(first);
    expect(refreshed).not.toBe(first);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(refreshed.listIndustries()).toEqual([
      "TECH",
      "CPG",
      "BANKING",
      "Energy",
    ]);
  });

  it("shares one request between concurrent refreshes", async () => {
    const fetchMock = vi.fn(async () => jsonResponse(fixturePayload));
    vi.stubGlobal("fetch", fetchMock);
    const source = new RemoteIndexDataSource(
      options,
      new FakeClock(0),
      silentLogger,
    );

    const [left, right] = await Promise.all([source.open(), source.open()]);

    expect(left).toBe(right);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("sends the configured method", async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        jsonResponse(fixturePayload),
    );
    vi.stubGlobal("fetch", fetchMock);
    const source = new RemoteIndexDataSource(
      options,
      new FakeClock(0),
      silentLogger,
    );

    await source.open();

    expect(fetchMock.mock.calls[0]?.[0]).toBe(options.url);
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe("POST");
  });

  it("throws a DataSourceError carrying the HTTP failure", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("denied", { status: 403 })),
    );
    const source = new RemoteIndexDataSource(
      options,
      new FakeClock(0),
      silentLogger,
    );

    const failure = await source.open().then(
      () => null,
      (error: unknown) => error,
    );

    expect(failure).toBeInstanceOf(DataSourceError);
    if (!(failure instanceof DataSourceError)) {
      throw new Error("expected DataSourceError");
    }
    expect(failure.boundary.code).toBe("auth_invalid");
    expect(failure.boundary.httpStatus).toBe(403);
    expect(failure.boundary.source).toBe("index_feed");
  });

  it("rejects payloads that do not match the feed shape", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ industries: "TECH" })),
    );
    const source = new RemoteIndexDataSource(
      options,
      new FakeClock(0),
      silentLogger,
    );

    await expect(source.open()).rejects.toMatchObject({
      boundary: { code: "malformed_response" },
    });
  });

  it("retries after a failed refresh instead of caching the failure", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockResolvedValueOnce(jsonResponse(fixturePayload));
    vi.stubGlobal("fetch", fetchMock);
    const source = new RemoteIndexDataSource(
      options,
      new FakeClock(0),
      silentLogger,
    );

    await expect(source.open()).rejects.toBeInstanceOf(DataSourceError);
    const reader = await source.open();

    expect(reader.listIndustries()).toHaveLength(4);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
