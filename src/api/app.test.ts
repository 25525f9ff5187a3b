import type { Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import pino from "pino";
import { createFixtureDataSource } from "../__tests__/fixtures/indexFixture";
import { IndustryQueryService } from "../application/services/industryQueryService";
import { DataSourceError } from "../core/entities/appError";
import { createApp } from "./app";

const API_KEY = "test-secret";
const silentLogger = pino({ level: "silent" });

const listen = (server: Server): Promise<string> =>
  new Promise((resolve, reject) => {
    server.once("listening", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("expected a TCP address"));
        return;
      }
      resolve(`http://127.0.0.1:${address.port}`);
    });
  });

const close = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

describe("HTTP API", () => {
  let server: Server;
  let baseUrl: string;

  const get = (path: string, token: string | null = API_KEY) =>
    fetch(`${baseUrl}${path}`, {
      headers: token === null ? {} : { authorization: `Bearer ${token}` },
    });

  beforeAll(async () => {
    const app = createApp({
      queries: new IndustryQueryService(createFixtureDataSource()),
      apiKey: API_KEY,
      logger: silentLogger,
    });
    server = app.listen(0, "127.0.0.1");
    baseUrl = await listen(server);
  });

  afterAll(async () => {
    await close(server);
  });

  describe("authentication", () => {
    it("leaves the health check open", async () => {
      const response = await get("/", null);

      expect(response.status).toBe(200);
      expect(await response.text()).toBe("Healthy.");
    });

    it("answers 401 without a bearer token", async () => {
      const response = await get("/industries", null);

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ error: "Unauthorized" });
    });

    it("answers 403 for a wrong token", async () => {
      const response = await get("/industries", "other-secret");

      expect(response.status).toBe(403);
      expect(await response.json()).toEqual({ error: "Forbidden" });
    });

    it("rejects everything when no key is configured", async () => {
      const app = createApp({
        queries: new IndustryQueryService(createFixtureDataSource()),
        apiKey: "",
        logger: silentLogger,
      });
      const unkeyed = app.listen(0, "127.0.0.1");
      const url = await listen(unkeyed);

      const response = await fetch(`${url}/industries`, {
        headers: { authorization: "Bearer " },
      });
      await close(unkeyed);

      expect(response.status).toBe(401);
    });
  });

  it("lists industries", async () => {
    const response = await get("/industries");

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      industries: ["TECH", "CPG", "BANKING", "Energy"],
    });
  });

  it("echoes the resolved period for industry companies", async () => {
    const response = await get("/industry/tech/companies?year=2024");

    expect(await response.json()).toEqual({
      industry: "TECH",
      period: { year: 2024, month: 5 },
      companies: ["Globex", "Acme Corp", "Initech"],
    });
  });

  it("returns 400 for malformed period parameters", async () => {
    const response = await get("/industry/TECH/companies?month=april");

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: {
        code: "invalid_parameter",
        message: "'month' must be an integer",
      },
    });
  });

  it("requires a company name", async () => {
    const response = await get("/company");

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: {
        code: "invalid_parameter",
        message: "Query parameter 'name' is required",
      },
    });
  });

  it("maps a missing company to 404", async () => {
    const response = await get("/company?name=Nobody");

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: {
        code: "company_not_found",
        message: "Company not found: Nobody",
        company: "Nobody",
      },
    });
  });

  it("returns company history", async () => {
    const response = await get("/company/history?name=Hooli");

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      results: [expect.objectContaining({ company: "Hooli", industry: "TECH" })],
    });
  });

  it("resolves batches without failing on unknown names", async () => {
    const response = await fetch(`${baseUrl}/companies`, {
      method: "POST",
      headers: {
        authorization: `Bearer ${API_KEY}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        companies: ["Globex", "UnknownXYZ"],
        year: "2024",
        month: 5,
      }),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      results: [
        { name: "Globex", status: "found" },
        { name: "UnknownXYZ", status: "not_found" },
      ],
    });
  });

  it("rejects a batch body without a companies list", async () => {
    const response = await fetch(`${baseUrl}/companies`, {
      method: "POST",
      headers: {
        authorization: `Bearer ${API_KEY}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({ companies: "Globex" }),
    });

    expect(response.status).toBe(400);
  });

  it("rejects a batch body with a boolean year", async () => {
    const response = await fetch(`${baseUrl}/companies`, {
      method: "POST",
      headers: {
        authorization: `Bearer ${API_KEY}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({ companies: ["Globex"], year: true }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: {
        code: "invalid_parameter",
        message: "'year' must be an integer",
      },
    });
  });

  it("treats a whitespace-only year as omitted", async () => {
    const response = await get("/industry/TECH/companies?year=%20");

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      period: { year: 2024, month: 5 },
    });
  });

  it("rejects a batch body that is not JSON", async () => {
    const response = await fetch(`${baseUrl}/companies`, {
      method: "POST",
      headers: {
        authorization: `Bearer ${API_KEY}`,
        "content-type": "application/json",
      },
      body: "{not json",
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: {
        code: "invalid_parameter",
        message: "Request body must be valid JSON.",
      },
    });
  });

  it("maps rank lookups and out-of-range ranks", async () => {
    const found = await get("/industry/TECH/rank/2");
    const outside = await get("/industry/TECH/rank/0");

    expect(found.status).toBe(200);
    expect(await found.json()).toMatchObject({ company: "Acme Corp", rank: 2 });
    expect(outside.status).toBe(404);
    expect(await outside.json()).toMatchObject({
      error: { code: "rank_out_of_range" },
    });
  });

  it("pages rankings", async () => {
    const response = await get(
      "/industry/TECH/rankings?year=2024&month=3&limit=2&offset=2",
    );

    expect(await response.json()).toMatchObject({
      total: 5,
      limit: 2,
      offset: 2,
      results: [{ company: "Initech" }, { company: "Umbrella Systems" }],
    });
  });

  it("returns 400 for a negative offset", async () => {
    const response = await get("/industry/TECH/rankings?offset=-1");

    expect(response.status).toBe(400);
  });

  it("serves overview and top companies", async () => {
    const overview = await get("/industry/cpg/overview");
    const top = await get("/industry/cpg/top-companies");

    expect(overview.status).toBe(200);
    expect(await overview.json()).toMatchObject({ companyCount: 3 });
    expect(await top.json()).toMatchObject({
      topCompanies: [{ rank: 1 }, { rank: 2 }, { rank: 3 }],
    });
  });

  it("serves top companies for an industry without ranking rows", async () => {
    const response = await get("/industry/BANKING/top-companies");

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      industry: "BANKING",
      period: null,
      topCompanies: [],
    });
  });

  it("searches companies", async () => {
    const response = await get("/search/companies?company=acm&limit=2");

    expect(await response.json()).toMatchObject({
      limit: 2,
      results: [
        { company: "Acme Corp", industry: "TECH" },
        { company: "Acme Corp", industry: "CPG" },
      ],
    });
  });

  it("requires a search term", async () => {
    const response = await get("/search/companies?company=");

    expect(response.status).toBe(400);
  });

  it("lists periods for one industry", async () => {
    const response = await get("/periods?industry=cpg");

    expect(await response.json()).toEqual({
      industry: "CPG",
      periods: [
        { year: 2024, month: 5 },
        { year: 2024, month: 4 },
      ],
    });
  });

  it("serves the discovery document", async () => {
    const response = await get("/discover");

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      industries: ["TECH", "CPG", "BANKING", "Energy"],
    });
  });

  it("answers unknown routes with JSON 404", async () => {
    const response = await get("/nowhere");

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "Not found" });
  });

  it("maps data source outages to 502", async () => {
    const app = createApp({
      queries: new IndustryQueryService({
        open: async () => {
          throw new DataSourceError({
            source: "index_feed",
            code: "timeout",
            provider: "index-feed",
            message: "HTTP request timed out after 15000ms.",
            retryable: true,
          });
        },
      }),
      apiKey: API_KEY,
      logger: silentLogger,
    });
    const failing = app.listen(0, "127.0.0.1");
    const url = await listen(failing);

    const response = await fetch(`${url}/industries`, {
      headers: { authorization: `Bearer ${API_KEY}` },
    });
    const body: unknown = await response.json();
    await close(failing);

    expect(response.status).toBe(502);
    expect(body).toEqual({
      error: {
        code: "data_source_unavailable",
        message: "HTTP request timed out after 15000ms.",
      },
    });
  });
});
