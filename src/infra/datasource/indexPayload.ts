import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { Period } from "../../core/entities/period";
import type {
  PublishedOverview,
  RankingEntry,
} from "../../core/entities/ranking";

const numericLike = z.union([z.number(), z.string()]);

const indexPayloadSchema = z.object({
  industries: z.array(z.string()).default([]),
  data: z.array(z.record(z.unknown())).default([]),
  scoresData: z.record(z.array(z.unknown())).default({}),
});

const rawEntrySchema = z
  .object({
    company: z.string(),
    year: numericLike,
    period: numericLike.nullish(),
    ranking: numericLike,
    score: numericLike.nullish(),
  })
  .passthrough();

const RESERVED_ENTRY_FIELDS = new Set([
  "company",
  "year",
  "period",
  "month",
  "ranking",
  "score",
  "industry",
]);

export type ParsedIndexEntry = RankingEntry & { period: Period };

export type ParsedIndexPayload = {
  industries: string[];
  entriesByIndustry: Map<string, ParsedIndexEntry[]>;
  overviews: Map<string, PublishedOverview>;
  skippedEntries: number;
};

const toInteger = (value: string | number): number | null => {
  if (typeof value === "string" && !value.trim()) {
    return null;
  }
  const parsed = typeof value === "number" ? value : Number(value.trim());
  return Number.isInteger(parsed) ? parsed : null;
};

const toFiniteNumber = (
  value: string | number | null | undefined,
): number | null => {
  if (value === null || value === undefined || value === "") {
    return null;
  }
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

const toMonth = (
  value: string | number | null | undefined,
): number | null | undefined => {
  if (value === null || value === undefined || value === "") {
    return null;
  }
  const month = toInteger(value);
  if (month === null || month < 1 || month > 12) {
    return undefined;
  }
  return month;
};

const extractMetrics = (raw: Record<string, unknown>): Record<string, number> => {
  const metrics: Record<string, number> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (RESERVED_ENTRY_FIELDS.has(key)) {
      continue;
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      metrics[key] = value;
    }
  }
  return metrics;
};

/**
 * Converts one feed row into a ranking entry. Returns null when the row lacks a usable company, year, month or rank.
 */
const toEntry = (raw: unknown): ParsedIndexEntry | null => {
  const parsed = rawEntrySchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const row = parsed.data;
  const company = row.company.trim();
  const year = toInteger(row.year);
  const month = toMonth(row.period);
  const rank = toInteger(row.ranking);

  if (!company || year === null || month === undefined || rank === null) {
    return null;
  }

  return {
    company,
    rank,
    score: toFiniteNumber(row.score),
    metrics: extractMetrics(row),
    period: { year, month },
  };
};

/**
 * Validates the feed envelope and normalizes its rows. Malformed rows are counted, not fatal.
 */
export const parseIndexPayload = (
  raw: unknown,
): Result<ParsedIndexPayload, z.ZodError> => {
  const envelope = indexPayloadSchema.safeParse(raw);
  if (!envelope.success) {
    return err(envelope.error);
  }

  const { industries: listed, data, scoresData } = envelope.data;
  const industries: string[] = [];
  const seen = new Set<string>();
  for (const name of [...listed, ...Object.keys(scoresData)]) {
    const trimmed = name.trim();
    const key = trimmed.toUpperCase();
    if (!trimmed || seen.has(key)) {
      continue;
    }
    seen.add(key);
    industries.push(trimmed);
  }

  const entriesByIndustry = new Map<string, ParsedIndexEntry[]>();
  let skippedEntries = 0;
  for (const [industry, rows] of Object.entries(scoresData)) {
    const entries: ParsedIndexEntry[] = [];
    for (const row of rows) {
      const entry = toEntry(row);
      if (entry) {
        entries.push(entry);
      } else {
        skippedEntries += 1;
      }
    }
    entriesByIndustry.set(industry.trim().toUpperCase(), entries);
  }

  const overviews = new Map<string, PublishedOverview>();
  for (const item of data) {
    const name = item["name"];
    if (typeof name === "string" && name.trim()) {
      overviews.set(name.trim().toUpperCase(), item);
    }
  }

  return ok({ industries, entriesByIndustry, overviews, skippedEntries });
};
