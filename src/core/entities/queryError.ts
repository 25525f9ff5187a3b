import type { PeriodFilter } from "./period";

export type QueryErrorCode = QueryError["code"];

/**
 * Expected query failures. Every variant is recoverable and reported to the caller.
 */
export type QueryError =
  | { code: "industry_not_found"; message: string; industry: string }
  | { code: "company_not_found"; message: string; company: string }
  | {
      code: "period_not_found";
      message: string;
      scope: string;
      requested: PeriodFilter;
    }
  | { code: "rank_out_of_range"; message: string; rank: number; size: number }
  | { code: "invalid_parameter"; message: string; parameter: string };

const describeFilter = (filter: PeriodFilter): string => {
  const parts: string[] = [];
  if (filter.year !== undefined) {
    parts.push(`year=${filter.year}`);
  }
  if (filter.month !== undefined) {
    parts.push(`month=${filter.month}`);
  }
  return parts.length > 0 ? parts.join(", ") : "any period";
};

export const industryNotFound = (industry: string): QueryError => ({
  code: "industry_not_found",
  message: `Industry not found: ${industry}`,
  industry,
});

export const companyNotFound = (company: string): QueryError => ({
  code: "company_not_found",
  message: `Company not found: ${company}`,
  company,
});

export const periodNotFound = (
  scope: string,
  requested: PeriodFilter,
): QueryError => ({
  code: "period_not_found",
  message: `No data for ${scope} at ${describeFilter(requested)}`,
  scope,
  requested,
});

export const rankOutOfRange = (rank: number, size: number): QueryError => ({
  code: "rank_out_of_range",
  message: `Rank ${rank} is outside 1..${size}`,
  rank,
  size,
});

export const invalidParameter = (
  parameter: string,
  message: string,
): QueryError => ({
  code: "invalid_parameter",
  message,
  parameter,
});
