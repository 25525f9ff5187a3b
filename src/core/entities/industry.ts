import type { Period } from "./period";
import type { QueryError } from "./queryError";

export type CompanyRanking = {
  company: string;
  industry: string;
  rank: number;
  score: number | null;
  period: Period;
  metrics: Record<string, number>;
};

/**
 * A name that appears in several industries is returned whole instead of picking one.
 */
export type CompanyLookup =
  | { kind: "unique"; company: CompanyRanking }
  | { kind: "ambiguous"; matches: CompanyRanking[] };

export type CompanyHistory = {
  company: string;
  results: CompanyRanking[];
};

export type CompaniesBatchEntry =
  | { name: string; status: "found"; result: CompanyLookup }
  | { name: string; status: "not_found"; error: QueryError };

export type CompaniesBatch = {
  industry: string | null;
  results: CompaniesBatchEntry[];
};

export type IndustryCompanies = {
  industry: string;
  period: Period;
  companies: string[];
};

export type RankingsPage = {
  industry: string;
  period: Period;
  total: number;
  limit: number;
  offset: number;
  results: CompanyRanking[];
};

export type TopCompanies = {
  industry: string;
  period: Period | null;
  topCompanies: CompanyRanking[];
};

export type ScoreSummary = {
  scored: number;
  min: number;
  max: number;
  mean: number;
  median: number;
};

export type IndustryOverview = {
  industry: string;
  period: Period | null;
  companyCount: number;
  score: ScoreSummary | null;
  leaders: CompanyRanking[];
  published: Record<string, unknown> | null;
};

export type MatchQuality =
  | "exact"
  | "prefix"
  | "word_prefix"
  | "substring"
  | "subsequence";

export type CompanySearchMatch = {
  company: string;
  industry: string;
  rank: number;
  score: number | null;
  period: Period;
  match: MatchQuality;
};

export type CompanySearchResults = {
  query: string;
  limit: number;
  results: CompanySearchMatch[];
};

export type PeriodsListing = {
  industry: string | null;
  periods: Period[];
};

export type DiscoverySchema = {
  industries: string[];
  periodsByIndustry: Record<string, Period[]>;
  examples: {
    overview: IndustryOverview | null;
    companyRanking: CompanyRanking | null;
    topCompanies: CompanyRanking[];
    periods: Period[];
  };
};
