import type { Period } from "./period";

/**
 * One company's position in an industry snapshot, as the data source stores it.
 */
export type RankingEntry = {
  company: string;
  rank: number;
  score: number | null;
  metrics: Record<string, number>;
};

/**
 * Ordered ranking of one industry for one period. Entries are sorted by rank ascending.
 */
export type RankingSnapshot = {
  industry: string;
  period: Period;
  entries: RankingEntry[];
};

/**
 * Industry summary the data source publishes verbatim.
 */
export type PublishedOverview = Record<string, unknown>;
