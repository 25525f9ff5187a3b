import type { Period } from "../entities/period";
import type {
  PublishedOverview,
  RankingSnapshot,
} from "../entities/ranking";

/**
 * Read-only view over one version of the dataset. Every call on the same reader sees the same data.
 */
export interface IndexReader {
  listIndustries(): string[];
  listPeriods(industry?: string): Period[];
  getSnapshot(industry: string, period: Period): RankingSnapshot | null;
  getOverview(industry: string): PublishedOverview | null;
}

/**
 * Hands out readers. Throws DataSourceError when the backing store cannot be read.
 */
export interface IndexDataSourcePort {
  open(): Promise<IndexReader>;
}

export interface ClockPort {
  now(): Date;
}
