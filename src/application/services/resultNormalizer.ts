import type {
  CompanyRanking,
  RankingsPage,
  ScoreSummary,
} from "../../core/entities/industry";
import type { Period } from "../../core/entities/period";
import type { RankingEntry, RankingSnapshot } from "../../core/entities/ranking";

const SCORE_DECIMALS = 2;

export const roundScore = (value: number): number => {
  const factor = 10 ** SCORE_DECIMALS;
  return Math.round(value * factor) / factor;
};

export const toPeriod = (period: Period): Period => ({
  year: period.year,
  month: period.month,
});

export const toCompanyRanking = (
  snapshot: RankingSnapshot,
  entry: RankingEntry,
): CompanyRanking => ({
  company: entry.company,
  industry: snapshot.industry,
  rank: Math.trunc(entry.rank),
  score: entry.score === null ? null : roundScore(entry.score),
  period: toPeriod(snapshot.period),
  metrics: { ...entry.metrics },
});

/**
 * Slices the ordered snapshot. `offset` is clamped to the snapshot size and echoed back clamped.
 */
export const toRankingsPage = (
  snapshot: RankingSnapshot,
  limit: number,
  offset: number,
): RankingsPage => {
  const total = snapshot.entries.length;
  const start = Math.min(Math.max(offset, 0), total);

  return {
    industry: snapshot.industry,
    period: toPeriod(snapshot.period),
    total,
    limit,
    offset: start,
    results: snapshot.entries
      .slice(start, start + limit)
      .map((entry) => toCompanyRanking(snapshot, entry)),
  };
};

export const summarizeScores = (
  entries: RankingEntry[],
): ScoreSummary | null => {
  const scores = entries
    .map((entry) => entry.score)
    .filter((score): score is number => score !== null)
    .sort((left, right) => left - right);

  if (scores.length === 0) {
    return null;
  }

  const middle = Math.floor(scores.length / 2);
  const median =
    scores.length % 2 === 0
      ? ((scores[middle - 1] ?? 0) + (scores[middle] ?? 0)) / 2
      : (scores[middle] ?? 0);
  const sum = scores.reduce((total, score) => total + score, 0);

  return {
    scored: scores.length,
    min: roundScore(scores[0] ?? 0),
    max: roundScore(scores[scores.length - 1] ?? 0),
    mean: roundScore(sum / scores.length),
    median: roundScore(median),
  };
};
