import {
  periodKey,
  sortPeriodsDescending,
  type Period,
} from "../../core/entities/period";
import type {
  PublishedOverview,
  RankingSnapshot,
} from "../../core/entities/ranking";
import type { IndexReader } from "../../core/ports/outboundPorts";
import type { ParsedIndexPayload } from "./indexPayload";

/**
 * Immutable dataset version built from one parsed payload. Industry lookups ignore case.
 */
export class InMemoryIndexReader implements IndexReader {
  private readonly industries: string[];
  private readonly snapshots = new Map<string, Map<string, RankingSnapshot>>();
  private readonly overviews: Map<string, PublishedOverview>;

  constructor(payload: ParsedIndexPayload) {
    this.industries = [...payload.industries];
    this.overviews = payload.overviews;

    for (const industry of this.industries) {
      const key = industry.toUpperCase();
      const byPeriod = new Map<string, RankingSnapshot>();

      for (const entry of payload.entriesByIndustry.get(key) ?? []) {
        const slot = periodKey(entry.period);
        let snapshot = byPeriod.get(slot);
        if (!snapshot) {
          snapshot = { industry, period: entry.period, entries: [] };
          byPeriod.set(slot, snapshot);
        }
        snapshot.entries.push({
          company: entry.company,
          rank: entry.rank,
          score: entry.score,
          metrics: entry.metrics,
        });
      }

      // Array.prototype.sort is stable, so equal ranks keep feed order.
      for (const snapshot of byPeriod.values()) {
        snapshot.entries.sort((left, right) => left.rank - right.rank);
      }

      this.snapshots.set(key, byPeriod);
    }
  }

  listIndustries(): string[] {
    return [...this.industries];
  }

  listPeriods(industry?: string): Period[] {
    if (industry !== undefined) {
      const byPeriod = this.snapshots.get(industry.toUpperCase());
      return byPeriod
        ? sortPeriodsDescending(
            Array.from(byPeriod.values(), (snapshot) => snapshot.period),
          )
        : [];
    }

    const all: Period[] = [];
    for (const byPeriod of this.snapshots.values()) {
      for (const snapshot of byPeriod.values()) {
        all.push(snapshot.period);
      }
    }
    return sortPeriodsDescending(all);
  }

  getSnapshot(industry: string, period: Period): RankingSnapshot | null {
    return (
      this.snapshots.get(industry.toUpperCase())?.get(periodKey(period)) ??
      null
    );
  }

  getOverview(industry: string): PublishedOverview | null {
    return this.overviews.get(industry.toUpperCase()) ?? null;
  }
}
