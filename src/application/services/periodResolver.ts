import { err, ok, type Result } from "neverthrow";
import type { Period, PeriodFilter } from "../../core/entities/period";
import {
  periodNotFound,
  type QueryError,
} from "../../core/entities/queryError";
import type { IndexReader } from "../../core/ports/outboundPorts";
import { findCompanyEntry, normalizeCompanyName } from "./companyMatching";

export type PeriodScope = {
  industry: string;
  company?: string;
};

/**
 * Picks the snapshot period a query runs against when the caller gives none or only part of one.
 *
 * - year and month: that exact period must exist
 * - year only: the latest month of that year, with an unspecified month lowest
 * - month only: the latest year that has that month
 * - neither: the latest period in scope
 *
 * A company scope narrows the candidates to the industry snapshots the company appears in.
 */
export class PeriodResolver {
  resolve(
    reader: IndexReader,
    scope: PeriodScope,
    filter: PeriodFilter = {},
  ): Result<Period, QueryError> {
    const candidates = this.candidatePeriods(reader, scope);
    const { year, month } = filter;

    // candidatePeriods is newest first, so the first hit is the latest.
    const selected = candidates.find(
      (period) =>
        (year === undefined || period.year === year) &&
        (month === undefined || period.month === month),
    );

    if (!selected) {
      return err(periodNotFound(this.describeScope(scope), filter));
    }
    return ok({ year: selected.year, month: selected.month });
  }

  private candidatePeriods(reader: IndexReader, scope: PeriodScope): Period[] {
    const periods = reader.listPeriods(scope.industry);
    if (scope.company === undefined) {
      return periods;
    }

    const needle = normalizeCompanyName(scope.company);
    return periods.filter(
      (period) =>
        findCompanyEntry(reader.getSnapshot(scope.industry, period), needle) !==
        null,
    );
  }

  private describeScope(scope: PeriodScope): string {
    return scope.company === undefined
      ? scope.industry
      : `${scope.company} in ${scope.industry}`;
  }
}
