/**
 * A ranking snapshot date. `month` is null for annual-only data.
 */
export type Period = {
  year: number;
  month: number | null;
};

export type PeriodFilter = {
  year?: number;
  month?: number;
};

/**
 * Orders periods chronologically; an unspecified month sorts before January.
 */
export const comparePeriods = (left: Period, right: Period): number => {
  if (left.year !== right.year) {
    return left.year - right.year;
  }

  return (left.month ?? 0) - (right.month ?? 0);
};

export const periodKey = (period: Period): string =>
  period.month === null
    ? `${period.year}`
    : `${period.year}-${String(period.month).padStart(2, "0")}`;

/**
 * Returns distinct periods newest first.
 */
export const sortPeriodsDescending = (periods: Iterable<Period>): Period[] => {
  const unique = new Map<string, Period>();
  for (const period of periods) {
    unique.set(periodKey(period), period);
  }

  return Array.from(unique.values()).sort((left, right) =>
    comparePeriods(right, left),
  );
};
