import { err, ok, type Result } from "neverthrow";
import type {
  CompaniesBatch,
  CompaniesBatchEntry,
  CompanyHistory,
  CompanyLookup,
  CompanyRanking,
  CompanySearchMatch,
  CompanySearchResults,
  DiscoverySchema,
  IndustryCompanies,
  IndustryOverview,
  PeriodsListing,
  RankingsPage,
  TopCompanies,
} from "../../core/entities/industry";
import {
  comparePeriods,
  type Period,
  type PeriodFilter,
} from "../../core/entities/period";
import {
  companyNotFound,
  industryNotFound,
  invalidParameter,
  periodNotFound,
  rankOutOfRange,
  type QueryError,
} from "../../core/entities/queryError";
import type { RankingSnapshot } from "../../core/entities/ranking";
import type {
  CompaniesBatchRequest,
  CompanySearchRequest,
  IndustryQueryPort,
  QueryResult,
  RankingsRequest,
} from "../../core/ports/inboundPorts";
import type {
  IndexDataSourcePort,
  IndexReader,
} from "../../core/ports/outboundPorts";
import {
  compareMatchQuality,
  findCompanyEntry,
  matchQuality,
  normalizeCompanyName,
} from "./companyMatching";
import { PeriodResolver } from "./periodResolver";
import {
  summarizeScores,
  toCompanyRanking,
  toPeriod,
  toRankingsPage,
} from "./resultNormalizer";

export const DEFAULT_PAGE_LIMIT = 25;
export const MAX_PAGE_LIMIT = 100;
export const TOP_COMPANIES_LIMIT = 10;
export const OVERVIEW_LEADERS_LIMIT = 3;

/**
 * Answers read-only ranking questions. Each call opens one reader and sees one dataset version.
 * Expected failures come back as QueryError values; a DataSourceError thrown by the data source is not caught.
 */
export class IndustryQueryService implements IndustryQueryPort {
  constructor(
    private readonly dataSource: IndexDataSourcePort,
    private readonly periodResolver = new PeriodResolver(),
  ) {}

  async listIndustries(): QueryResult<string[]> {
    const reader = await this.dataSource.open();
    return ok(reader.listIndustries());
  }

  async listCompanies(
    industry: string,
    filter: PeriodFilter = {},
  ): QueryResult<IndustryCompanies> {
    const validFilter = this.validateFilter(filter);
    if (validFilter.isErr()) {
      return err(validFilter.error);
    }

    const reader = await this.dataSource.open();
    return this.loadSnapshot(reader, industry, filter).map((snapshot) => ({
      industry: snapshot.industry,
      period: toPeriod(snapshot.period),
      companies: snapshot.entries.map((entry) => entry.company),
    }));
  }

  /**
   * Looks a name up across all industries; several industries listing it make the result ambiguous.
   */
  async getCompany(
    name: string,
    filter: PeriodFilter = {},
  ): QueryResult<CompanyLookup> {
    const validFilter = this.validateFilter(filter);
    if (validFilter.isErr()) {
      return err(validFilter.error);
    }
    if (!name.trim()) {
      return err(invalidParameter("name", "Company name must not be empty."));
    }

    const reader = await this.dataSource.open();
    return this.lookupCompany(reader, name, filter, reader.listIndustries());
  }

  async getCompanyHistory(name: string): QueryResult<CompanyHistory> {
    const needle = normalizeCompanyName(name);
    if (!needle) {
      return err(invalidParameter("name", "Company name must not be empty."));
    }

    const reader = await this.dataSource.open();
    const results: CompanyRanking[] = [];
    for (const industry of reader.listIndustries()) {
      for (const period of reader.listPeriods(industry)) {
        const snapshot = reader.getSnapshot(industry, period);
        const entry = findCompanyEntry(snapshot, needle);
        if (snapshot && entry) {
          results.push(toCompanyRanking(snapshot, entry));
        }
      }
    }

    if (results.length === 0) {
      return err(companyNotFound(name.trim()));
    }

    results.sort((left, right) => comparePeriods(right.period, left.period));
    return ok({ company: name.trim(), results });
  }

  /**
   * Resolves each name like getCompany. Per-name failures are reported inline, in request order.
   */
  async getCompaniesBatch(
    request: CompaniesBatchRequest,
  ): QueryResult<CompaniesBatch> {
    const { names, industry, ...filter } = request;
    if (names.length === 0) {
      return err(
        invalidParameter("companies", "At least one company name is required."),
      );
    }
    const validFilter = this.validateFilter(filter);
    if (validFilter.isErr()) {
      return err(validFilter.error);
    }

    const reader = await this.dataSource.open();
    let scope = reader.listIndustries();
    let echoedIndustry: string | null = null;

    if (industry !== undefined) {
      const resolved = this.resolveIndustry(reader, industry);
      if (resolved.isErr()) {
        return ok({
          industry: industry.trim(),
          results: names.map(
            (name): CompaniesBatchEntry => ({
              name,
              status: "not_found",
              error: resolved.error,
            }),
          ),
        });
      }
      scope = [resolved.value];
      echoedIndustry = resolved.value;
    }

    const results = names.map((name): CompaniesBatchEntry => {
      if (!name.trim()) {
        return {
          name,
          status: "not_found",
          error: invalidParameter("companies", "Company name must not be empty."),
        };
      }

      const lookup = this.lookupCompany(reader, name, filter, scope);
      return lookup.isOk()
        ? { name, status: "found", result: lookup.value }
        : { name, status: "not_found", error: lookup.error };
    });

    return ok({ industry: echoedIndustry, results });
  }

  async getRank(
    industry: string,
    rank: number,
    filter: PeriodFilter = {},
  ): QueryResult<CompanyRanking> {
    if (!Number.isInteger(rank)) {
      return err(invalidParameter("rank", "Rank must be an integer."));
    }
    const validFilter = this.validateFilter(filter);
    if (validFilter.isErr()) {
      return err(validFilter.error);
    }

    const reader = await this.dataSource.open();
    return this.loadSnapshot(reader, industry, filter).andThen(
      (snapshot): Result<CompanyRanking, QueryError> => {
        const entry = rank >= 1 ? snapshot.entries[rank - 1] : undefined;
        if (!entry) {
          return err(rankOutOfRange(rank, snapshot.entries.length));
        }
        return ok(toCompanyRanking(snapshot, entry));
      },
    );
  }

  /** Returns one page of the resolved snapshot; oversized limits are capped and the offset is clamped. */
  async getRankings(
    industry: string,
    request: RankingsRequest = {},
  ): QueryResult<RankingsPage> {
    const { limit: requestedLimit, offset = 0, ...filter } = request;
    const limit = this.validateLimit(requestedLimit);
    if (limit.isErr()) {
      return err(limit.error);
    }
    if (!Number.isInteger(offset) || offset < 0) {
      return err(
        invalidParameter("offset", "Offset must be a non-negative integer."),
      );
    }
    const validFilter = this.validateFilter(filter);
    if (validFilter.isErr()) {
      return err(validFilter.error);
    }

    const reader = await this.dataSource.open();
    return this.loadSnapshot(reader, industry, filter).map((snapshot) =>
      toRankingsPage(snapshot, limit.value, offset),
    );
  }

  async getOverview(industry: string): QueryResult<IndustryOverview> {
    const reader = await this.dataSource.open();
    return this.resolveIndustry(reader, industry).map((canonical) =>
      this.buildOverview(reader, canonical),
    );
  }

  /**
   * First entries of the latest snapshot. A known industry without ranking rows yields an empty list.
   */
  async getTopCompanies(industry: string): QueryResult<TopCompanies> {
    const reader = await this.dataSource.open();
    return this.resolveIndustry(reader, industry).map((canonical) => {
      const snapshot = this.latestSnapshot(reader, canonical);
      return {
        industry: canonical,
        period: snapshot ? toPeriod(snapshot.period) : null,
        topCompanies: snapshot
          ? toRankingsPage(snapshot, TOP_COMPANIES_LIMIT, 0).results
          : [],
      };
    });
  }

  /**
   * Matches names across industries, best match quality first. Each industry uses its own resolved period.
   */
  async searchCompanies(
    query: string,
    request: CompanySearchRequest = {},
  ): QueryResult<CompanySearchResults> {
    const needle = normalizeCompanyName(query);
    if (!needle) {
      return err(invalidParameter("query", "Search query must not be empty."));
    }
    const { limit: requestedLimit, ...filter } = request;
    const limit = this.validateLimit(requestedLimit);
    if (limit.isErr()) {
      return err(limit.error);
    }
    const validFilter = this.validateFilter(filter);
    if (validFilter.isErr()) {
      return err(validFilter.error);
    }

    const reader = await this.dataSource.open();
    const industries = reader.listIndustries();
    const matches: CompanySearchMatch[] = [];

    for (const industry of industries) {
      // Industries without the requested period are skipped.
      const period = this.periodResolver.resolve(reader, { industry }, filter);
      if (period.isErr()) {
        continue;
      }
      const snapshot = reader.getSnapshot(industry, period.value);
      for (const entry of snapshot?.entries ?? []) {
        const quality = matchQuality(entry.company, needle);
        if (snapshot && quality) {
          const ranking = toCompanyRanking(snapshot, entry);
          matches.push({
            company: ranking.company,
            industry: ranking.industry,
            rank: ranking.rank,
            score: ranking.score,
            period: ranking.period,
            match: quality,
          });
        }
      }
    }

    matches.sort(
      (left, right) =>
        compareMatchQuality(left.match, right.match) ||
        compareText(
          normalizeCompanyName(left.company),
          normalizeCompanyName(right.company),
        ) ||
        industries.indexOf(left.industry) - industries.indexOf(right.industry) ||
        left.rank - right.rank,
    );

    return ok({
      query: query.trim(),
      limit: limit.value,
      results: matches.slice(0, limit.value),
    });
  }

  async getPeriods(industry?: string): QueryResult<PeriodsListing> {
    const reader = await this.dataSource.open();
    if (industry === undefined) {
      return ok({ industry: null, periods: reader.listPeriods() });
    }

    return this.resolveIndustry(reader, industry).map((canonical) => ({
      industry: canonical,
      periods: reader.listPeriods(canonical),
    }));
  }

  async discover(): QueryResult<DiscoverySchema> {
    const reader = await this.dataSource.open();
    const industries = reader.listIndustries();
    const periodsByIndustry: Record<string, Period[]> = {};
    for (const industry of industries) {
      periodsByIndustry[industry] = reader.listPeriods(industry);
    }

    const representative = industries[0];
    const latestSnapshots = industries
      .map((industry) => this.latestSnapshot(reader, industry))
      .filter((snapshot): snapshot is RankingSnapshot => snapshot !== null);
    const exampleSnapshot = latestSnapshots.find(
      (snapshot) => snapshot.entries.length > 0,
    );
    const exampleEntry = exampleSnapshot?.entries[0];
    const representativeSnapshot =
      representative === undefined
        ? null
        : this.latestSnapshot(reader, representative);

    return ok({
      industries,
      periodsByIndustry,
      examples: {
        overview:
          representative === undefined
            ? null
            : this.buildOverview(reader, representative),
        companyRanking:
          exampleSnapshot && exampleEntry
            ? toCompanyRanking(exampleSnapshot, exampleEntry)
            : null,
        topCompanies: representativeSnapshot
          ? toRankingsPage(representativeSnapshot, TOP_COMPANIES_LIMIT, 0)
              .results
          : [],
        periods: reader.listPeriods(),
      },
    });
  }

  /**
   * Finds a company by case-insensitive name within the given industries.
   * Every industry that lists the name contributes a match at its own resolved period.
   */
  private lookupCompany(
    reader: IndexReader,
    name: string,
    filter: PeriodFilter,
    industries: string[],
  ): Result<CompanyLookup, QueryError> {
    const needle = normalizeCompanyName(name);
    const matches: CompanyRanking[] = [];
    let periodFailure: QueryError | null = null;
    let listed = false;

    for (const industry of industries) {
      const appears = reader
        .listPeriods(industry)
        .some(
          (period) =>
            findCompanyEntry(reader.getSnapshot(industry, period), needle) !==
            null,
        );
      if (!appears) {
        continue;
      }
      listed = true;

      const period = this.periodResolver.resolve(
        reader,
        { industry, company: name.trim() },
        filter,
      );
      if (period.isErr()) {
        periodFailure ??= period.error;
        continue;
      }

      const snapshot = reader.getSnapshot(industry, period.value);
      const entry = findCompanyEntry(snapshot, needle);
      if (snapshot && entry) {
        matches.push(toCompanyRanking(snapshot, entry));
      }
    }

    const [first, ...rest] = matches;
    if (!first) {
      if (listed && periodFailure) {
        return err(periodFailure);
      }
      return err(companyNotFound(name.trim()));
    }
    if (rest.length === 0) {
      return ok({ kind: "unique", company: first });
    }
    return ok({ kind: "ambiguous", matches });
  }

  private resolveIndustry(
    reader: IndexReader,
    industry: string,
  ): Result<string, QueryError> {
    const needle = industry.trim().toUpperCase();
    if (!needle) {
      return err(invalidParameter("industry", "Industry must not be empty."));
    }

    const canonical = reader
      .listIndustries()
      .find((candidate) => candidate.toUpperCase() === needle);
    return canonical === undefined
      ? err(industryNotFound(industry.trim()))
      : ok(canonical);
  }

  private loadSnapshot(
    reader: IndexReader,
    industry: string,
    filter: PeriodFilter,
  ): Result<RankingSnapshot, QueryError> {
    return this.resolveIndustry(reader, industry).andThen((canonical) =>
      this.periodResolver
        .resolve(reader, { industry: canonical }, filter)
        .andThen((period): Result<RankingSnapshot, QueryError> => {
          const snapshot = reader.getSnapshot(canonical, period);
          return snapshot ? ok(snapshot) : err(periodNotFound(canonical, filter));
        }),
    );
  }

  private latestSnapshot(
    reader: IndexReader,
    industry: string,
  ): RankingSnapshot | null {
    const latest = reader.listPeriods(industry)[0];
    return latest ? reader.getSnapshot(industry, latest) : null;
  }

  /**
   * Summarizes the latest snapshot. Industries without ranking rows still return their published overview.
   */
  private buildOverview(
    reader: IndexReader,
    industry: string,
  ): IndustryOverview {
    const snapshot = this.latestSnapshot(reader, industry);
    const published = reader.getOverview(industry);

    return {
      industry,
      period: snapshot ? toPeriod(snapshot.period) : null,
      companyCount: snapshot?.entries.length ?? 0,
      score: snapshot ? summarizeScores(snapshot.entries) : null,
      leaders: snapshot
        ? toRankingsPage(snapshot, OVERVIEW_LEADERS_LIMIT, 0).results
        : [],
      published: published ? { ...published } : null,
    };
  }

  private validateLimit(limit: number | undefined): Result<number, QueryError> {
    if (limit === undefined) {
      return ok(DEFAULT_PAGE_LIMIT);
    }
    if (!Number.isInteger(limit) || limit <= 0) {
      return err(invalidParameter("limit", "Limit must be a positive integer."));
    }
    return ok(Math.min(limit, MAX_PAGE_LIMIT));
  }

  private validateFilter(filter: PeriodFilter): Result<PeriodFilter, QueryError> {
    const { year, month } = filter;
    if (year !== undefined && !Number.isInteger(year)) {
      return err(invalidParameter("year", "Year must be an integer."));
    }
    if (
      month !== undefined &&
      (!Number.isInteger(month) || month < 1 || month > 12)
    ) {
      return err(
        invalidParameter("month", "Month must be an integer between 1 and 12."),
      );
    }
    return ok(filter);
  }
}

const compareText = (left: string, right: string): number =>
  left < right ? -1 : left > right ? 1 : 0;
