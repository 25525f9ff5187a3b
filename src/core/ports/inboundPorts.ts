import type { Result } from "neverthrow";
import type { PeriodFilter } from "../entities/period";
import type { QueryError } from "../entities/queryError";
import type {
  CompaniesBatch,
  CompanyHistory,
  CompanyRanking,
  CompanyLookup,
  CompanySearchResults,
  DiscoverySchema,
  IndustryCompanies,
  IndustryOverview,
  PeriodsListing,
  RankingsPage,
  TopCompanies,
} from "../entities/industry";

export type QueryResult<T> = Promise<Result<T, QueryError>>;

export type RankingsRequest = PeriodFilter & {
  limit?: number;
  offset?: number;
};

export type CompanySearchRequest = PeriodFilter & {
  limit?: number;
};

export type CompaniesBatchRequest = PeriodFilter & {
  names: string[];
  industry?: string;
};

/**
 * Read operations the transport layer calls with already-parsed arguments.
 */
export interface IndustryQueryPort {
  listIndustries(): QueryResult<string[]>;
  listCompanies(
    industry: string,
    filter?: PeriodFilter,
  ): QueryResult<IndustryCompanies>;
  getCompany(name: string, filter?: PeriodFilter): QueryResult<CompanyLookup>;
  getCompanyHistory(name: string): QueryResult<CompanyHistory>;
  getCompaniesBatch(request: CompaniesBatchRequest): QueryResult<CompaniesBatch>;
  getRank(
    industry: string,
    rank: number,
    filter?: PeriodFilter,
  ): QueryResult<CompanyRanking>;
  getRankings(
    industry: string,
    request?: RankingsRequest,
  ): QueryResult<RankingsPage>;
  getOverview(industry: string): QueryResult<IndustryOverview>;
  getTopCompanies(industry: string): QueryResult<TopCompanies>;
  searchCompanies(
    query: string,
    request?: CompanySearchRequest,
  ): QueryResult<CompanySearchResults>;
  getPeriods(industry?: string): QueryResult<PeriodsListing>;
  discover(): QueryResult<DiscoverySchema>;
}
