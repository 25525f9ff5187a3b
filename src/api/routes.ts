import { Router, type Request, type RequestHandler, type Response } from "express";
import type { IndustryQueryPort } from "../core/ports/inboundPorts";
import { sendResult, sendValidationError } from "./errorResponses";
import {
  companiesBatchBodySchema,
  companyHistoryQuerySchema,
  companyQuerySchema,
  periodQuerySchema,
  periodsQuerySchema,
  rankingsQuerySchema,
  rankParamsSchema,
  searchQuerySchema,
} from "./requestSchemas";

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

const route =
  (handler: AsyncRoute): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

/**
 * Maps each HTTP endpoint onto one query operation. Handlers only parse input and pick a status code.
 */
export const buildQueryRouter = (queries: IndustryQueryPort): Router => {
  const router = Router();

  router.get(
    "/industries",
    route(async (_req, res) => {
      const result = await queries.listIndustries();
      sendResult(
        res,
        result.map((industries) => ({ industries })),
      );
    }),
  );

  router.get(
    "/industry/:industry/companies",
    route(async (req, res) => {
      const query = periodQuerySchema.safeParse(req.query);
      if (!query.success) {
        sendValidationError(res, query.error);
        return;
      }
      sendResult(
        res,
        await queries.listCompanies(req.params.industry ?? "", query.data),
      );
    }),
  );

  router.get(
    "/company",
    route(async (req, res) => {
      const query = companyQuerySchema.safeParse(req.query);
      if (!query.success) {
        sendValidationError(res, query.error);
        return;
      }
      const { name, ...filter } = query.data;
      sendResult(res, await queries.getCompany(name, filter));
    }),
  );

  router.get(
    "/company/history",
    route(async (req, res) => {
      const query = companyHistoryQuerySchema.safeParse(req.query);
      if (!query.success) {
        sendValidationError(res, query.error);
        return;
      }
      sendResult(res, await queries.getCompanyHistory(query.data.name));
    }),
  );

  router.post(
    "/companies",
    route(async (req, res) => {
      const body = companiesBatchBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        sendValidationError(res, body.error);
        return;
      }
      const { companies, ...rest } = body.data;
      sendResult(
        res,
        await queries.getCompaniesBatch({ names: companies, ...rest }),
      );
    }),
  );

  router.get(
    "/industry/:industry/rank/:rank",
    route(async (req, res) => {
      const params = rankParamsSchema.safeParse(req.params);
      const query = periodQuerySchema.safeParse(req.query);
      if (!params.success) {
        sendValidationError(res, params.error);
        return;
      }
      if (!query.success) {
        sendValidationError(res, query.error);
        return;
      }
      sendResult(
        res,
        await queries.getRank(
          req.params.industry ?? "",
          params.data.rank,
          query.data,
        ),
      );
    }),
  );

  router.get(
    "/industry/:industry/rankings",
    route(async (req, res) => {
      const query = rankingsQuerySchema.safeParse(req.query);
      if (!query.success) {
        sendValidationError(res, query.error);
        return;
      }
      sendResult(
        res,
        await queries.getRankings(req.params.industry ?? "", query.data),
      );
    }),
  );

  router.get(
    "/industry/:industry/overview",
    route(async (req, res) => {
      sendResult(res, await queries.getOverview(req.params.industry ?? ""));
    }),
  );

  router.get(
    "/industry/:industry/top-companies",
    route(async (req, res) => {
      sendResult(res, await queries.getTopCompanies(req.params.industry ?? ""));
    }),
  );

  router.get(
    "/search/companies",
    route(async (req, res) => {
      const query = searchQuerySchema.safeParse(req.query);
      if (!query.success) {
        sendValidationError(res, query.error);
        return;
      }
      const { company, ...request } = query.data;
      sendResult(res, await queries.searchCompanies(company, request));
    }),
  );

  router.get(
    "/periods",
    route(async (req, res) => {
      const query = periodsQuerySchema.safeParse(req.query);
      if (!query.success) {
        sendValidationError(res, query.error);
        return;
      }
      sendResult(res, await queries.getPeriods(query.data.industry));
    }),
  );

  router.get(
    "/discover",
    route(async (_req, res) => {
      sendResult(res, await queries.discover());
    }),
  );

  return router;
};
