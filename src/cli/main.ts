import { Command, InvalidArgumentError } from "commander";
import type { Result } from "neverthrow";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import type { QueryError } from "../core/entities/queryError";
import { startServer, stopServer } from "../api/server";
import { env, warnIfApiKeyMissing } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

type PeriodOptions = { year?: number; month?: number };

const parseInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Expected an integer.");
  }
  return parsed;
};

const printResult = <T>(result: Result<T, QueryError>): void => {
  if (result.isErr()) {
    logger.warn({ error: result.error }, "Query failed");
    process.exitCode = 1;
    return;
  }
  console.log(JSON.stringify(result.value, null, 2));
};

const withPeriodOptions = (command: Command): Command =>
  command
    .option("--year <year>", "Snapshot year", parseInteger)
    .option("--month <month>", "Snapshot month (1-12)", parseInteger);

/**
 * Defines the `serve` entry point plus read-only commands that print query results as JSON.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("industry-index")
    .description("Industry ranking query API and CLI");

  cli
    .command("serve")
    .description("Start the authenticated HTTP API")
    .action(async () => {
      const runtime = createRuntime(env);
      warnIfApiKeyMissing(env, (message) => logger.warn(message));

      try {
        await runtime.dataSource.open();
      } catch (error) {
        logger.warn(
          { err: error },
          "Initial dataset load failed; requests will retry",
        );
      }

      const server = await startServer(runtime);
      logger.info(
        { host: env.HOST, port: env.PORT, source: env.INDEX_SOURCE },
        "HTTP API listening",
      );

      const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, "Shutting down");
        stopServer(server)
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            logger.error({ err: error }, "Server close failed");
            process.exit(1);
          });
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

  cli
    .command("industries")
    .description("List industries")
    .action(async () => {
      const { queryService } = createRuntime(env);
      printResult(await queryService.listIndustries());
    });

  cli
    .command("periods")
    .description("List available periods, newest first")
    .option("--industry <industry>", "Restrict to one industry")
    .action(async (opts: { industry?: string }) => {
      const { queryService } = createRuntime(env);
      printResult(await queryService.getPeriods(opts.industry));
    });

  withPeriodOptions(
    cli
      .command("company")
      .description("Look up one company")
      .requiredOption("--name <name>", "Company name"),
  ).action(async (opts: PeriodOptions & { name: string }) => {
    const { queryService } = createRuntime(env);
    const { name, ...filter } = opts;
    printResult(await queryService.getCompany(name, filter));
  });

  withPeriodOptions(
    cli
      .command("rankings")
      .description("Print one page of an industry ranking")
      .requiredOption("--industry <industry>", "Industry name")
      .option("--limit <limit>", "Page size", parseInteger)
      .option("--offset <offset>", "Zero-based start position", parseInteger),
  ).action(
    async (
      opts: PeriodOptions & { industry: string; limit?: number; offset?: number },
    ) => {
      const { queryService } = createRuntime(env);
      const { industry, ...request } = opts;
      printResult(await queryService.getRankings(industry, request));
    },
  );

  withPeriodOptions(
    cli
      .command("search")
      .description("Search company names across industries")
      .requiredOption("--query <query>", "Name fragment")
      .option("--limit <limit>", "Maximum results", parseInteger),
  ).action(async (opts: PeriodOptions & { query: string; limit?: number }) => {
    const { queryService } = createRuntime(env);
    const { query, ...request } = opts;
    printResult(await queryService.searchCompanies(query, request));
  });

  cli
    .command("discover")
    .description("Print industries, periods and example payloads")
    .action(async () => {
      const { queryService } = createRuntime(env);
      printResult(await queryService.discover());
    });

  return cli;
};

export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
