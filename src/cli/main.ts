import { Command, InvalidArgumentError } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import {
  appFilingTypes,
  appSymbols,
  env,
  resolveOutputRoots,
} from "../shared/config/env";
import { logger } from "../shared/logger/logger";

type DownloadOptions = {
  symbols?: string;
  types?: string;
  years?: string;
  quarter?: number;
  all?: boolean;
  output?: string;
  output10k?: string;
  output10q?: string;
  prettify?: boolean;
};

const parseYears = (raw: string): number[] =>
  raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean)
    .map((item) => {
      if (!/^\d{4}$/.test(item)) {
        throw new InvalidArgumentError(`'${item}' is not a four-digit year.`);
      }
      return Number.parseInt(item, 10);
    });

export const parseQuarter = (raw: string): number => {
  const trimmed = raw.trim();
  if (!/^[1-4]$/.test(trimmed)) {
    throw new InvalidArgumentError("Quarter must be 1, 2, 3 or 4.");
  }
  return Number.parseInt(trimmed, 10);
};

/**
 * Formats batch results into a compact terminal report for manual inspection.
 */
export const formatSummaryReport = (results: Record<string, boolean>): string => {
  const lines: string[] = ["Download summary:"];

  const entries = Object.entries(results);
  if (entries.length === 0) {
    lines.push("- none");
  }

  entries.forEach(([key, success]) => {
    lines.push(`${key}: ${success ? "✓ Success" : "✗ Failed"}`);
  });

  return lines.join("\n");
};

/**
 * Defines a single command surface so batch downloads and diagnostics share the same configuration.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("filing-text-harvester")
    .description("Download SEC 10-K and 10-Q filings as cleaned plain text");

  cli
    .command("download")
    .description("Download filings for one or more ticker symbols")
    .option("--symbols <symbols>", "Comma-separated ticker symbols")
    .option("--types <types>", "Comma-separated form types (10-K,10-Q)")
    .option("--years <years>", "Comma-separated filing years")
    .option("--quarter <quarter>", "Report-date quarter (1-4) for 10-Q filings", parseQuarter)
    .option("--all", "Download every filing in the recent index")
    .option("--output <dir>", "Shared output directory")
    .option("--output-10k <dir>", "Output directory for 10-K filings")
    .option("--output-10q <dir>", "Output directory for 10-Q filings")
    .option("--prettify", "Print a human-friendly summary")
    .action(async (opts: DownloadOptions) => {
      const symbols = appSymbols(opts.symbols ?? env.APP_SYMBOLS);
      const categories = appFilingTypes(opts.types ?? env.APP_FILING_TYPES);
      const years = opts.years ? parseYears(opts.years) : undefined;

      if (symbols.length === 0 || categories.length === 0) {
        throw new Error("At least one symbol and one form type (10-K or 10-Q) are required.");
      }

      const outputRoots = resolveOutputRoots(categories, {
        output: opts.output,
        output10k: opts.output10k,
        output10q: opts.output10q,
      });

      const runtime = createRuntime(outputRoots);
      logger.info(
        { symbols, categories, years, quarter: opts.quarter, all: Boolean(opts.all), outputRoots },
        "Batch download started",
      );

      const results = await runtime.downloadService.downloadBatch({
        symbols,
        categories,
        years,
        quarter: opts.quarter,
        all: Boolean(opts.all),
      });

      if (opts.prettify) {
        console.log(formatSummaryReport(results));
      } else {
        logger.info({ results }, "Batch download finished");
      }

      if (Object.values(results).some((success) => !success)) {
        process.exitCode = 1;
      }
    });

  cli
    .command("status")
    .description("Report effective configuration")
    .action(() => {
      logger.info(
        {
          symbols: appSymbols(),
          filingTypes: appFilingTypes(),
          secUserAgentConfigured: env.SEC_USER_AGENT.trim().length > 0,
          tickersUrl: env.SEC_TICKERS_URL,
          dataBaseUrl: env.SEC_DATA_BASE_URL,
          archivesBaseUrl: env.SEC_ARCHIVES_BASE_URL,
          requestDelayMs: env.SEC_REQUEST_DELAY_MS,
          rollingYears: env.FILINGS_ROLLING_YEARS,
          minContentLength: env.FILINGS_MIN_CONTENT_LENGTH,
          outputDir: env.OUTPUT_DIR ?? null,
          outputDir10k: env.OUTPUT_DIR_10K ?? null,
          outputDir10q: env.OUTPUT_DIR_10Q ?? null,
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
