import type { AppBoundaryError } from "../../core/entities/appError";
import {
  type FilingRecord,
  isFilingCategory,
} from "../../core/entities/filing";
import type { SelectionOptions } from "../../core/entities/selection";
import type {
  DocumentExtractorPort,
  FilingIndexPort,
  IdentifierResolverPort,
} from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  FilingWriterPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import {
  DEFAULT_ROLLING_YEARS,
  resolvePolicy,
  selectFilings,
} from "./filingSelector";

export type DownloadFilingRequest = SelectionOptions & {
  symbol: string;
  category: string;
};

export type DownloadOutcome = {
  success: boolean;
  written: string[];
  failures: AppBoundaryError[];
};

export type DownloadBatchRequest = {
  symbols: string[];
  categories: string[];
  years?: number[];
  quarter?: number;
  all?: boolean;
};

const VALID_QUARTERS = new Set([1, 2, 3, 4]);

const failed = (failure: AppBoundaryError): DownloadOutcome => ({
  success: false,
  written: [],
  failures: [failure],
});

/**
 * Runs resolve -> index -> select -> extract -> write for each unit, strictly one filing at a time.
 * A failing filing or symbol is reported and the run moves on.
 */
export class FilingDownloadService {
  constructor(
    private readonly resolver: IdentifierResolverPort,
    private readonly index: FilingIndexPort,
    private readonly extractor: DocumentExtractorPort,
    private readonly writer: FilingWriterPort,
    private readonly clock: ClockPort,
    private readonly rollingYears: number = DEFAULT_ROLLING_YEARS,
  ) {}

  async downloadFiling(request: DownloadFilingRequest): Promise<DownloadOutcome> {
    const symbol = request.symbol.trim().toUpperCase();
    const category = request.category.trim().toUpperCase();

    if (!isFilingCategory(category)) {
      return this.reportFailure(symbol, {
        source: "download",
        code: "validation_error",
        provider: "filing-download",
        message: `Filing type must be '10-K' or '10-Q', got '${request.category}'.`,
        retryable: false,
      });
    }

    if (
      category === "10-Q" &&
      request.quarter !== undefined &&
      !VALID_QUARTERS.has(request.quarter)
    ) {
      return this.reportFailure(symbol, {
        source: "download",
        code: "validation_error",
        provider: "filing-download",
        message: `Quarter must be 1-4, got ${request.quarter}.`,
        retryable: false,
      });
    }

    const cik = await this.resolver.resolveIdentifier(symbol);
    if (cik.isErr()) {
      return this.reportFailure(symbol, cik.error);
    }

    logger.info({ symbol, category, cik: cik.value }, "Processing filings");

    const listing = await this.index.listFilings(cik.value, category);
    if (listing.filings.length === 0) {
      logger.debug({ diagnostics: listing.diagnostics }, "Filing index returned nothing");
      return this.reportFailure(symbol, {
        source: "index",
        code: "index_unavailable",
        provider: listing.diagnostics.provider,
        message: `No ${category} filings found for ${symbol}.`,
        retryable: false,
        httpStatus: listing.diagnostics.httpStatus,
        cause: listing.diagnostics,
      });
    }

    const policy = resolvePolicy(
      {
        year: request.year,
        quarter: category === "10-Q" ? request.quarter : undefined,
        all: request.all,
      },
      this.rollingYears,
    );
    const selected = selectFilings(
      listing.filings,
      policy,
      this.clock.now().getUTCFullYear(),
    );

    if (selected.length === 0) {
      return this.reportFailure(symbol, {
        source: "selector",
        code: "no_match",
        provider: "filing-selector",
        message: `No matching ${category} filing found for ${symbol}.`,
        retryable: false,
        cause: policy,
      });
    }

    logger.info(
      { symbol, category, policy, selectedCount: selected.length },
      "Selected filings",
    );

    return this.downloadSelected(symbol, cik.value, selected);
  }

  /**
   * Expands symbols x categories x (years | rolling | all) into units keyed for the summary report.
   */
  async downloadBatch(
    request: DownloadBatchRequest,
  ): Promise<Record<string, boolean>> {
    const results: Record<string, boolean> = {};

    for (const rawSymbol of request.symbols) {
      const symbol = rawSymbol.trim().toUpperCase();

      for (const category of request.categories) {
        if (request.all) {
          const outcome = await this.downloadFiling({
            symbol,
            category,
            all: true,
          });
          results[`${symbol}-${category}-all`] = outcome.success;
          continue;
        }

        if (request.years && request.years.length > 0) {
          for (const year of request.years) {
            const outcome = await this.downloadFiling({
              symbol,
              category,
              year,
              quarter: request.quarter,
            });
            results[`${symbol}-${category}-${year}`] = outcome.success;
          }
          continue;
        }

        const outcome = await this.downloadFiling({ symbol, category });
        results[`${symbol}-${category}`] = outcome.success;
      }
    }

    return results;
  }

  private async downloadSelected(
    symbol: string,
    cik: string,
    selected: FilingRecord[],
  ): Promise<DownloadOutcome> {
    const written: string[] = [];
    const failures: AppBoundaryError[] = [];

    for (const record of selected) {
      logger.info(
        { symbol, accessionNumber: record.accessionNumber, filingDate: record.filingDate },
        "Downloading filing document",
      );

      const document = await this.extractor.extractDocument(cik, record);
      if (document.isErr()) {
        logger.warn(
          { symbol, filingDate: record.filingDate, error: document.error },
          "Failed to download filing document",
        );
        failures.push(document.error);
        continue;
      }

      const saved = await this.writer.writeFiling(document.value, symbol);
      if (saved.isErr()) {
        logger.warn(
          { symbol, filingDate: record.filingDate, error: saved.error },
          "Failed to save filing text",
        );
        failures.push(saved.error);
        continue;
      }

      logger.info({ symbol, path: saved.value }, "Saved filing text");
      written.push(saved.value);
    }

    return { success: failures.length === 0, written, failures };
  }

  private reportFailure(
    symbol: string,
    failure: AppBoundaryError,
  ): DownloadOutcome {
    logger.warn(
      {
        symbol,
        source: failure.source,
        code: failure.code,
        reason: failure.message,
        httpStatus: failure.httpStatus,
      },
      "Filing download failed",
    );
    return failed(failure);
  }
}
