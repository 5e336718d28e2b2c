import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  BulkIdentifierTableStatus,
  IdentifierResolverPort,
} from "../../../core/ports/inboundPorts";
import { logger } from "../../../shared/logger/logger";
import { HttpClient, type HttpClientError } from "../../http/httpClient";
import { normalizeCik } from "./secPaths";

const tickerRecordSchema = z.object({
  ticker: z.string(),
  cik_str: z.union([z.number().int(), z.string().regex(/^\d+$/)]),
});

const tickersResponseSchema = z.record(z.string(), z.unknown());

const SEARCH_CIK_PATTERN = /CIK=(\d+)/;

export type SecIdentifierResolverConfig = {
  tickersUrl: string;
  archivesBaseUrl: string;
  userAgent: string;
  timeoutMs?: number;
  retries?: number;
};

/**
 * Maps ticker symbols to zero-padded CIKs using the bulk SEC ticker table, with a company-search fallback.
 * The cache belongs to the instance so independent runs never share lookups.
 */
export class SecIdentifierResolver implements IdentifierResolverPort {
  private readonly symbolToCik = new Map<string, string>();
  private bulkTable: BulkIdentifierTableStatus = { status: "pending" };
  private bulkLoad: Promise<void> | null = null;

  constructor(
    private readonly config: SecIdentifierResolverConfig,
    private readonly httpClient = new HttpClient(),
  ) {
    if (!this.config.userAgent.trim()) {
      throw new Error("SEC_USER_AGENT is required for SEC EDGAR requests.");
    }
  }

  bulkTableStatus(): BulkIdentifierTableStatus {
    return this.bulkTable;
  }

  async resolveIdentifier(
    symbol: string,
  ): Promise<Result<string, AppBoundaryError>> {
    const normalized = symbol.trim().toUpperCase();
    if (!normalized) {
      return err({
        source: "resolver",
        code: "validation_error",
        provider: "sec-edgar",
        message: "Identifier resolution requires a non-empty symbol.",
        retryable: false,
      });
    }

    await this.ensureBulkTable();

    const cached = this.symbolToCik.get(normalized);
    if (cached) {
      return ok(cached);
    }

    const searched = await this.searchCik(normalized);
    if (searched.isErr()) {
      logger.warn(
        { symbol: normalized, reason: searched.error.message },
        "SEC company search failed",
      );
      return err({
        source: "resolver",
        code: "resolution_failed",
        provider: "sec-edgar",
        message: `Could not find CIK for ticker ${normalized}.`,
        retryable: false,
        httpStatus: searched.error.httpStatus,
        cause: searched.error,
      });
    }

    if (!searched.value) {
      return err({
        source: "resolver",
        code: "resolution_failed",
        provider: "sec-edgar",
        message: `Could not find CIK for ticker ${normalized}.`,
        retryable: false,
      });
    }

    this.symbolToCik.set(normalized, searched.value);
    return ok(searched.value);
  }

  private async ensureBulkTable(): Promise<void> {
    if (!this.bulkLoad) {
      this.bulkLoad = this.loadBulkTable();
    }

    await this.bulkLoad;
  }

  /**
   * Degrades to an empty table on any failure; the fallback search still runs per symbol.
   */
  private async loadBulkTable(): Promise<void> {
    logger.info({ url: this.config.tickersUrl }, "Loading SEC CIK lookup table");

    const response = await this.httpClient.requestJson({
      url: this.config.tickersUrl,
      timeoutMs: this.config.timeoutMs ?? 10_000,
      retries: this.config.retries ?? 0,
      retryDelayMs: 300,
      headers: {
        "User-Agent": this.config.userAgent,
        Accept: "application/json",
      },
    });

    if (response.isErr()) {
      this.bulkTable = {
        status: "failed",
        reason: response.error.message,
        httpStatus: response.error.httpStatus,
      };
      logger.warn(
        { reason: response.error.message, httpStatus: response.error.httpStatus },
        "Could not load CIK lookup; continuing with an empty table",
      );
      return;
    }

    const parsed = tickersResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      this.bulkTable = {
        status: "failed",
        reason: "SEC ticker mapping payload was malformed.",
      };
      logger.warn(
        { reason: parsed.error.message },
        "Could not load CIK lookup; continuing with an empty table",
      );
      return;
    }

    let loaded = 0;
    for (const value of Object.values(parsed.data)) {
      const record = tickerRecordSchema.safeParse(value);
      if (!record.success) {
        continue;
      }

      const ticker = record.data.ticker.trim().toUpperCase();
      const cik = normalizeCik(String(record.data.cik_str));
      if (!ticker || !cik) {
        continue;
      }

      this.symbolToCik.set(ticker, cik);
      loaded += 1;
    }

    this.bulkTable =
      loaded > 0 ? { status: "loaded", count: loaded } : { status: "empty" };
    logger.info({ count: loaded }, "Loaded company tickers");
  }

  private async searchCik(
    symbol: string,
  ): Promise<Result<string | null, HttpClientError>> {
    const url = new URL("/cgi-bin/browse-edgar", this.config.archivesBaseUrl);
    url.search = new URLSearchParams({
      action: "getcompany",
      company: symbol,
      type: "",
      dateb: "",
      owner: "exclude",
      count: "100",
      search_text: "",
      CIK: "",
      myHID: "",
    }).toString();

    const response = await this.httpClient.requestText({
      url: url.toString(),
      timeoutMs: this.config.timeoutMs ?? 10_000,
      retries: this.config.retries ?? 0,
      retryDelayMs: 300,
      headers: { "User-Agent": this.config.userAgent },
    });

    if (response.isErr()) {
      return err(response.error);
    }

    const match = SEARCH_CIK_PATTERN.exec(response.value);
    const digits = match?.[1];
    return ok(digits ? normalizeCik(digits) : null);
  }
}
