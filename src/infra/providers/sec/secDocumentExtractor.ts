import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  ExtractedDocument,
  FilingRecord,
} from "../../../core/entities/filing";
import type { DocumentExtractorPort } from "../../../core/ports/inboundPorts";
import { logger } from "../../../shared/logger/logger";
import { HttpClient, type HttpClientError } from "../../http/httpClient";
import type { FixedIntervalThrottle } from "../../throttle/fixedIntervalThrottle";
import { cleanFilingHtml, MIN_CONTENT_LENGTH } from "./filingTextCleaner";
import { selectPrimaryDocument } from "./primaryDocument";
import { filingDirectoryUrl } from "./secPaths";

export type SecDocumentExtractorConfig = {
  archivesBaseUrl: string;
  userAgent: string;
  listingTimeoutMs?: number;
  documentTimeoutMs?: number;
  retries?: number;
  minContentLength?: number;
};

/**
 * Locates a filing's primary document in its archive directory and reduces it to cleaned text.
 * Every failure comes back as an extractor error; nothing is thrown past this boundary.
 */
export class SecDocumentExtractor implements DocumentExtractorPort {
  constructor(
    private readonly config: SecDocumentExtractorConfig,
    private readonly throttle: FixedIntervalThrottle,
    private readonly httpClient = new HttpClient(),
  ) {
    if (!this.config.userAgent.trim()) {
      throw new Error("SEC_USER_AGENT is required for SEC EDGAR requests.");
    }
  }

  async extractDocument(
    cik: string,
    record: FilingRecord,
  ): Promise<Result<ExtractedDocument, AppBoundaryError>> {
    try {
      return await this.extract(cik, record);
    } catch (error) {
      return err(
        this.failure(
          "extraction_failed",
          error instanceof Error ? error.message : "Filing extraction failed.",
          { cause: error },
        ),
      );
    }
  }

  private async extract(
    cik: string,
    record: FilingRecord,
  ): Promise<Result<ExtractedDocument, AppBoundaryError>> {
    await this.throttle.acquire();

    const directoryUrl = filingDirectoryUrl(
      this.config.archivesBaseUrl,
      cik,
      record.accessionNumber,
    );

    const listing = await this.fetchText(
      directoryUrl,
      this.config.listingTimeoutMs ?? 10_000,
    );
    if (listing.isErr()) {
      return err(this.fromHttpError("Filing directory listing", listing.error));
    }

    const documentUrl = selectPrimaryDocument(
      listing.value,
      this.config.archivesBaseUrl,
    );
    if (!documentUrl) {
      return err(
        this.failure(
          "extraction_failed",
          `No HTML document found in ${directoryUrl}.`,
        ),
      );
    }

    logger.debug(
      { accessionNumber: record.accessionNumber, documentUrl },
      "Selected primary filing document",
    );

    const html = await this.fetchText(
      documentUrl,
      this.config.documentTimeoutMs ?? 15_000,
    );
    if (html.isErr()) {
      return err(this.fromHttpError("Primary document", html.error));
    }

    const text = cleanFilingHtml(html.value);
    const minLength = this.config.minContentLength ?? MIN_CONTENT_LENGTH;
    if (text.length <= minLength) {
      return err(
        this.failure(
          "content_too_short",
          `Cleaned text for ${record.accessionNumber} has ${text.length} characters; more than ${minLength} required.`,
        ),
      );
    }

    return ok({ record, text, sourceUrl: documentUrl });
  }

  /**
   * Issues one throttled GET and records it so the next extraction waits its interval.
   */
  private async fetchText(
    url: string,
    timeoutMs: number,
  ): Promise<Result<string, HttpClientError>> {
    const response = await this.httpClient.requestText({
      url,
      timeoutMs,
      retries: this.config.retries ?? 0,
      retryDelayMs: 300,
      headers: { "User-Agent": this.config.userAgent },
    });
    this.throttle.markIssued();
    return response;
  }

  private fromHttpError(
    what: string,
    error: HttpClientError,
  ): AppBoundaryError {
    return this.failure(
      error.code === "timeout" ? "timeout" : "extraction_failed",
      `${what} request failed: ${error.message}`,
      {
        httpStatus: error.httpStatus,
        retryable: error.retryable,
        cause: error.cause,
      },
    );
  }

  private failure(
    code: AppBoundaryError["code"],
    message: string,
    extra: Pick<AppBoundaryError, "httpStatus" | "cause"> & {
      retryable?: boolean;
    } = {},
  ): AppBoundaryError {
    return {
      source: "extractor",
      code,
      provider: "sec-edgar",
      message,
      retryable: extra.retryable ?? false,
      httpStatus: extra.httpStatus,
      cause: extra.cause,
    };
  }
}
