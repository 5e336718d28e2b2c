import { FilingDownloadService } from "../services/filingDownloadService";
import { env, type OutputRoots } from "../../shared/config/env";
import { HttpClient } from "../../infra/http/httpClient";
import { SecDocumentExtractor } from "../../infra/providers/sec/secDocumentExtractor";
import { SecFilingIndexReader } from "../../infra/providers/sec/secFilingIndexReader";
import { SecIdentifierResolver } from "../../infra/providers/sec/secIdentifierResolver";
import { TextFileFilingWriter } from "../../infra/storage/textFileFilingWriter";
import { SystemClock, TimerSleeper } from "../../infra/system/systemPorts";
import { FixedIntervalThrottle } from "../../infra/throttle/fixedIntervalThrottle";

/**
 * Centralizes runtime wiring so every CLI command shares one composition root.
 */
export const createRuntime = (outputRoots: OutputRoots) => {
  const clock = new SystemClock();
  const httpClient = new HttpClient();

  const resolver = new SecIdentifierResolver(
    {
      tickersUrl: env.SEC_TICKERS_URL,
      archivesBaseUrl: env.SEC_ARCHIVES_BASE_URL,
      userAgent: env.SEC_USER_AGENT,
      timeoutMs: env.SEC_INDEX_TIMEOUT_MS,
      retries: env.SEC_HTTP_RETRIES,
    },
    httpClient,
  );

  const indexReader = new SecFilingIndexReader(
    {
      dataBaseUrl: env.SEC_DATA_BASE_URL,
      userAgent: env.SEC_USER_AGENT,
      timeoutMs: env.SEC_INDEX_TIMEOUT_MS,
      retries: env.SEC_HTTP_RETRIES,
    },
    httpClient,
  );

  const extractor = new SecDocumentExtractor(
    {
      archivesBaseUrl: env.SEC_ARCHIVES_BASE_URL,
      userAgent: env.SEC_USER_AGENT,
      listingTimeoutMs: env.SEC_INDEX_TIMEOUT_MS,
      documentTimeoutMs: env.SEC_DOCUMENT_TIMEOUT_MS,
      retries: env.SEC_HTTP_RETRIES,
      minContentLength: env.FILINGS_MIN_CONTENT_LENGTH,
    },
    new FixedIntervalThrottle(
      env.SEC_REQUEST_DELAY_MS,
      clock,
      new TimerSleeper(),
    ),
    httpClient,
  );

  const writer = new TextFileFilingWriter(outputRoots);

  const downloadService = new FilingDownloadService(
    resolver,
    indexReader,
    extractor,
    writer,
    clock,
    env.FILINGS_ROLLING_YEARS,
  );

  return {
    resolver,
    indexReader,
    extractor,
    writer,
    downloadService,
  };
};
