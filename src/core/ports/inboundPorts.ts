import type { Result } from "neverthrow";
import type { AppBoundaryError, AppBoundaryErrorCode } from "../entities/appError";
import type {
  ExtractedDocument,
  FilingCategory,
  FilingRecord,
} from "../entities/filing";

export type FilingIndexStatus = "ok" | "empty" | "unavailable";

export type FilingIndexDiagnostics = {
  provider: string;
  cik: string;
  category: FilingCategory;
  status: FilingIndexStatus;
  recordCount: number;
  errorCode?: AppBoundaryErrorCode;
  reason?: string;
  httpStatus?: number;
};

/**
 * Keeps "no filings" and "index unreachable" distinguishable in diagnostics even though callers treat both as empty.
 */
export type FilingIndexResult = {
  filings: FilingRecord[];
  diagnostics: FilingIndexDiagnostics;
};

export type BulkIdentifierTableStatus =
  | { status: "pending" }
  | { status: "loaded"; count: number }
  | { status: "empty" }
  | { status: "failed"; reason: string; httpStatus?: number };

export interface IdentifierResolverPort {
  resolveIdentifier(symbol: string): Promise<Result<string, AppBoundaryError>>;
}

export interface FilingIndexPort {
  listFilings(cik: string, category: FilingCategory): Promise<FilingIndexResult>;
}

export interface DocumentExtractorPort {
  extractDocument(
    cik: string,
    record: FilingRecord,
  ): Promise<Result<ExtractedDocument, AppBoundaryError>>;
}
