import { z } from "zod";
import type {
  FilingCategory,
  FilingRecord,
} from "../../../core/entities/filing";
import type {
  FilingIndexDiagnostics,
  FilingIndexPort,
  FilingIndexResult,
} from "../../../core/ports/inboundPorts";
import { HttpClient } from "../../http/httpClient";

const stringColumn = z.array(z.string().nullable()).optional();

const submissionSchema = z.object({
  filings: z
    .object({
      recent: z
        .object({
          form: stringColumn,
          accessionNumber: stringColumn,
          filingDate: stringColumn,
          reportDate: stringColumn,
        })
        .optional(),
    })
    .optional(),
});

type RecentFilings = NonNullable<
  NonNullable<z.infer<typeof submissionSchema>["filings"]>["recent"]
>;

export type SecFilingIndexReaderConfig = {
  dataBaseUrl: string;
  userAgent: string;
  timeoutMs?: number;
  retries?: number;
};

/**
 * Converts the submissions record's parallel arrays into filing records once, at the boundary.
 * Positions with a missing companion value are skipped.
 */
export const toFilingRecords = (
  recent: RecentFilings,
  category: FilingCategory,
): FilingRecord[] => {
  const forms = recent.form ?? [];
  const accessionNumbers = recent.accessionNumber ?? [];
  const filingDates = recent.filingDate ?? [];
  const reportDates = recent.reportDate ?? [];

  const records: FilingRecord[] = [];

  forms.forEach((form, index) => {
    if (form !== category) {
      return;
    }

    const accessionNumber = accessionNumbers[index];
    const filingDate = filingDates[index];
    const reportDate = reportDates[index];

    if (
      typeof accessionNumber !== "string" ||
      typeof filingDate !== "string" ||
      typeof reportDate !== "string"
    ) {
      return;
    }

    records.push({ accessionNumber, filingDate, reportDate, category });
  });

  return records;
};

/**
 * Reads the recent-filings section of a company's EDGAR submissions record.
 * Older paginated sections are not followed.
 */
export class SecFilingIndexReader implements FilingIndexPort {
  constructor(
    private readonly config: SecFilingIndexReaderConfig,
    private readonly httpClient = new HttpClient(),
  ) {
    if (!this.config.userAgent.trim()) {
      throw new Error("SEC_USER_AGENT is required for SEC EDGAR requests.");
    }
  }

  /**
   * Never fails: transport or payload problems surface as an "unavailable" diagnostic with no filings.
   */
  async listFilings(
    cik: string,
    category: FilingCategory,
  ): Promise<FilingIndexResult> {
    const diagnostics = (
      status: FilingIndexDiagnostics["status"],
      recordCount: number,
      extra: Pick<FilingIndexDiagnostics, "errorCode" | "reason" | "httpStatus"> = {},
    ): FilingIndexDiagnostics => ({
      provider: "sec-edgar",
      cik,
      category,
      status,
      recordCount,
      ...extra,
    });

    const url = new URL(
      `/submissions/CIK${cik}.json`,
      this.config.dataBaseUrl,
    ).toString();

    const response = await this.httpClient.requestJson({
      url,
      timeoutMs: this.config.timeoutMs ?? 10_000,
      retries: this.config.retries ?? 0,
      retryDelayMs: 300,
      headers: {
        "User-Agent": this.config.userAgent,
        Accept: "application/json",
      },
    });

    if (response.isErr()) {
      return {
        filings: [],
        diagnostics: diagnostics("unavailable", 0, {
          errorCode: response.error.code,
          reason: response.error.message,
          httpStatus: response.error.httpStatus,
        }),
      };
    }

    const parsed = submissionSchema.safeParse(response.value);
    if (!parsed.success) {
      return {
        filings: [],
        diagnostics: diagnostics("unavailable", 0, {
          errorCode: "malformed_response",
          reason: "SEC submissions payload was malformed.",
        }),
      };
    }

    const recent = parsed.data.filings?.recent;
    const filings = recent ? toFilingRecords(recent, category) : [];

    return {
      filings,
      diagnostics: diagnostics(filings.length > 0 ? "ok" : "empty", filings.length),
    };
  }
}
