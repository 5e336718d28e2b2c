import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import {
  type ExtractedDocument,
  type FilingCategory,
  type FilingRecord,
  filingYear,
  reportQuarter,
} from "../../core/entities/filing";
import type { FilingWriterPort } from "../../core/ports/outboundPorts";

/**
 * Derives the deterministic output filename for one filing, or null when its dates cannot be parsed.
 */
export const buildFilingFilename = (
  symbol: string,
  record: FilingRecord,
): string | null => {
  const ticker = symbol.trim().toUpperCase();
  const year = filingYear(record);
  if (year === null) {
    return null;
  }

  if (record.category === "10-K") {
    return `10K-${ticker}-${year}.txt`;
  }

  const quarter = reportQuarter(record);
  if (quarter === null) {
    return null;
  }

  return `10Q-${ticker}-Q${quarter}${year}.txt`;
};

/**
 * Writes cleaned filing text under `{root}/{SYMBOL}/original/`, overwriting files with the same derived name.
 */
export class TextFileFilingWriter implements FilingWriterPort {
  constructor(private readonly outputRoots: Record<FilingCategory, string>) {}

  async writeFiling(
    document: ExtractedDocument,
    symbol: string,
  ): Promise<Result<string, AppBoundaryError>> {
    const ticker = symbol.trim().toUpperCase();
    const root = this.outputRoots[document.record.category];
    if (!root) {
      return err(
        this.failure(
          "config_invalid",
          `No output directory configured for ${document.record.category}.`,
        ),
      );
    }

    const filename = buildFilingFilename(ticker, document.record);
    if (!filename) {
      return err(
        this.failure(
          "write_failed",
          `Cannot derive a filename for ${document.record.accessionNumber} from its filing dates.`,
        ),
      );
    }

    const directory = path.join(root, ticker, "original");
    const outputPath = path.join(directory, filename);

    try {
      await mkdir(directory, { recursive: true });
      await writeFile(outputPath, document.text, "utf8");
      return ok(outputPath);
    } catch (error) {
      return err(
        this.failure(
          "write_failed",
          error instanceof Error ? error.message : "Writing filing text failed.",
          error,
        ),
      );
    }
  }

  private failure(
    code: AppBoundaryError["code"],
    message: string,
    cause?: unknown,
  ): AppBoundaryError {
    return {
      source: "writer",
      code,
      provider: "filesystem",
      message,
      retryable: false,
      cause,
    };
  }
}
