import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { ExtractedDocument } from "../entities/filing";

export interface FilingWriterPort {
  writeFiling(
    document: ExtractedDocument,
    symbol: string,
  ): Promise<Result<string, AppBoundaryError>>;
}

export interface ClockPort {
  now(): Date;
}

export interface SleeperPort {
  sleep(ms: number): Promise<void>;
}
