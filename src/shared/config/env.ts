import "dotenv/config";
import { z } from "zod";
import {
  type FilingCategory,
  isFilingCategory,
} from "../../core/entities/filing";

const optionalPath = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  APP_SYMBOLS: z.string().default("AAPL"),
  APP_FILING_TYPES: z.string().default("10-K,10-Q"),
  SEC_USER_AGENT: z
    .string()
    .default("filing-text-harvester/1.0 (contact: devnull@example.com)"),
  SEC_TICKERS_URL: z
    .string()
    .default("https://www.sec.gov/files/company_tickers.json"),
  SEC_DATA_BASE_URL: z.string().default("https://data.sec.gov"),
  SEC_ARCHIVES_BASE_URL: z.string().default("https://www.sec.gov"),
  SEC_INDEX_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SEC_DOCUMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  SEC_REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  SEC_HTTP_RETRIES: z.coerce.number().int().nonnegative().default(0),
  FILINGS_ROLLING_YEARS: z.coerce.number().int().positive().default(10),
  FILINGS_MIN_CONTENT_LENGTH: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(5_000),
  OUTPUT_DIR: optionalPath,
  OUTPUT_DIR_10K: optionalPath,
  OUTPUT_DIR_10Q: optionalPath,
});

export type AppEnv = z.infer<typeof envSchema>;

export const env: AppEnv = envSchema.parse(process.env);

const splitList = (raw: string): string[] =>
  raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

/**
 * Normalizes configured symbols once so batch runs stay deterministic across environments.
 */
export const appSymbols = (raw: string = env.APP_SYMBOLS): string[] =>
  Array.from(new Set(splitList(raw).map((item) => item.toUpperCase())));

/**
 * Keeps only recognised form types; unknown entries are dropped rather than failing the run.
 */
export const appFilingTypes = (
  raw: string = env.APP_FILING_TYPES,
): FilingCategory[] =>
  Array.from(
    new Set(
      splitList(raw)
        .map((item) => item.toUpperCase())
        .filter(isFilingCategory),
    ),
  );

export type OutputRootOverrides = {
  output?: string;
  output10k?: string;
  output10q?: string;
};

export type OutputRoots = Record<FilingCategory, string>;

/**
 * Resolves one output root per form type. A per-type directory wins over the shared one.
 * Throws when a requested form type ends up without a directory.
 */
export const resolveOutputRoots = (
  categories: FilingCategory[],
  overrides: OutputRootOverrides = {},
  appEnv: AppEnv = env,
): OutputRoots => {
  const shared = overrides.output ?? appEnv.OUTPUT_DIR;
  const annual = overrides.output10k ?? appEnv.OUTPUT_DIR_10K ?? shared;
  const quarterly = overrides.output10q ?? appEnv.OUTPUT_DIR_10Q ?? shared;

  const missing = categories.filter((category) =>
    category === "10-K" ? !annual : !quarterly,
  );
  if (missing.length > 0) {
    throw new Error(
      `No output directory configured for ${missing.join(", ")}. Set OUTPUT_DIR, or OUTPUT_DIR_10K and OUTPUT_DIR_10Q.`,
    );
  }

  return {
    "10-K": annual ?? "",
    "10-Q": quarterly ?? "",
  };
};
