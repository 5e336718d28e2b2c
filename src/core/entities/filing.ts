export const FILING_CATEGORIES = ["10-K", "10-Q"] as const;

/**
 * Form type as it appears in the EDGAR submissions index. 10-K is the annual report, 10-Q the quarterly one.
 */
export type FilingCategory = (typeof FILING_CATEGORIES)[number];

export const isFilingCategory = (value: string): value is FilingCategory =>
  FILING_CATEGORIES.some((category) => category === value);

/**
 * One filing as listed in a company's submissions history.
 * Dates stay in the index's `YYYY-MM-DD` form so unparseable values can be dropped at selection time.
 */
export type FilingRecord = Readonly<{
  accessionNumber: string;
  filingDate: string;
  reportDate: string;
  category: FilingCategory;
}>;

export type ExtractedDocument = Readonly<{
  record: FilingRecord;
  text: string;
  sourceUrl: string;
}>;

const parseIntegerSlice = (
  value: string,
  start: number,
  end: number,
): number | null => {
  const slice = value.slice(start, end);
  if (!/^\d+$/.test(slice)) {
    return null;
  }

  return Number.parseInt(slice, 10);
};

export const filingYear = (record: FilingRecord): number | null =>
  parseIntegerSlice(record.filingDate, 0, 4);

export const reportMonth = (record: FilingRecord): number | null =>
  parseIntegerSlice(record.reportDate, 5, 7);

/**
 * Buckets a calendar month into its quarter. Fiscal calendars are not modelled.
 */
export const deriveQuarter = (month: number): number =>
  Math.floor((month - 1) / 3) + 1;

export const reportQuarter = (record: FilingRecord): number | null => {
  const month = reportMonth(record);
  return month === null ? null : deriveQuarter(month);
};
