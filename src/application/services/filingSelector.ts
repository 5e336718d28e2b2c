import {
  type FilingRecord,
  filingYear,
  reportQuarter,
} from "../../core/entities/filing";
import type {
  SelectionOptions,
  SelectionPolicy,
} from "../../core/entities/selection";

export const DEFAULT_ROLLING_YEARS = 10;

/**
 * Builds the single active policy for a download. "all" wins, then an explicit year, else the rolling window.
 */
export const resolvePolicy = (
  options: SelectionOptions,
  rollingYears: number = DEFAULT_ROLLING_YEARS,
): SelectionPolicy => {
  if (options.all) {
    return { kind: "all" };
  }

  if (options.year !== undefined) {
    return options.quarter === undefined
      ? { kind: "year", year: options.year }
      : { kind: "year", year: options.year, quarter: options.quarter };
  }

  return { kind: "rolling", years: rollingYears };
};

const yearsToInclude = (
  policy: Exclude<SelectionPolicy, { kind: "all" }>,
  currentYear: number,
): Set<number> => {
  if (policy.kind === "year") {
    return new Set([policy.year]);
  }

  const years = new Set<number>();
  for (let year = currentYear - (policy.years - 1); year <= currentYear; year += 1) {
    years.add(year);
  }
  return years;
};

/**
 * Selects the filings to download under a policy. Pure; input order is preserved.
 * Records with unparseable dates are dropped. A quarter restricts 10-Q filings only.
 */
export const selectFilings = (
  filings: readonly FilingRecord[],
  policy: SelectionPolicy,
  currentYear: number,
): FilingRecord[] => {
  if (policy.kind === "all") {
    return [...filings];
  }

  const years = yearsToInclude(policy, currentYear);
  const quarter = policy.kind === "year" ? policy.quarter : undefined;

  return filings.filter((filing) => {
    const year = filingYear(filing);
    if (year === null || !years.has(year)) {
      return false;
    }

    if (filing.category === "10-K" || quarter === undefined) {
      return true;
    }

    return reportQuarter(filing) === quarter;
  });
};
