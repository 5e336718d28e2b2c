import { describe, expect, it } from "vitest";
import {
  deriveQuarter,
  type FilingRecord,
  filingYear,
  isFilingCategory,
  reportQuarter,
} from "./filing";

const quarterly = (reportDate: string): FilingRecord => ({
  accessionNumber: "0000000001-24-000001",
  filingDate: "2024-05-01",
  reportDate,
  category: "10-Q",
});

describe("deriveQuarter", () => {
  it("maps every month to its calendar quarter", () => {
    const months = Array.from({ length: 12 }, (_, index) => index + 1);

    expect(months.map(deriveQuarter)).toEqual([
      1, 1, 1, 2, 2, 2, 3, 3, 3, 4, 4, 4,
    ]);
  });

  it("is stable under repeated evaluation", () => {
    for (let month = 1; month <= 12; month += 1) {
      expect(deriveQuarter(month)).toBe(deriveQuarter(month));
      expect(deriveQuarter(month)).toBe(Math.floor((month - 1) / 3) + 1);
    }
  });
});

describe("filing date helpers", () => {
  it("reads the quarter from the report date month", () => {
    expect(reportQuarter(quarterly("2024-03-30"))).toBe(1);
    expect(reportQuarter(quarterly("2024-06-29"))).toBe(2);
    expect(reportQuarter(quarterly("2023-12-31"))).toBe(4);
  });

  it("returns null for unparseable dates", () => {
    expect(reportQuarter(quarterly(""))).toBeNull();
    expect(filingYear({ ...quarterly("2024-03-30"), filingDate: "n/a" })).toBeNull();
  });

  it("recognises only the supported form types", () => {
    expect(isFilingCategory("10-K")).toBe(true);
    expect(isFilingCategory("10-Q")).toBe(true);
    expect(isFilingCategory("8-K")).toBe(false);
  });
});
