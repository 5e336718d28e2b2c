import { describe, expect, it } from "vitest";
import { filingDirectoryUrl, normalizeCik, unpaddedCik } from "./secPaths";

describe("secPaths", () => {
  it("pads numeric CIKs to ten digits", () => {
    expect(normalizeCik("320193")).toBe("0000320193");
    expect(normalizeCik("0000320193")).toBe("0000320193");
    expect(normalizeCik("CIK320193")).toBeNull();
  });

  it("strips leading zeros for archive paths", () => {
    expect(unpaddedCik("0000320193")).toBe("320193");
    expect(unpaddedCik("0000000000")).toBe("0");
  });

  it("builds the filing directory from CIK and accession number", () => {
    expect(
      filingDirectoryUrl("https://www.sec.gov", "0000320193", "0000320193-24-000123"),
    ).toBe("https://www.sec.gov/Archives/edgar/data/320193/000032019324000123/");
  });
});
