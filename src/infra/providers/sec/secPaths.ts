/**
 * EDGAR path helpers shared by the SEC adapters.
 */

const CIK_WIDTH = 10;

/**
 * Pads a numeric CIK to EDGAR's fixed ten-digit form. Returns null for non-numeric input.
 */
export const normalizeCik = (raw: string): string | null => {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }

  const withoutLeadingZeros = trimmed.replace(/^0+/, "");
  return withoutLeadingZeros.padStart(CIK_WIDTH, "0");
};

export const unpaddedCik = (cik: string): string =>
  cik.replace(/^0+/, "") || "0";

export const accessionPathPart = (accessionNumber: string): string =>
  accessionNumber.replaceAll("-", "");

/**
 * Builds the archive directory URL for one filing, with a trailing slash.
 */
export const filingDirectoryUrl = (
  archivesBaseUrl: string,
  cik: string,
  accessionNumber: string,
): string =>
  new URL(
    `/Archives/edgar/data/${unpaddedCik(cik)}/${accessionPathPart(accessionNumber)}/`,
    archivesBaseUrl,
  ).toString();
