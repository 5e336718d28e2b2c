import * as cheerio from "cheerio";

export type DocumentCandidate = {
  filename: string;
  href: string;
};

const isViewerPage = (filename: string): boolean =>
  filename.startsWith("r") && filename.length < 10;

const isPreferredCandidate = (candidate: DocumentCandidate): boolean =>
  !candidate.filename.includes("exhibit") && !isViewerPage(candidate.filename);

/**
 * Collects HTML documents linked from a filing's archive directory listing, in listing order.
 * Index pages and search links are excluded. Filenames are lowercased.
 */
export const listDocumentCandidates = (
  listingHtml: string,
): DocumentCandidate[] => {
  const $ = cheerio.load(listingHtml);
  const candidates: DocumentCandidate[] = [];

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href")?.trim() ?? "";
    if (!href.includes("/Archives/edgar") || !href.toLowerCase().includes(".htm")) {
      return;
    }

    const filename = (href.split("/").at(-1) ?? "").toLowerCase();
    if (filename.includes("index") || href.includes("/search")) {
      return;
    }

    candidates.push({ filename, href });
  });

  return candidates;
};

/**
 * Picks the filing's main document among its candidates.
 *
 * The first candidate that is neither an exhibit nor a short `r*.htm` viewer page wins.
 * Without one, `r1.htm` is used when present, else the first candidate.
 */
export const pickPrimaryDocument = (
  candidates: DocumentCandidate[],
): DocumentCandidate | null =>
  candidates.find(isPreferredCandidate) ??
  candidates.find((candidate) => candidate.filename === "r1.htm") ??
  candidates.at(0) ??
  null;

/**
 * Resolves the primary document link from a directory listing into an absolute URL.
 */
export const selectPrimaryDocument = (
  listingHtml: string,
  archivesBaseUrl: string,
): string | null => {
  const picked = pickPrimaryDocument(listDocumentCandidates(listingHtml));
  if (!picked) {
    return null;
  }

  return new URL(picked.href, archivesBaseUrl).toString();
};
