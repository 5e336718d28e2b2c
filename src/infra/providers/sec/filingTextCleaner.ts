import * as cheerio from "cheerio";
import { type AnyNode, type Element, hasChildren, isText } from "domhandler";

const NON_CONTENT_SELECTOR = "script, style, meta, link, button, noscript, head";

const BODY_START_MARKER = "UNITED STATES";

const XBRL_PREFIXES = [
  "aapl:",
  "us-gaap:",
  "xbrli:",
  "iso4217:",
  "usfr:",
  "exch:",
  "dei:",
] as const;

const SHORT_TOKEN_MAX_LENGTH = 100;

export const MIN_CONTENT_LENGTH = 5_000;

const isSchemaReference = (line: string): boolean =>
  line.includes("http") &&
  (line.includes("fasb.org") || line.includes("sec.gov/Archives/edgar/xmlbrl"));

const isNamespacedToken = (line: string): boolean =>
  line.trim().length < SHORT_TOKEN_MAX_LENGTH &&
  line.includes(":") &&
  !line.includes(" ") &&
  XBRL_PREFIXES.some((prefix) => line.startsWith(prefix));

const collectText = (node: AnyNode, into: string[]): void => {
  if (isText(node)) {
    into.push(node.data);
    return;
  }

  if (hasChildren(node)) {
    node.children.forEach((child) => collectText(child, into));
  }
};

/**
 * Drops non-content elements and unwraps namespaced (inline XBRL) tags so the figures they wrap stay as text.
 * Returns every text node, one per line.
 */
export const extractVisibleText = (html: string): string => {
  const $ = cheerio.load(html);

  $(NON_CONTENT_SELECTOR).remove();

  $<Element, string>("*").each((_, element) => {
    if (element.name.includes(":")) {
      const $element = $(element);
      $element.replaceWith($element.contents());
    }
  });

  const texts: string[] = [];
  $.root()
    .contents()
    .each((_, node) => collectText(node, texts));

  return texts.join("\n");
};

/**
 * Line-level cleanup of extracted filing text. Everything before the first "UNITED STATES" line is discarded.
 */
export const cleanFilingLines = (text: string): string => {
  const kept: string[] = [];
  let foundStart = false;

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trimEnd();

    if (!line.trim()) {
      continue;
    }

    if (!foundStart) {
      if (!line.includes(BODY_START_MARKER)) {
        continue;
      }
      foundStart = true;
    }

    if (isSchemaReference(line) || isNamespacedToken(line)) {
      continue;
    }

    kept.push(line);
  }

  let cleaned = kept.join("\n");
  while (cleaned.includes("\n\n\n")) {
    cleaned = cleaned.replaceAll("\n\n\n", "\n\n");
  }

  return cleaned;
};

export const cleanFilingHtml = (html: string): string =>
  cleanFilingLines(extractVisibleText(html));
