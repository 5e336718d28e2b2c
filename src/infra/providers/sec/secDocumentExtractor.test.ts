import { afterEach, describe, expect, it, vi } from "vitest";
import type { FilingRecord } from "../../../core/entities/filing";
import type { ClockPort, SleeperPort } from "../../../core/ports/outboundPorts";
import { FixedIntervalThrottle } from "../../throttle/fixedIntervalThrottle";
import { SecDocumentExtractor } from "./secDocumentExtractor";

const USER_AGENT = "filing-text-harvester-test/1.0 (contact: dev@example.com)";
const DIRECTORY_URL =
  "https://www.sec.gov/Archives/edgar/data/320193/000032019324000123/";
const DOCUMENT_PATH =
  "/Archives/edgar/data/320193/000032019324000123/aapl-20240928.htm";
const DOCUMENT_URL = `https://www.sec.gov${DOCUMENT_PATH}`;

const record: FilingRecord = {
  accessionNumber: "0000320193-24-000123",
  filingDate: "2024-11-01",
  reportDate: "2024-09-28",
  category: "10-K",
};

const LONG_PARAGRAPH = "Lorem paragraph ".repeat(400);

const listingHtml = `<html><body><table>
<tr><td><a href="/Archives/edgar/data/320193/000032019324000123/0000320193-24-000123-index.htm">index</a></td></tr>
<tr><td><a href="${DOCUMENT_PATH}">aapl-20240928.htm</a></td></tr>
</table></body></html>`;

const documentHtml = (body: string): string =>
  `<html><head><title>10-K</title></head><body><p>Cover page</p><p>UNITED STATES</p><p>${body}</p></body></html>`;

type Route = { status: number; body: string };

const createFakeTime = () => {
  let current = 0;
  const sleeps: number[] = [];
  const clock: ClockPort = { now: () => new Date(current) };
  const sleeper: SleeperPort = {
    sleep: async (ms) => {
      sleeps.push(ms);
      current += ms;
    },
  };
  return { clock, sleeper, sleeps };
};

const stubRoutes = (routes: Record<string, Route>) => {
  const calls: Array<{ url: string; userAgent: string | null }> = [];

  vi.stubGlobal(
    "fetch",
    async (input: string | URL | Request, init?: RequestInit) => {
      const url = String(input);
      calls.push({ url, userAgent: new Headers(init?.headers).get("User-Agent") });
      const route = routes[url];
      return route
        ? new Response(route.body, { status: route.status })
        : new Response("not found", { status: 404 });
    },
  );

  return calls;
};

const createExtractor = (time = createFakeTime()) =>
  new SecDocumentExtractor(
    { archivesBaseUrl: "https://www.sec.gov", userAgent: USER_AGENT },
    new FixedIntervalThrottle(1_000, time.clock, time.sleeper),
  );

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("SecDocumentExtractor", () => {
  it("fetches the primary document and returns cleaned text", async () => {
    const calls = stubRoutes({
      [DIRECTORY_URL]: { status: 200, body: listingHtml },
      [DOCUMENT_URL]: { status: 200, body: documentHtml(LONG_PARAGRAPH) },
    });

    const result = await createExtractor().extractDocument("0000320193", record);

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual({
      record,
      text: `UNITED STATES\n${LONG_PARAGRAPH.trimEnd()}`,
      sourceUrl: DOCUMENT_URL,
    });
    expect(calls).toEqual([
      { url: DIRECTORY_URL, userAgent: USER_AGENT },
      { url: DOCUMENT_URL, userAgent: USER_AGENT },
    ]);
  });

  it("reports short documents as extraction failures", async () => {
    stubRoutes({
      [DIRECTORY_URL]: { status: 200, body: listingHtml },
      [DOCUMENT_URL]: { status: 200, body: documentHtml("Placeholder.") },
    });

    const result = await createExtractor().extractDocument("0000320193", record);

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected content_too_short error");
    }

    expect(result.error.source).toBe("extractor");
    expect(result.error.code).toBe("content_too_short");
  });

  it("rejects cleaned text of exactly the minimum length", async () => {
    stubRoutes({
      [DIRECTORY_URL]: { status: 200, body: listingHtml },
      [DOCUMENT_URL]: { status: 200, body: documentHtml("x".repeat(4_986)) },
    });

    const result = await createExtractor().extractDocument("0000320193", record);

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected content_too_short error");
    }

    expect(result.error.code).toBe("content_too_short");
    expect(result.error.message).toBe(
      "Cleaned text for 0000320193-24-000123 has 5000 characters; more than 5000 required.",
    );
  });

  it("accepts cleaned text one character over the minimum length", async () => {
    stubRoutes({
      [DIRECTORY_URL]: { status: 200, body: listingHtml },
      [DOCUMENT_URL]: { status: 200, body: documentHtml("x".repeat(4_987)) },
    });

    const result = await createExtractor().extractDocument("0000320193", record);

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value.text).toHaveLength(5_001);
    expect(result.value.text).toBe(`UNITED STATES\n${"x".repeat(4_987)}`);
  });

  it("fails when the directory listing is not available", async () => {
    const calls = stubRoutes({});

    const result = await createExtractor().extractDocument("0000320193", record);

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected listing failure");
    }

    expect(result.error.code).toBe("extraction_failed");
    expect(result.error.httpStatus).toBe(404);
    expect(calls).toHaveLength(1);
  });

  it("fails when the listing has no HTML documents", async () => {
    const calls = stubRoutes({
      [DIRECTORY_URL]: {
        status: 200,
        body: '<a href="/Archives/edgar/data/320193/000032019324000123/Financial_Report.xlsx">xlsx</a>',
      },
    });

    const result = await createExtractor().extractDocument("0000320193", record);

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected missing document failure");
    }

    expect(result.error.code).toBe("extraction_failed");
    expect(result.error.message).toBe(`No HTML document found in ${DIRECTORY_URL}.`);
    expect(calls).toHaveLength(1);
  });

  it("fails when the primary document request fails", async () => {
    stubRoutes({
      [DIRECTORY_URL]: { status: 200, body: listingHtml },
      [DOCUMENT_URL]: { status: 500, body: "error" },
    });

    const result = await createExtractor().extractDocument("0000320193", record);

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected document failure");
    }

    expect(result.error.code).toBe("extraction_failed");
    expect(result.error.httpStatus).toBe(500);
  });

  it("waits the fixed interval before every extraction, including the first", async () => {
    stubRoutes({
      [DIRECTORY_URL]: { status: 200, body: listingHtml },
      [DOCUMENT_URL]: { status: 200, body: documentHtml(LONG_PARAGRAPH) },
    });
    const time = createFakeTime();
    const extractor = createExtractor(time);

    await extractor.extractDocument("0000320193", record);
    expect(time.sleeps).toEqual([1_000]);

    await extractor.extractDocument("0000320193", record);
    expect(time.sleeps).toEqual([1_000, 1_000]);
  });

  it("throws when user-agent is missing", () => {
    const time = createFakeTime();
    expect(
      () =>
        new SecDocumentExtractor(
          { archivesBaseUrl: "https://www.sec.gov", userAgent: " " },
          new FixedIntervalThrottle(1_000, time.clock, time.sleeper),
        ),
    ).toThrow("SEC_USER_AGENT is required");
  });
});
