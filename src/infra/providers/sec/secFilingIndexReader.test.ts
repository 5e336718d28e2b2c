import { afterEach, describe, expect, it, vi } from "vitest";
import { SecFilingIndexReader, toFilingRecords } from "./secFilingIndexReader";

const SUBMISSIONS_URL = "https://data.sec.gov/submissions/CIK0000320193.json";

const createReader = () =>
  new SecFilingIndexReader({
    dataBaseUrl: "https://data.sec.gov",
    userAgent: "filing-text-harvester-test/1.0 (contact: dev@example.com)",
    timeoutMs: 5_000,
  });

const stubResponse = (response: Response) => {
  const calls: string[] = [];
  vi.stubGlobal("fetch", async (input: string | URL | Request) => {
    calls.push(String(input));
    return response;
  });
  return calls;
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("toFilingRecords", () => {
  it("assembles records from parallel arrays and skips misaligned positions", () => {
    const records = toFilingRecords(
      {
        form: ["10-K", "10-Q", "10-K", "8-K", "10-K"],
        accessionNumber: ["a-1", "a-2", "a-3", "a-4"],
        filingDate: ["2024-11-01", "2024-08-02", "2023-11-03", "2023-10-01"],
        reportDate: ["2024-09-28", "2024-06-29", "2023-09-30", "2023-10-01"],
      },
      "10-K",
    );

    expect(records).toEqual([
      {
        accessionNumber: "a-1",
        filingDate: "2024-11-01",
        reportDate: "2024-09-28",
        category: "10-K",
      },
      {
        accessionNumber: "a-3",
        filingDate: "2023-11-03",
        reportDate: "2023-09-30",
        category: "10-K",
      },
    ]);
  });

  it("matches the form string exactly", () => {
    const records = toFilingRecords(
      {
        form: ["10-K/A", "10-Q"],
        accessionNumber: ["a-1", "a-2"],
        filingDate: ["2024-01-01", "2024-05-01"],
        reportDate: ["2023-12-31", "2024-03-31"],
      },
      "10-K",
    );

    expect(records).toEqual([]);
  });
});

describe("SecFilingIndexReader", () => {
  it("lists recent filings for the requested category", async () => {
    const calls = stubResponse(
      new Response(
        JSON.stringify({
          name: "Apple Inc.",
          filings: {
            recent: {
              form: ["10-Q", "10-K"],
              accessionNumber: ["0000320193-24-000081", "0000320193-23-000106"],
              filingDate: ["2024-08-02", "2023-11-03"],
              reportDate: ["2024-06-29", "2023-09-30"],
              primaryDocument: ["aapl-20240629.htm", "aapl-20230930.htm"],
            },
            files: [{ name: "CIK0000320193-submissions-001.json" }],
          },
        }),
        { status: 200 },
      ),
    );

    const result = await createReader().listFilings("0000320193", "10-Q");

    expect(calls).toEqual([SUBMISSIONS_URL]);
    expect(result).toEqual({
      filings: [
        {
          accessionNumber: "0000320193-24-000081",
          filingDate: "2024-08-02",
          reportDate: "2024-06-29",
          category: "10-Q",
        },
      ],
      diagnostics: {
        provider: "sec-edgar",
        cik: "0000320193",
        category: "10-Q",
        status: "ok",
        recordCount: 1,
      },
    });
  });

  it("reports an empty index distinctly from an unavailable one", async () => {
    stubResponse(new Response(JSON.stringify({ filings: {} }), { status: 200 }));

    const result = await createReader().listFilings("0000320193", "10-K");

    expect(result.filings).toEqual([]);
    expect(result.diagnostics.status).toBe("empty");
  });

  it("degrades to an unavailable diagnostic on transport failure", async () => {
    stubResponse(new Response("rate limited", { status: 429 }));

    const result = await createReader().listFilings("0000320193", "10-K");

    expect(result).toEqual({
      filings: [],
      diagnostics: {
        provider: "sec-edgar",
        cik: "0000320193",
        category: "10-K",
        status: "unavailable",
        recordCount: 0,
        errorCode: "non_success_status",
        reason: "HTTP request failed with status 429.",
        httpStatus: 429,
      },
    });
  });

  it("degrades to an unavailable diagnostic on malformed payloads", async () => {
    stubResponse(
      new Response(JSON.stringify({ filings: { recent: { form: "10-K" } } }), {
        status: 200,
      }),
    );

    const result = await createReader().listFilings("0000320193", "10-K");

    expect(result.filings).toEqual([]);
    expect(result.diagnostics.status).toBe("unavailable");
    expect(result.diagnostics.errorCode).toBe("malformed_response");
    expect(result.diagnostics.reason).toBe("SEC submissions payload was malformed.");
  });
});
