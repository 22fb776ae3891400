import { describe, expect, it } from "vitest";
import { parseSourceDescriptors } from "../application/services/sourceDescriptorParser";
import type { IngestionRunResult } from "../application/services/ingestionService";
import { exitCodeFor, formatIngestionReport, formatParseOutcomes } from "./report";

const result: IngestionRunResult = {
  written: 3,
  report: {
    startedAt: new Date("2024-05-10T00:00:00Z"),
    finishedAt: new Date("2024-05-10T00:00:05Z"),
    deadlineExceeded: true,
    outcomes: [
      { status: "loaded", raw: "github:acme", type: "github", recordCount: 3, durationMs: 120 },
      {
        status: "skipped",
        raw: "bogus",
        reason: "missing_separator",
        detail: "Expected '<type>:<locator>'.",
      },
      {
        status: "failed",
        raw: "site:https://example.test/",
        type: "site",
        durationMs: 40,
        error: {
          source: "site",
          code: "provider_error",
          provider: "http",
          operation: "fetch_page https://example.test/",
          message: "fetch_page https://example.test/ failed: HTTP request failed with status 503.",
          retryable: true,
          httpStatus: 503,
        },
      },
      {
        status: "aborted",
        raw: "file:docs/*.md",
        type: "file",
        reason: "Ingestion deadline of 5000ms exceeded.",
      },
    ],
  },
};

describe("formatIngestionReport", () => {
  it("prints one line per source with its outcome", () => {
    expect(formatIngestionReport(result)).toBe(
      [
        "Ingestion report",
        "Started: 2024-05-10T00:00:00.000Z",
        "Finished: 2024-05-10T00:00:05.000Z",
        "Deadline exceeded: yes",
        "Records written: 3",
        "Sources:",
        "- github:acme: loaded 3 records in 120ms",
        "- bogus: skipped (missing_separator) Expected '<type>:<locator>'.",
        "- site:https://example.test/: failed [site/provider_error] fetch_page https://example.test/ failed: HTTP request failed with status 503. (http 503, retryable)",
        "- file:docs/*.md: aborted (Ingestion deadline of 5000ms exceeded.)",
      ].join("\n"),
    );
  });

  it("appends the store error when the sink failed", () => {
    const failed: IngestionRunResult = {
      written: 0,
      report: { ...result.report, outcomes: [] },
      storeError: {
        source: "storage",
        code: "storage_error",
        provider: "postgres",
        operation: "add_documents",
        message: "add_documents failed: connection refused",
        retryable: false,
      },
    };

    expect(formatIngestionReport(failed).split("\n").slice(-2)).toEqual([
      "- none",
      "Store error: [storage_error] add_documents failed: connection refused",
    ]);
  });
});

describe("exitCodeFor", () => {
  it("is non-zero when any source failed or was aborted", () => {
    expect(exitCodeFor(result)).toBe(1);
  });

  it("is zero when every source loaded or was skipped", () => {
    expect(
      exitCodeFor({
        ...result,
        report: { ...result.report, outcomes: result.report.outcomes.slice(0, 2) },
      }),
    ).toBe(0);
  });
});

describe("formatParseOutcomes", () => {
  it("shows the resolved target and grouping id of each descriptor", () => {
    const outcomes = parseSourceDescriptors([
      "github:acme",
      "github:acme/widget",
      "nope:1",
    ]);

    expect(formatParseOutcomes(outcomes)).toBe(
      [
        "github:acme: github org acme -> source_id github:acme",
        "github:acme/widget: github repository acme/widget -> source_id github:acme/widget",
        "nope:1: skipped (unknown_type) Unknown source type 'nope'. Expected one of: github, site, file, pdf.",
      ].join("\n"),
    );
  });
});
