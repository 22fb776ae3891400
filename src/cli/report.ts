import type { SourceOutcome } from "../core/entities/ingestion";
import type { DescriptorParseOutcome } from "../core/entities/source";
import { sourceIdOf } from "../application/services/sourceDescriptorParser";
import type { IngestionRunResult } from "../application/services/ingestionService";

const formatOutcome = (outcome: SourceOutcome): string => {
  switch (outcome.status) {
    case "loaded":
      return `- ${outcome.raw}: loaded ${outcome.recordCount} records in ${outcome.durationMs}ms`;
    case "skipped":
      return `- ${outcome.raw}: skipped (${outcome.reason}) ${outcome.detail}`;
    case "failed": {
      const { error } = outcome;
      const details = [
        typeof error.httpStatus === "number" ? `http ${error.httpStatus}` : null,
        error.retryable ? "retryable" : null,
      ].filter(Boolean);
      return `- ${outcome.raw}: failed [${error.source}/${error.code}] ${error.message}${details.length > 0 ? ` (${details.join(", ")})` : ""}`;
    }
    case "aborted":
      return `- ${outcome.raw}: aborted (${outcome.reason})`;
  }
};

/**
 * Renders one ingestion run for the terminal, one line per configured source.
 */
export const formatIngestionReport = (result: IngestionRunResult): string => {
  const { report } = result;
  const lines = [
    "Ingestion report",
    `Started: ${report.startedAt.toISOString()}`,
    `Finished: ${report.finishedAt.toISOString()}`,
    `Deadline exceeded: ${report.deadlineExceeded ? "yes" : "no"}`,
    `Records written: ${result.written}`,
    "Sources:",
  ];

  if (report.outcomes.length === 0) {
    lines.push("- none");
  }
  lines.push(...report.outcomes.map(formatOutcome));

  if (result.storeError) {
    lines.push(`Store error: [${result.storeError.code}] ${result.storeError.message}`);
  }

  return lines.join("\n");
};

export const formatParseOutcomes = (outcomes: DescriptorParseOutcome[]): string =>
  outcomes
    .map((outcome) => {
      if (outcome.status === "skipped") {
        return `${outcome.raw}: skipped (${outcome.reason}) ${outcome.detail}`;
      }

      const { descriptor } = outcome;
      const target =
        descriptor.type === "github"
          ? descriptor.scope === "org"
            ? `org ${descriptor.org}`
            : `repository ${descriptor.owner}/${descriptor.repo}`
          : descriptor.locator;
      return `${outcome.raw}: ${descriptor.type} ${target} -> source_id ${sourceIdOf(descriptor)}`;
    })
    .join("\n");

/**
 * Non-zero when anything kept records from being stored: a failed or aborted source, or the sink itself.
 */
export const exitCodeFor = (result: IngestionRunResult): number => {
  if (result.storeError) {
    return 1;
  }

  return result.report.outcomes.some(
    (outcome) => outcome.status === "failed" || outcome.status === "aborted",
  )
    ? 1
    : 0;
};
