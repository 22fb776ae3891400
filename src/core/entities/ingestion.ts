import type { AppBoundaryError } from "./appError";
import type { KnowledgeRecord } from "./record";
import type { DescriptorSkipReason, SourceType } from "./source";

export type SourceOutcome =
  | {
      status: "loaded";
      raw: string;
      type: SourceType;
      recordCount: number;
      durationMs: number;
    }
  | {
      status: "skipped";
      raw: string;
      reason: DescriptorSkipReason;
      detail: string;
    }
  | {
      status: "failed";
      raw: string;
      type: SourceType;
      error: AppBoundaryError;
      durationMs: number;
    }
  | {
      status: "aborted";
      raw: string;
      type: SourceType;
      reason: string;
    };

/**
 * One outcome per configured source, in configuration order, so operators can see what happened to each.
 */
export type IngestionReport = {
  startedAt: Date;
  finishedAt: Date;
  outcomes: SourceOutcome[];
  deadlineExceeded: boolean;
};

export type LoadSourcesResult = {
  records: KnowledgeRecord[];
  report: IngestionReport;
};
