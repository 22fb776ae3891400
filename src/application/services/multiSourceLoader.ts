import { err, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  LoadSourcesResult,
  SourceOutcome,
} from "../../core/entities/ingestion";
import type { KnowledgeRecord } from "../../core/entities/record";
import type { SourceDescriptor } from "../../core/entities/source";
import type {
  LoadSourcesOptions,
  MultiSourceLoaderPort,
  SourceLoadRequest,
  SourceLoaderRegistry,
} from "../../core/ports/inboundPorts";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { MAX_TIMER_DELAY_MS } from "../../shared/config/limits";
import { logger } from "../../shared/logger/logger";
import { parseSourceDescriptors } from "./sourceDescriptorParser";

const ABORTED = Symbol("aborted");

type LoadResult = Result<KnowledgeRecord[], AppBoundaryError>;

const describeAbort = (signal: AbortSignal): string =>
  signal.reason instanceof Error
    ? signal.reason.message
    : "Ingestion was cancelled by the caller.";

/**
 * Resolves with the sentinel as soon as `signal` fires, abandoning `work`.
 */
const raceAbort = async <T>(
  work: Promise<T>,
  signal: AbortSignal,
): Promise<T | typeof ABORTED> => {
  if (signal.aborted) {
    return ABORTED;
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<typeof ABORTED>((resolve) => {
    onAbort = () => resolve(ABORTED);
    signal.addEventListener("abort", onAbort, { once: true });
  });

  try {
    return await Promise.race([work, aborted]);
  } finally {
    if (onAbort) {
      signal.removeEventListener("abort", onAbort);
    }
  }
};

/**
 * Routes each descriptor to its loader and concatenates records in input order.
 * One failing source never prevents the others; every entry gets an outcome in the report.
 */
export class MultiSourceLoader implements MultiSourceLoaderPort {
  constructor(
    private readonly loaders: SourceLoaderRegistry,
    private readonly clock: ClockPort = { now: () => new Date() },
  ) {}

  async loadSources(
    sources: string[],
    options: LoadSourcesOptions,
  ): Promise<LoadSourcesResult> {
    const startedAt = this.clock.now();
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(options.signal?.reason);

    if (options.signal?.aborted) {
      forwardAbort();
    } else {
      options.signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    const timer =
      options.timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            controller.abort(
              new Error(`Ingestion deadline of ${options.timeoutMs}ms exceeded.`),
            );
          }, Math.min(options.timeoutMs, MAX_TIMER_DELAY_MS));

    const records: KnowledgeRecord[] = [];
    const outcomes: SourceOutcome[] = [];

    try {
      for (const parsed of parseSourceDescriptors(sources)) {
        if (parsed.status === "skipped") {
          logger.warn(
            { source: parsed.raw, reason: parsed.reason, detail: parsed.detail },
            "Skipping source descriptor",
          );
          outcomes.push(parsed);
          continue;
        }

        const { descriptor } = parsed;
        const outcome = await this.loadOne(descriptor, options, controller.signal);
        if (outcome.status === "loaded") {
          records.push(...outcome.records);
        }
        outcomes.push(outcome.report);
      }
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      options.signal?.removeEventListener("abort", forwardAbort);
    }

    return {
      records,
      report: {
        startedAt,
        finishedAt: this.clock.now(),
        outcomes,
        deadlineExceeded: controller.signal.aborted,
      },
    };
  }

  private async loadOne(
    descriptor: SourceDescriptor,
    options: LoadSourcesOptions,
    signal: AbortSignal,
  ): Promise<
    | { status: "loaded"; records: KnowledgeRecord[]; report: SourceOutcome }
    | { status: "other"; report: SourceOutcome }
  > {
    const { raw, type } = descriptor;
    if (signal.aborted) {
      return {
        status: "other",
        report: { status: "aborted", raw, type, reason: describeAbort(signal) },
      };
    }

    const since =
      typeof options.since === "function"
        ? options.since(descriptor)
        : options.since;
    const started = Date.now();

    const work = this.dispatch(descriptor, { since, signal }).catch(
      (error: unknown): LoadResult =>
        err({
          source: type,
          code: "provider_error",
          provider: type,
          operation: `load ${raw}`,
          message: `load ${raw} failed unexpectedly: ${error instanceof Error ? error.message : String(error)}`,
          retryable: false,
          cause: error,
        }),
    );
    const result = await raceAbort(work, signal);
    const durationMs = Date.now() - started;

    if (result === ABORTED || (result.isErr() && signal.aborted)) {
      logger.warn({ source: raw, durationMs }, "Source load aborted by deadline");
      return {
        status: "other",
        report: { status: "aborted", raw, type, reason: describeAbort(signal) },
      };
    }

    if (result.isErr()) {
      logger.error(
        {
          source: raw,
          code: result.error.code,
          operation: result.error.operation,
          message: result.error.message,
          durationMs,
        },
        "Source load failed; continuing with remaining sources",
      );
      return {
        status: "other",
        report: { status: "failed", raw, type, error: result.error, durationMs },
      };
    }

    logger.info(
      { source: raw, records: result.value.length, durationMs },
      "Source loaded",
    );
    return {
      status: "loaded",
      records: result.value,
      report: {
        status: "loaded",
        raw,
        type,
        recordCount: result.value.length,
        durationMs,
      },
    };
  }

  private async dispatch(
    descriptor: SourceDescriptor,
    request: SourceLoadRequest,
  ): Promise<LoadResult> {
    switch (descriptor.type) {
      case "github":
        return this.loaders.github.load(descriptor, request);
      case "site":
        return this.loaders.site.load(descriptor, request);
      case "file":
        return this.loaders.file.load(descriptor, request);
      case "pdf": {
        if (!this.loaders.pdf) {
          return err({
            source: "pdf",
            code: "config_invalid",
            provider: "pdf",
            operation: `load ${descriptor.raw}`,
            message: "No pdf loader is configured.",
            retryable: false,
          });
        }
        return this.loaders.pdf.load(descriptor, request);
      }
    }
  }
}
