import type { AppBoundaryError } from "../../core/entities/appError";
import type { IngestionReport } from "../../core/entities/ingestion";
import type { SourceDescriptor } from "../../core/entities/source";
import type { MultiSourceLoaderPort } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  RecordSinkPort,
  SyncStateRepositoryPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { parseSourceDescriptors } from "./sourceDescriptorParser";

const DAY_MS = 24 * 60 * 60 * 1000;

export type IngestionRunRequest = {
  sources: string[];
  /** Overrides stored watermarks for every source in this run. */
  since?: Date;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type IngestionRunResult = {
  report: IngestionReport;
  written: number;
  storeError?: AppBoundaryError;
};

/**
 * One ingestion pass: resolve watermarks, load every source, hand the records to the sink,
 * then advance the watermark of each GitHub source that loaded.
 */
export class IngestionService {
  constructor(
    private readonly loader: MultiSourceLoaderPort,
    private readonly sink: RecordSinkPort,
    private readonly syncState: SyncStateRepositoryPort,
    private readonly clock: ClockPort,
    private readonly defaultLookbackDays: number,
  ) {}

  async run(request: IngestionRunRequest): Promise<IngestionRunResult> {
    const runStartedAt = this.clock.now();
    const since = request.since ?? (await this.storedWatermarks(request.sources, runStartedAt));

    const { records, report } = await this.loader.loadSources(request.sources, {
      since,
      timeoutMs: request.timeoutMs,
      signal: request.signal,
    });

    const written = await this.sink.addDocuments(records);
    if (written.isErr()) {
      logger.error(
        { code: written.error.code, message: written.error.message, records: records.length },
        "Storing records failed; watermarks left unchanged",
      );
      return { report, written: 0, storeError: written.error };
    }

    for (const outcome of report.outcomes) {
      if (outcome.status === "loaded" && outcome.type === "github") {
        await this.syncState.saveWatermark(outcome.raw, runStartedAt);
      }
    }

    logger.info(
      {
        written: written.value,
        sources: report.outcomes.length,
        deadlineExceeded: report.deadlineExceeded,
      },
      "Ingestion run finished",
    );

    return { report, written: written.value };
  }

  /**
   * GitHub sources resume from their stored watermark; everything else starts at the default lookback.
   */
  private async storedWatermarks(
    sources: string[],
    now: Date,
  ): Promise<(descriptor: SourceDescriptor) => Date> {
    const fallback = new Date(now.getTime() - this.defaultLookbackDays * DAY_MS);
    const stored = new Map<string, Date>();

    for (const parsed of parseSourceDescriptors(sources)) {
      if (parsed.status !== "parsed" || parsed.descriptor.type !== "github") {
        continue;
      }

      const watermark = await this.syncState.getWatermark(parsed.raw);
      if (watermark) {
        stored.set(parsed.raw, watermark);
      }
    }

    return (descriptor) => stored.get(descriptor.raw) ?? fallback;
  }
}
