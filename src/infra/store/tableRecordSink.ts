import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { KnowledgeRecord } from "../../core/entities/record";
import type {
  RecordSinkPort,
  TableStorePort,
} from "../../core/ports/outboundPorts";
import { latestById } from "../../core/storage/tableContracts";
import { logger } from "../../shared/logger/logger";

/**
 * `add_documents` over any documents table store; re-adding an id replaces the stored record.
 * Records sharing an id within one call collapse to the last, and the count is of distinct ids.
 */
export class TableRecordSink implements RecordSinkPort {
  constructor(
    private readonly documents: TableStorePort<KnowledgeRecord>,
    private readonly provider: string,
  ) {}

  async addDocuments(
    records: Iterable<KnowledgeRecord>,
  ): Promise<Result<number, AppBoundaryError>> {
    const batch = latestById(records, (record) => record.id);
    if (batch.length === 0) {
      return ok(0);
    }

    try {
      await this.documents.upsertMany(batch);
    } catch (error) {
      return err({
        source: "storage",
        code: "storage_error",
        provider: this.provider,
        operation: "add_documents",
        message: `add_documents failed: ${error instanceof Error ? error.message : String(error)}`,
        retryable: false,
        cause: error,
      });
    }

    logger.debug({ provider: this.provider, count: batch.length }, "Stored documents");
    return ok(batch.length);
  }
}
