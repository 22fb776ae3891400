import type { SyncStateRepositoryPort } from "../../core/ports/outboundPorts";

/**
 * Watermarks for `--store memory` runs; lost when the process exits.
 */
export class InMemorySyncStateRepository implements SyncStateRepositoryPort {
  private readonly watermarks = new Map<string, Date>();

  async getWatermark(sourceKey: string): Promise<Date | null> {
    return this.watermarks.get(sourceKey) ?? null;
  }

  async saveWatermark(sourceKey: string, watermark: Date): Promise<void> {
    this.watermarks.set(sourceKey, watermark);
  }
}
