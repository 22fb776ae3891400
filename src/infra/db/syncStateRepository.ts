import { eq } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type { SyncStateRepositoryPort } from "../../core/ports/outboundPorts";
import { syncStateTable } from "./schema";

export class PostgresSyncStateRepository implements SyncStateRepositoryPort {
  constructor(private readonly db: PostgresJsDatabase) {}

  async getWatermark(sourceKey: string): Promise<Date | null> {
    const rows = await this.db
      .select({ watermark: syncStateTable.watermark })
      .from(syncStateTable)
      .where(eq(syncStateTable.sourceKey, sourceKey))
      .limit(1);

    return rows[0]?.watermark ?? null;
  }

  async saveWatermark(sourceKey: string, watermark: Date): Promise<void> {
    await this.db
      .insert(syncStateTable)
      .values({ sourceKey, watermark, updatedAt: new Date() })
      .onConflictDoUpdate({
        target: syncStateTable.sourceKey,
        set: { watermark, updatedAt: new Date() },
      });
  }
}
