import { err, ok, type Result } from "neverthrow";
import type { ConversionError } from "../../core/entities/appError";
import type { TableStorePort } from "../../core/ports/outboundPorts";
import type { StorageRow } from "../../core/storage/storageValue";
import {
  indexedColumns,
  type TableContract,
} from "../../core/storage/tableContracts";

/**
 * Process-local store that keeps rows in their encoded form, so every read goes through the contract's decoder.
 * Rows are returned in first-insertion order.
 */
export class InMemoryTableStore<T> implements TableStorePort<T> {
  private readonly rows = new Map<string, StorageRow>();

  constructor(private readonly contract: TableContract<T>) {}

  async upsertMany(entities: T[]): Promise<void> {
    for (const entity of entities) {
      this.rows.set(this.contract.idOf(entity), this.contract.encode(entity));
    }
  }

  async findById(id: string): Promise<Result<T | null, ConversionError>> {
    const row = this.rows.get(id);
    return row ? this.contract.decode(row) : ok(null);
  }

  async listBy(
    column: string,
    value: string,
  ): Promise<Result<T[], ConversionError>> {
    const entities: T[] = [];
    for (const row of this.matching(column, value)) {
      const decoded = this.contract.decode(row);
      if (decoded.isErr()) {
        return err(decoded.error);
      }
      entities.push(decoded.value);
    }

    return ok(entities);
  }

  async deleteBy(column: string, value: string): Promise<number> {
    let deleted = 0;
    for (const [id, row] of this.rows) {
      if (this.matches(row, column, value)) {
        this.rows.delete(id);
        deleted += 1;
      }
    }

    return deleted;
  }

  /**
   * Stores an already-encoded row as-is; used to load rows written by other processes or older builds.
   */
  putRow(id: string, row: StorageRow): void {
    this.rows.set(id, row);
  }

  get size(): number {
    return this.rows.size;
  }

  private *matching(column: string, value: string): Iterable<StorageRow> {
    for (const row of this.rows.values()) {
      if (this.matches(row, column, value)) {
        yield row;
      }
    }
  }

  private matches(row: StorageRow, column: string, value: string): boolean {
    if (!indexedColumns(this.contract).includes(column)) {
      throw new Error(
        `Column ${column} is not indexed on ${this.contract.name}.`,
      );
    }

    const stored = row[column];
    return stored?.kind === "text" && stored.value === value;
  }
}
