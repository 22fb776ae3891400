import { err, ok, type Result } from "neverthrow";
import type { ConversionError } from "../../core/entities/appError";
import type {
  EmbeddingPort,
  TableStorePort,
} from "../../core/ports/outboundPorts";
import {
  integerValue,
  textValue,
  timestampValue,
  type StorageRow,
  type StorageValue,
} from "../../core/storage/storageValue";
import {
  indexedColumns,
  latestById,
  type ColumnSpec,
  type TableContract,
} from "../../core/storage/tableContracts";

const EMBEDDING_COLUMN = "embedding";

/** Rows per INSERT statement and per embed call; Postgres caps a statement at 65535 bind parameters. */
export const DEFAULT_WRITE_BATCH_SIZE = 500;

export type SqlParameter = string | number | Date | null;

/**
 * The slice of the postgres.js client this store needs; `postgres.Sql` satisfies it.
 */
export interface SqlExecutor {
  unsafe(
    query: string,
    parameters?: SqlParameter[],
  ): PromiseLike<Iterable<Record<string, unknown>> & { count: number }>;
}

const quote = (identifier: string): string => `"${identifier.replace(/"/g, '""')}"`;

const toParameter = (value: StorageValue | null): SqlParameter =>
  value === null ? null : value.value;

/**
 * Generic pgvector-backed store: SQL is generated from the table contract, and the contract's
 * embedding target is embedded on write into the `embedding` column.
 */
export class PostgresTableStore<T> implements TableStorePort<T> {
  constructor(
    private readonly sqlClient: SqlExecutor,
    private readonly contract: TableContract<T>,
    private readonly embeddings?: EmbeddingPort,
    private readonly batchSize = DEFAULT_WRITE_BATCH_SIZE,
  ) {}

  /**
   * Rows sharing an id collapse to the last one before writing. Batches are written in order,
   * each as its own statement, so a failure leaves earlier batches stored.
   */
  async upsertMany(entities: T[]): Promise<void> {
    const unique = latestById(entities, (entity) => this.contract.idOf(entity));

    for (let start = 0; start < unique.length; start += this.batchSize) {
      await this.upsertBatch(unique.slice(start, start + this.batchSize));
    }
  }

  private async upsertBatch(entities: T[]): Promise<void> {
    const vectors = await this.embed(entities);
    const columns = this.contract.columns.map((column) => column.name);
    const insertColumns = vectors ? [...columns, EMBEDDING_COLUMN] : columns;
    const parameters: SqlParameter[] = [];
    const tuples = entities.map((entity, rowIndex) => {
      const row = this.contract.encode(entity);
      const placeholders = columns.map((column) => {
        parameters.push(toParameter(row[column] ?? null));
        return `$${parameters.length}`;
      });

      const vector = vectors?.[rowIndex];
      if (vector) {
        parameters.push(`[${vector.join(",")}]`);
        placeholders.push(`$${parameters.length}::vector`);
      }

      return `(${placeholders.join(", ")})`;
    });

    const key = this.primaryKey();
    const updates = insertColumns
      .filter((column) => column !== key)
      .map((column) => `${quote(column)} = EXCLUDED.${quote(column)}`);

    await this.sqlClient.unsafe(
      `INSERT INTO ${quote(this.contract.name)} (${insertColumns.map(quote).join(", ")})
       VALUES ${tuples.join(", ")}
       ON CONFLICT (${quote(key)}) DO UPDATE SET ${updates.join(", ")}`,
      parameters,
    );
  }

  async findById(id: string): Promise<Result<T | null, ConversionError>> {
    const key = this.contract.columns.find((column) => column.primaryKey);
    const parameter = key?.kind === "integer" ? Number(id) : id;
    const rows = await this.sqlClient.unsafe(
      `SELECT ${this.selectList()} FROM ${quote(this.contract.name)} WHERE ${quote(this.primaryKey())} = $1 LIMIT 1`,
      [parameter],
    );

    const [first] = [...rows];
    return first ? this.decodeRow(first) : ok(null);
  }

  async listBy(
    column: string,
    value: string,
  ): Promise<Result<T[], ConversionError>> {
    this.assertIndexed(column);
    const rows = await this.sqlClient.unsafe(
      `SELECT ${this.selectList()} FROM ${quote(this.contract.name)} WHERE ${quote(column)} = $1 ORDER BY ${quote(this.primaryKey())}`,
      [value],
    );

    const entities: T[] = [];
    for (const row of rows) {
      const decoded = this.decodeRow(row);
      if (decoded.isErr()) {
        return err(decoded.error);
      }
      entities.push(decoded.value);
    }

    return ok(entities);
  }

  async deleteBy(column: string, value: string): Promise<number> {
    this.assertIndexed(column);
    const result = await this.sqlClient.unsafe(
      `DELETE FROM ${quote(this.contract.name)} WHERE ${quote(column)} = $1`,
      [value],
    );

    return result.count;
  }

  private async embed(entities: T[]): Promise<number[][] | null> {
    const { embeddingColumn, embeddingTextOf } = this.contract;
    if (!embeddingColumn || !embeddingTextOf || !this.embeddings) {
      return null;
    }

    const vectors = await this.embeddings.embedTexts(
      entities.map((entity) => embeddingTextOf(entity)),
    );
    if (vectors.isErr()) {
      throw new Error(
        `Embedding ${this.contract.name}.${embeddingColumn} failed: ${vectors.error.message}`,
        { cause: vectors.error },
      );
    }

    return vectors.value;
  }

  private decodeRow(
    raw: Record<string, unknown>,
  ): Result<T, ConversionError> {
    const row: StorageRow = {};
    for (const column of this.contract.columns) {
      const value = this.toStorageValue(column, raw[column.name]);
      if (value.isErr()) {
        return err(value.error);
      }
      row[column.name] = value.value;
    }

    return this.contract.decode(row);
  }

  private toStorageValue(
    column: ColumnSpec,
    value: unknown,
  ): Result<StorageValue | null, ConversionError> {
    if (value === null || value === undefined) {
      return ok(null);
    }

    if (column.kind === "text" && typeof value === "string") {
      return ok(textValue(value));
    }

    if (column.kind === "integer" && typeof value === "number") {
      return ok(integerValue(value));
    }

    if (column.kind === "timestamp" && value instanceof Date) {
      return ok(timestampValue(value));
    }

    return err({
      code: "conversion_error",
      table: this.contract.name,
      column: column.name,
      message: `Column ${column.name} expected ${column.kind}, got ${typeof value}.`,
      value,
    });
  }

  private selectList(): string {
    return this.contract.columns.map((column) => quote(column.name)).join(", ");
  }

  private primaryKey(): string {
    const key = this.contract.columns.find((column) => column.primaryKey);
    if (!key) {
      throw new Error(`Table ${this.contract.name} has no primary key column.`);
    }
    return key.name;
  }

  private assertIndexed(column: string): void {
    if (!indexedColumns(this.contract).includes(column)) {
      throw new Error(`Column ${column} is not indexed on ${this.contract.name}.`);
    }
  }
}
