import { err, ok, type Result } from "neverthrow";
import type { ConversionError } from "../entities/appError";

/**
 * The closed set of primitives a table column can hold.
 */
export type StorageValue =
  | { kind: "text"; value: string }
  | { kind: "integer"; value: number }
  | { kind: "timestamp"; value: Date };

export type StorageValueKind = StorageValue["kind"];

export type StorageRow = Record<string, StorageValue | null>;

export const textValue = (value: string): StorageValue => ({
  kind: "text",
  value,
});

export const integerValue = (value: number): StorageValue => ({
  kind: "integer",
  value,
});

export const timestampValue = (value: Date): StorageValue => ({
  kind: "timestamp",
  value,
});

export const optionalText = (value: string | undefined): StorageValue | null =>
  value === undefined ? null : textValue(value);

export const optionalTimestamp = (
  value: Date | undefined,
): StorageValue | null => (value === undefined ? null : timestampValue(value));

/**
 * Reads typed values out of a row and remembers the first conversion failure,
 * so decoders can read every column before deciding on the result.
 */
export class RowReader {
  private failure: ConversionError | undefined;

  constructor(
    private readonly table: string,
    private readonly row: StorageRow,
  ) {}

  text(column: string): string {
    const value = this.optionalText(column);
    if (value === undefined) {
      this.fail(column, `Column ${column} is required.`);
      return "";
    }

    return value;
  }

  optionalText(column: string): string | undefined {
    const value = this.read(column);
    if (value === null) {
      return undefined;
    }

    if (value.kind !== "text") {
      this.fail(column, `Column ${column} expected text, got ${value.kind}.`);
      return undefined;
    }

    return value.value;
  }

  integer(column: string): number {
    const value = this.read(column);
    if (value === null) {
      this.fail(column, `Column ${column} is required.`);
      return 0;
    }

    if (value.kind !== "integer" || !Number.isInteger(value.value)) {
      this.fail(column, `Column ${column} expected integer, got ${value.kind}.`);
      return 0;
    }

    return value.value;
  }

  optionalTimestamp(column: string): Date | undefined {
    const value = this.read(column);
    if (value === null) {
      return undefined;
    }

    if (value.kind !== "timestamp" || Number.isNaN(value.value.getTime())) {
      this.fail(column, `Column ${column} expected timestamp.`);
      return undefined;
    }

    return value.value;
  }

  /**
   * Lets decoders plug in fallible conversions (enums, JSON) under the same first-error policy.
   */
  convert<T>(
    column: string,
    raw: string,
    decode: (value: string) => Result<T, ConversionError>,
    fallback: T,
  ): T {
    const decoded = decode(raw);
    if (decoded.isErr()) {
      if (!this.failure) {
        this.failure = { ...decoded.error, table: this.table, column };
      }
      return fallback;
    }

    return decoded.value;
  }

  finish<T>(build: () => T): Result<T, ConversionError> {
    if (this.failure) {
      return err(this.failure);
    }

    return ok(build());
  }

  private read(column: string): StorageValue | null {
    return this.row[column] ?? null;
  }

  private fail(column: string, message: string): void {
    if (this.failure) {
      return;
    }

    this.failure = {
      code: "conversion_error",
      table: this.table,
      column,
      message,
      value: this.row[column] ?? null,
    };
  }
}
