import type { Result } from "neverthrow";
import type { AppBoundaryError, ConversionError } from "../entities/appError";
import type { KnowledgeRecord } from "../entities/record";

/**
 * The only contract ingestion needs from persistent storage.
 */
export interface RecordSinkPort {
  addDocuments(
    records: Iterable<KnowledgeRecord>,
  ): Promise<Result<number, AppBoundaryError>>;
}

/**
 * Persists one entity kind according to its table contract. Writing an existing id replaces the row.
 */
export interface TableStorePort<T> {
  upsertMany(entities: T[]): Promise<void>;
  findById(id: string): Promise<Result<T | null, ConversionError>>;
  listBy(column: string, value: string): Promise<Result<T[], ConversionError>>;
  deleteBy(column: string, value: string): Promise<number>;
}

export type ExtractedContent = {
  content: string;
};

/**
 * Structured single-field extraction: noisy page text in, main content out.
 */
export interface ContentExtractorPort {
  extract(
    text: string,
    signal?: AbortSignal,
  ): Promise<Result<ExtractedContent, AppBoundaryError>>;
}

export interface EmbeddingPort {
  embedTexts(texts: string[]): Promise<Result<number[][], AppBoundaryError>>;
}

/**
 * On-disk artifacts per page: the post-strip text and the final extracted content.
 */
export interface SiteCachePort {
  readContent(url: URL, maxAgeMs: number): Promise<string | null>;
  writeStripped(url: URL, text: string): Promise<void>;
  writeContent(url: URL, content: string): Promise<void>;
}

export interface SyncStateRepositoryPort {
  getWatermark(sourceKey: string): Promise<Date | null>;
  saveWatermark(sourceKey: string, watermark: Date): Promise<void>;
}

export interface ClockPort {
  now(): Date;
}
