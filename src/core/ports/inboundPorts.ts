import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { LoadSourcesResult } from "../entities/ingestion";
import type { KnowledgeRecord } from "../entities/record";
import type {
  FileDescriptor,
  GithubOrgDescriptor,
  GithubRepoDescriptor,
  SiteDescriptor,
  SourceDescriptor,
} from "../entities/source";

export type SourceLoadRequest = {
  /** Watermark: only entities updated at or after this instant are fetched where the provider supports it. */
  since: Date;
  signal?: AbortSignal;
};

export interface SourceLoaderPort<
  TDescriptor extends SourceDescriptor = SourceDescriptor,
> {
  load(
    descriptor: TDescriptor,
    request: SourceLoadRequest,
  ): Promise<Result<KnowledgeRecord[], AppBoundaryError>>;
}

export type GithubSourceLoaderPort = SourceLoaderPort<
  GithubOrgDescriptor | GithubRepoDescriptor
>;
export type SiteSourceLoaderPort = SourceLoaderPort<SiteDescriptor>;
export type FileSourceLoaderPort = SourceLoaderPort<FileDescriptor>;

export type SourceLoaderRegistry = {
  github: GithubSourceLoaderPort;
  site: SiteSourceLoaderPort;
  file: FileSourceLoaderPort;
  pdf?: FileSourceLoaderPort;
};

export type LoadSourcesOptions = {
  since: Date | ((descriptor: SourceDescriptor) => Date);
  timeoutMs?: number;
  signal?: AbortSignal;
};

export interface MultiSourceLoaderPort {
  loadSources(
    sources: string[],
    options: LoadSourcesOptions,
  ): Promise<LoadSourcesResult>;
}
