import { IngestionService } from "../services/ingestionService";
import { MultiSourceLoader } from "../services/multiSourceLoader";
import type { KnowledgeRecord } from "../../core/entities/record";
import type { SourceLoaderRegistry } from "../../core/ports/inboundPorts";
import type {
  RecordSinkPort,
  SyncStateRepositoryPort,
  TableStorePort,
} from "../../core/ports/outboundPorts";
import { documentsContract } from "../../core/storage/tableContracts";
import { createDb } from "../../infra/db/client";
import { PostgresTableStore } from "../../infra/db/postgresTableStore";
import { EMBEDDING_DIMENSIONS } from "../../infra/db/schema";
import { PostgresSyncStateRepository } from "../../infra/db/syncStateRepository";
import { HttpClient } from "../../infra/http/httpClient";
import { OllamaContentExtractor } from "../../infra/llm/ollamaContentExtractor";
import { OllamaEmbedding } from "../../infra/llm/ollamaEmbedding";
import { GlobFileLoader } from "../../infra/providers/file/fileSourceLoader";
import { GithubActivityProvider } from "../../infra/providers/github/githubActivityProvider";
import { FsSiteCache } from "../../infra/providers/site/fsSiteCache";
import { SiteSourceLoader } from "../../infra/providers/site/siteContentExtractor";
import { InMemorySyncStateRepository } from "../../infra/store/inMemorySyncStateRepository";
import { InMemoryTableStore } from "../../infra/store/inMemoryTableStore";
import { TableRecordSink } from "../../infra/store/tableRecordSink";
import { SystemClock } from "../../infra/system/systemPorts";
import { env, type StoreName } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";

type Persistence = {
  documents: TableStorePort<KnowledgeRecord>;
  sink: RecordSinkPort;
  syncState: SyncStateRepositoryPort;
  close: () => Promise<void>;
};

const createPersistence = (
  store: StoreName,
  httpClient: HttpClient,
): Persistence => {
  if (store === "memory") {
    const documents = new InMemoryTableStore(documentsContract);
    return {
      documents,
      sink: new TableRecordSink(documents, "memory"),
      syncState: new InMemorySyncStateRepository(),
      close: async () => undefined,
    };
  }

  if (env.EMBEDDING_DIMENSION !== EMBEDDING_DIMENSIONS) {
    logger.warn(
      { configured: env.EMBEDDING_DIMENSION, column: EMBEDDING_DIMENSIONS },
      "EMBEDDING_DIMENSION differs from the embedding column; inserts will be rejected",
    );
  }

  const { db, sql, close } = createDb(env.POSTGRES_URL);
  const embedder = new OllamaEmbedding(
    env.OLLAMA_BASE_URL,
    env.OLLAMA_EMBED_MODEL,
    env.EMBEDDING_DIMENSION,
    env.OLLAMA_EMBED_TIMEOUT_MS,
    httpClient,
  );
  const documents = new PostgresTableStore(sql, documentsContract, embedder);

  return {
    documents,
    sink: new TableRecordSink(documents, "postgres"),
    syncState: new PostgresSyncStateRepository(db),
    close,
  };
};

export type RuntimeOptions = {
  store?: StoreName;
};

/**
 * Composition root shared by every CLI command.
 */
export const createRuntime = (options: RuntimeOptions = {}) => {
  const clock = new SystemClock();
  const httpClient = new HttpClient();

  const loaders: SourceLoaderRegistry = {
    github: new GithubActivityProvider(
      {
        baseUrl: env.GITHUB_API_BASE_URL,
        token: env.GITHUB_TOKEN,
        timeoutMs: env.GITHUB_TIMEOUT_MS,
        maxPages: env.GITHUB_MAX_PAGES,
        repoConcurrency: env.GITHUB_REPO_CONCURRENCY,
      },
      httpClient,
    ),
    site: new SiteSourceLoader({
      extractor: new OllamaContentExtractor(
        env.OLLAMA_BASE_URL,
        env.OLLAMA_CHAT_MODEL,
        env.OLLAMA_CHAT_TIMEOUT_MS,
        httpClient,
      ),
      cache: new FsSiteCache(env.SOURCES_PATH),
      httpClient,
      fetchTimeoutMs: env.SITE_FETCH_TIMEOUT_MS,
      cacheTtlMs: env.SITE_CACHE_TTL_SECONDS * 1_000,
    }),
    file: new GlobFileLoader("file"),
    pdf: new GlobFileLoader("pdf"),
  };

  const persistence = createPersistence(options.store ?? env.APP_STORE, httpClient);
  const loader = new MultiSourceLoader(loaders, clock);
  const ingestionService = new IngestionService(
    loader,
    persistence.sink,
    persistence.syncState,
    clock,
    env.APP_DEFAULT_LOOKBACK_DAYS,
  );

  return {
    loader,
    ingestionService,
    documents: persistence.documents,
    close: persistence.close,
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
