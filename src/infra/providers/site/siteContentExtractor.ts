import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { KnowledgeRecord } from "../../../core/entities/record";
import type { SiteDescriptor } from "../../../core/entities/source";
import type {
  SiteSourceLoaderPort,
  SourceLoadRequest,
} from "../../../core/ports/inboundPorts";
import type {
  ContentExtractorPort,
  SiteCachePort,
} from "../../../core/ports/outboundPorts";
import { logger } from "../../../shared/logger/logger";
import { fromHttpError } from "../../http/boundaryError";
import { HttpClient } from "../../http/httpClient";
import { htmlToNearText } from "./htmlText";

export type SiteExtractorDeps = {
  extractor: ContentExtractorPort;
  cache: SiteCachePort;
  httpClient?: HttpClient;
  fetchTimeoutMs?: number;
  /** 0 disables the cached-content read path. */
  cacheTtlMs?: number;
};

const siteError = (
  operation: string,
  code: AppBoundaryError["code"],
  message: string,
  cause?: unknown,
): AppBoundaryError => ({
  source: "site",
  code,
  provider: "http",
  operation,
  message,
  retryable: false,
  cause,
});

/**
 * Fetches one page, strips it mechanically, then asks the extraction capability for the main content.
 * URL, fetch and extraction failures all surface as a `site` boundary error carrying the original cause.
 */
export class SiteContentExtractor {
  private readonly httpClient: HttpClient;

  private constructor(
    readonly url: URL,
    private readonly deps: SiteExtractorDeps,
  ) {
    this.httpClient = deps.httpClient ?? new HttpClient();
  }

  static create(
    rawUrl: string,
    deps: SiteExtractorDeps,
  ): Result<SiteContentExtractor, AppBoundaryError> {
    try {
      return ok(new SiteContentExtractor(new URL(rawUrl), deps));
    } catch (error) {
      return err(
        siteError(
          `parse_url ${rawUrl}`,
          "config_invalid",
          `'${rawUrl}' is not a valid URL.`,
          error,
        ),
      );
    }
  }

  async extract(signal?: AbortSignal): Promise<Result<string, AppBoundaryError>> {
    const cached = await this.readCached();
    if (cached !== null) {
      return ok(cached);
    }

    logger.debug({ url: this.url.href }, "Fetching and extracting site content");

    const page = await this.httpClient.requestText({
      url: this.url.href,
      method: "GET",
      headers: { accept: "text/html,application/xhtml+xml" },
      timeoutMs: this.deps.fetchTimeoutMs ?? 20_000,
      retries: 0,
      retryDelayMs: 0,
      signal,
    });
    if (page.isErr()) {
      return err(
        fromHttpError("site", "http", `fetch_page ${this.url.href}`, page.error),
      );
    }

    const nearText = htmlToNearText(page.value);
    await this.writeArtifact("stripped", () =>
      this.deps.cache.writeStripped(this.url, nearText),
    );

    const operation = `extract_content ${this.url.href}`;
    const extracted = await this.deps.extractor.extract(nearText, signal);
    if (extracted.isErr()) {
      return err({
        ...extracted.error,
        source: "site",
        operation,
        message: `${operation} failed: ${extracted.error.message}`,
        cause: extracted.error,
      });
    }

    const content = extracted.value.content.trim();
    if (!content) {
      return err(
        siteError(
          operation,
          "malformed_response",
          `${operation} failed: extraction returned empty content.`,
        ),
      );
    }

    await this.writeArtifact("content", () =>
      this.deps.cache.writeContent(this.url, content),
    );

    return ok(content);
  }

  private async readCached(): Promise<string | null> {
    const ttl = this.deps.cacheTtlMs ?? 0;
    if (ttl <= 0) {
      return null;
    }

    try {
      const cached = await this.deps.cache.readContent(this.url, ttl);
      if (cached !== null) {
        logger.info({ url: this.url.href }, "Using cached site content");
      }
      return cached;
    } catch (error) {
      logger.warn(
        { url: this.url.href, error: error instanceof Error ? error.message : String(error) },
        "Site cache read failed; fetching page",
      );
      return null;
    }
  }

  /**
   * Cache write failures lose the artifact, not the page.
   */
  private async writeArtifact(
    artifact: "stripped" | "content",
    write: () => Promise<void>,
  ): Promise<void> {
    try {
      await write();
    } catch (error) {
      logger.warn(
        {
          url: this.url.href,
          artifact,
          error: error instanceof Error ? error.message : String(error),
        },
        "Site cache write failed",
      );
    }
  }
}

/**
 * Turns a `site:<url>` descriptor into one record keyed by the URL.
 */
export class SiteSourceLoader implements SiteSourceLoaderPort {
  constructor(private readonly deps: SiteExtractorDeps) {}

  async load(
    descriptor: SiteDescriptor,
    request: SourceLoadRequest,
  ): Promise<Result<KnowledgeRecord[], AppBoundaryError>> {
    const extractor = SiteContentExtractor.create(descriptor.locator, this.deps);
    if (extractor.isErr()) {
      return err(extractor.error);
    }

    const content = await extractor.value.extract(request.signal);
    return content.map((text) => [
      {
        id: `site:${descriptor.locator}`,
        sourceId: `site:${descriptor.locator}`,
        content: text,
        metadata: {
          source_type: "site",
          source_url: descriptor.locator,
        },
      },
    ]);
  }
}
