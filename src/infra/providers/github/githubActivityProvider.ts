import { err, ok, type Result } from "neverthrow";
import type { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { KnowledgeRecord } from "../../../core/entities/record";
import type {
  GithubOrgDescriptor,
  GithubRepoDescriptor,
} from "../../../core/entities/source";
import type {
  GithubSourceLoaderPort,
  SourceLoadRequest,
} from "../../../core/ports/inboundPorts";
import { mapWithConcurrency } from "../../../shared/concurrency/boundedPool";
import { logger } from "../../../shared/logger/logger";
import { fromHttpError } from "../../http/boundaryError";
import { HttpClient } from "../../http/httpClient";
import {
  githubCommitSchema,
  githubIssueSchema,
  githubPullRequestSchema,
  githubRepositorySchema,
  type Fetched,
  type GithubRepository,
} from "./githubPayloads";
import {
  commitRecord,
  isUpdatedSince,
  issueRecord,
  pullRequestRecord,
  qualifiedName,
  repositoryRecord,
  type RepoRef,
} from "./githubRecords";

const PER_PAGE = 100;

export type GithubProviderOptions = {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
  maxPages?: number;
  repoConcurrency?: number;
};

export type GithubListOptions = {
  since: Date;
  /** Defaults to `github:<owner>`. */
  sourceId?: string;
  signal?: AbortSignal;
};

type PageRequest<TSchema extends z.ZodTypeAny> = {
  operation: string;
  path: string;
  query: Record<string, string>;
  schema: TSchema;
  signal?: AbortSignal;
  /** Stops paging once a page shows that later pages cannot qualify. */
  isExhausted?: (page: Array<Fetched<z.infer<TSchema>>>) => boolean;
};

/**
 * Translates GitHub REST payloads for an organization or repository into knowledge records,
 * fetching only activity updated at or after the caller's watermark.
 */
export class GithubActivityProvider implements GithubSourceLoaderPort {
  private readonly timeoutMs: number;
  private readonly maxPages: number;
  private readonly repoConcurrency: number;

  constructor(
    private readonly options: GithubProviderOptions,
    private readonly httpClient = new HttpClient(),
  ) {
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxPages = options.maxPages ?? 10;
    this.repoConcurrency = options.repoConcurrency ?? 4;

    if (!options.token.trim()) {
      logger.warn(
        "GITHUB_TOKEN is empty; GitHub requests run unauthenticated with a low rate limit.",
      );
    }
  }

  async load(
    descriptor: GithubOrgDescriptor | GithubRepoDescriptor,
    request: SourceLoadRequest,
  ): Promise<Result<KnowledgeRecord[], AppBoundaryError>> {
    if (descriptor.scope === "org") {
      return this.syncOrganization(descriptor.org, request.since, request.signal);
    }

    return this.syncRepository(
      descriptor.owner,
      descriptor.repo,
      request.since,
      request.signal,
    );
  }

  async listOrgRepositories(
    org: string,
    options: Omit<GithubListOptions, "since"> = {},
  ): Promise<Result<KnowledgeRecord[], AppBoundaryError>> {
    const sourceId = options.sourceId ?? `github:${org}`;
    const repositories = await this.fetchOrgRepositories(org, options.signal);
    if (repositories.isErr()) {
      return err(repositories.error);
    }

    const refs = this.splitQualifiedNames(org, repositories.value);
    if (refs.isErr()) {
      return err(refs.error);
    }

    return ok(
      refs.value.map(({ ref, fetched }) =>
        repositoryRecord(ref, fetched, sourceId),
      ),
    );
  }

  /**
   * Provider-side time filtering is unreliable for pulls, so the list is sorted by update time and re-filtered here.
   */
  async listPullRequests(
    owner: string,
    repo: string,
    options: GithubListOptions,
  ): Promise<Result<KnowledgeRecord[], AppBoundaryError>> {
    const ref = { owner, repo };
    const pulls = await this.fetchPages({
      operation: `list_pull_requests ${qualifiedName(ref)}`,
      path: `/repos/${this.segment(owner)}/${this.segment(repo)}/pulls`,
      query: { state: "all", sort: "updated", direction: "desc" },
      schema: githubPullRequestSchema,
      signal: options.signal,
      isExhausted: (page) =>
        !isUpdatedSince(page.at(-1)?.value.updated_at, options.since),
    });

    return pulls.map((items) =>
      items
        .filter((item) => isUpdatedSince(item.value.updated_at, options.since))
        .map((item) =>
          pullRequestRecord(ref, item, options.sourceId ?? `github:${owner}`),
        ),
    );
  }

  /**
   * The issues endpoint also returns pull requests; those carry a `pull_request` marker and are dropped.
   */
  async listIssues(
    owner: string,
    repo: string,
    options: GithubListOptions,
  ): Promise<Result<KnowledgeRecord[], AppBoundaryError>> {
    const ref = { owner, repo };
    const issues = await this.fetchPages({
      operation: `list_issues ${qualifiedName(ref)}`,
      path: `/repos/${this.segment(owner)}/${this.segment(repo)}/issues`,
      query: {
        state: "all",
        sort: "updated",
        direction: "desc",
        since: options.since.toISOString(),
      },
      schema: githubIssueSchema,
      signal: options.signal,
      isExhausted: (page) =>
        !isUpdatedSince(page.at(-1)?.value.updated_at, options.since),
    });

    return issues.map((items) =>
      items
        .filter(
          (item) =>
            isUpdatedSince(item.value.updated_at, options.since) &&
            (item.value.pull_request === undefined ||
              item.value.pull_request === null),
        )
        .map((item) =>
          issueRecord(ref, item, options.sourceId ?? `github:${owner}`),
        ),
    );
  }

  /**
   * Commits support `since` natively, so the provider's filtering is trusted.
   */
  async listCommits(
    owner: string,
    repo: string,
    options: GithubListOptions,
  ): Promise<Result<KnowledgeRecord[], AppBoundaryError>> {
    const ref = { owner, repo };
    const commits = await this.fetchPages({
      operation: `list_commits ${qualifiedName(ref)}`,
      path: `/repos/${this.segment(owner)}/${this.segment(repo)}/commits`,
      query: { since: options.since.toISOString() },
      schema: githubCommitSchema,
      signal: options.signal,
    });

    return commits.map((items) =>
      items.map((item) =>
        commitRecord(ref, item, options.sourceId ?? `github:${owner}`),
      ),
    );
  }

  /**
   * Fetches the repository list once, then each repository's activity on a bounded worker pool.
   * Output follows the organization listing order; within a repository: summary, pulls, issues, commits.
   */
  async syncOrganization(
    org: string,
    since: Date,
    signal?: AbortSignal,
  ): Promise<Result<KnowledgeRecord[], AppBoundaryError>> {
    const sourceId = `github:${org}`;
    const repositories = await this.fetchOrgRepositories(org, signal);
    if (repositories.isErr()) {
      return err(repositories.error);
    }

    const refs = this.splitQualifiedNames(org, repositories.value);
    if (refs.isErr()) {
      return err(refs.error);
    }

    let firstFailure: AppBoundaryError | undefined;
    const perRepository = await mapWithConcurrency(
      refs.value,
      this.repoConcurrency,
      async ({ ref, fetched }) => {
        if (firstFailure) {
          return ok<KnowledgeRecord[], AppBoundaryError>([]);
        }

        const activity = await this.fetchActivity(ref, {
          since,
          sourceId,
          signal,
        });
        if (activity.isErr()) {
          firstFailure ??= activity.error;
          return err<KnowledgeRecord[], AppBoundaryError>(activity.error);
        }

        return ok<KnowledgeRecord[], AppBoundaryError>([
          repositoryRecord(ref, fetched, sourceId),
          ...activity.value,
        ]);
      },
    );

    const records: KnowledgeRecord[] = [];
    for (const result of perRepository) {
      if (result.isErr()) {
        return err(result.error);
      }
      records.push(...result.value);
    }

    logger.debug(
      { org, repositories: refs.value.length, records: records.length },
      "GitHub organization synced",
    );

    return ok(records);
  }

  async syncRepository(
    owner: string,
    repo: string,
    since: Date,
    signal?: AbortSignal,
  ): Promise<Result<KnowledgeRecord[], AppBoundaryError>> {
    const ref = { owner, repo };
    const sourceId = `github:${qualifiedName(ref)}`;
    const operation = `get_repository ${qualifiedName(ref)}`;

    const payload = await this.httpClient.requestJson({
      url: this.buildUrl(
        `/repos/${this.segment(owner)}/${this.segment(repo)}`,
        {},
      ),
      method: "GET",
      headers: this.headers(),
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 250,
      signal,
    });
    if (payload.isErr()) {
      return err(fromHttpError("github", "github", operation, payload.error));
    }

    const parsed = githubRepositorySchema.safeParse(payload.value);
    if (!parsed.success) {
      return err(
        this.malformed(operation, "Repository payload was malformed.", parsed.error),
      );
    }

    const activity = await this.fetchActivity(ref, { since, sourceId, signal });
    return activity.map((records) => [
      repositoryRecord(ref, { value: parsed.data, raw: payload.value }, sourceId),
      ...records,
    ]);
  }

  private async fetchActivity(
    ref: RepoRef,
    options: GithubListOptions,
  ): Promise<Result<KnowledgeRecord[], AppBoundaryError>> {
    const pulls = await this.listPullRequests(ref.owner, ref.repo, options);
    if (pulls.isErr()) return err(pulls.error);

    const issues = await this.listIssues(ref.owner, ref.repo, options);
    if (issues.isErr()) return err(issues.error);

    const commits = await this.listCommits(ref.owner, ref.repo, options);
    if (commits.isErr()) return err(commits.error);

    return ok([...pulls.value, ...issues.value, ...commits.value]);
  }

  private async fetchOrgRepositories(
    org: string,
    signal?: AbortSignal,
  ): Promise<Result<Array<Fetched<GithubRepository>>, AppBoundaryError>> {
    return this.fetchPages({
      operation: `list_org_repositories ${org}`,
      path: `/orgs/${this.segment(org)}/repos`,
      query: {},
      schema: githubRepositorySchema,
      signal,
    });
  }

  /**
   * A repository whose qualified name is not `owner/repo` is an upstream anomaly and fails the whole sync.
   */
  private splitQualifiedNames(
    org: string,
    repositories: Array<Fetched<GithubRepository>>,
  ): Result<
    Array<{ ref: RepoRef; fetched: Fetched<GithubRepository> }>,
    AppBoundaryError
  > {
    const refs: Array<{ ref: RepoRef; fetched: Fetched<GithubRepository> }> =
      [];

    for (const fetched of repositories) {
      const fullName = fetched.value.full_name ?? fetched.value.name;
      const separator = fullName.indexOf("/");
      const owner = fullName.slice(0, separator);
      const repo = fullName.slice(separator + 1);

      if (separator < 0 || !owner || !repo) {
        return err(
          this.malformed(
            `list_org_repositories ${org}`,
            `Repository name '${fullName}' cannot be split into owner/repo.`,
          ),
        );
      }

      refs.push({ ref: { owner, repo }, fetched });
    }

    return ok(refs);
  }

  /**
   * A listing that is still full at `maxPages` is a `limit_exceeded` error, never a partial result.
   */
  private async fetchPages<TSchema extends z.ZodTypeAny>(
    request: PageRequest<TSchema>,
  ): Promise<Result<Array<Fetched<z.infer<TSchema>>>, AppBoundaryError>> {
    const collected: Array<Fetched<z.infer<TSchema>>> = [];

    for (let page = 1; page <= this.maxPages; page += 1) {
      const payload = await this.httpClient.requestJson({
        url: this.buildUrl(request.path, {
          ...request.query,
          per_page: String(PER_PAGE),
          page: String(page),
        }),
        method: "GET",
        headers: this.headers(),
        timeoutMs: this.timeoutMs,
        retries: 2,
        retryDelayMs: 250,
        signal: request.signal,
      });

      if (payload.isErr()) {
        return err(
          fromHttpError("github", "github", request.operation, payload.error),
        );
      }

      if (!Array.isArray(payload.value)) {
        return err(
          this.malformed(request.operation, "GitHub response was not an array."),
        );
      }

      const items: Array<Fetched<z.infer<TSchema>>> = [];
      for (const raw of payload.value) {
        const parsed = request.schema.safeParse(raw);
        if (!parsed.success) {
          return err(
            this.malformed(
              request.operation,
              "GitHub response contained a malformed entity.",
              parsed.error,
            ),
          );
        }
        items.push({ value: parsed.data, raw });
      }

      collected.push(...items);

      const isLastPage = payload.value.length < PER_PAGE;
      if (isLastPage || request.isExhausted?.(items)) {
        return ok(collected);
      }
    }

    logger.warn(
      { operation: request.operation, maxPages: this.maxPages },
      "GitHub paging reached the configured page limit",
    );

    return err({
      source: "github",
      code: "limit_exceeded",
      provider: "github",
      operation: request.operation,
      message: `${request.operation} failed: more than ${this.maxPages} pages of results; raise GITHUB_MAX_PAGES or move the watermark forward.`,
      retryable: false,
    });
  }

  private buildUrl(path: string, query: Record<string, string>): string {
    const url = new URL(`${this.options.baseUrl.replace(/\/+$/, "")}${path}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      accept: "application/vnd.github+json",
      "x-github-api-version": "2022-11-28",
      "user-agent": "knowledge-ingest",
    };

    if (this.options.token.trim()) {
      headers.authorization = `Bearer ${this.options.token.trim()}`;
    }

    return headers;
  }

  private segment(value: string): string {
    return encodeURIComponent(value);
  }

  private malformed(
    operation: string,
    message: string,
    cause?: unknown,
  ): AppBoundaryError {
    return {
      source: "github",
      code: "malformed_response",
      provider: "github",
      operation,
      message: `${operation} failed: ${message}`,
      retryable: false,
      cause,
    };
  }
}
