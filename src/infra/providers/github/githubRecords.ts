import type { KnowledgeRecord } from "../../../core/entities/record";
import type {
  Fetched,
  GithubCommit,
  GithubIssue,
  GithubPullRequest,
  GithubRepository,
} from "./githubPayloads";

export type RepoRef = {
  owner: string;
  repo: string;
};

export const qualifiedName = (ref: RepoRef): string =>
  `${ref.owner}/${ref.repo}`;

/**
 * Parses a provider timestamp; anything missing or unparseable becomes undefined.
 */
export const parseTimestamp = (
  value: string | null | undefined,
): Date | undefined => {
  if (!value) {
    return undefined;
  }

  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
};

export const isUpdatedSince = (
  updatedAt: string | null | undefined,
  since: Date,
): boolean => {
  const parsed = parseTimestamp(updatedAt);
  return parsed !== undefined && parsed.getTime() >= since.getTime();
};

const withCreatedAt = (
  record: KnowledgeRecord,
  createdAt: Date | undefined,
): KnowledgeRecord =>
  createdAt === undefined ? record : { ...record, createdAt };

export const repositoryRecord = (
  ref: RepoRef,
  fetched: Fetched<GithubRepository>,
  sourceId: string,
): KnowledgeRecord => {
  const repository = fetched.value;
  const name = qualifiedName(ref);
  const content = [
    `Repository: ${name}`,
    `Description: ${repository.description ?? "No description"}`,
    `URL: ${repository.html_url}`,
    `Created: ${repository.created_at ?? ""}`,
    `Last Updated: ${repository.updated_at ?? ""}`,
  ].join("\n");

  return withCreatedAt(
    {
      id: `github:repo:${name}`,
      sourceId,
      content,
      metadata: fetched.raw,
    },
    parseTimestamp(repository.created_at),
  );
};

const discussionContent = (
  heading: "Pull Request" | "Issue",
  entity: GithubPullRequest,
): string =>
  [
    `${heading}: #${entity.number} - ${entity.title ?? ""}`,
    `Author: @${entity.user?.login ?? ""}`,
    `State: ${entity.state ?? "unknown"}`,
    `URL: ${entity.html_url ?? ""}`,
    `Created: ${entity.created_at ?? ""}`,
    `Last Updated: ${entity.updated_at ?? ""}`,
    "",
    entity.body ?? "",
  ].join("\n");

export const pullRequestRecord = (
  ref: RepoRef,
  fetched: Fetched<GithubPullRequest>,
  sourceId: string,
): KnowledgeRecord =>
  withCreatedAt(
    {
      id: `github:pr:${ref.owner}:${qualifiedName(ref)}/${fetched.value.number}`,
      sourceId,
      content: discussionContent("Pull Request", fetched.value),
      metadata: fetched.raw,
    },
    parseTimestamp(fetched.value.created_at),
  );

export const issueRecord = (
  ref: RepoRef,
  fetched: Fetched<GithubIssue>,
  sourceId: string,
): KnowledgeRecord =>
  withCreatedAt(
    {
      id: `github:issue:${ref.owner}:${qualifiedName(ref)}/${fetched.value.number}`,
      sourceId,
      content: discussionContent("Issue", fetched.value),
      metadata: fetched.raw,
    },
    parseTimestamp(fetched.value.created_at),
  );

export const commitRecord = (
  ref: RepoRef,
  fetched: Fetched<GithubCommit>,
  sourceId: string,
): KnowledgeRecord => {
  const commit = fetched.value;
  const authorDate = commit.commit.author?.date;
  const author = commit.author
    ? `@${commit.author.login}`
    : (commit.commit.author?.name ?? "");
  const content = [
    `Commit: ${commit.sha}`,
    `Author: ${author}`,
    `Date: ${authorDate ?? ""}`,
    `URL: ${commit.html_url ?? ""}`,
    "",
    commit.commit.message,
  ].join("\n");

  return withCreatedAt(
    {
      id: `github:commit:${ref.owner}:${qualifiedName(ref)}/${commit.sha}`,
      sourceId,
      content,
      metadata: fetched.raw,
    },
    parseTimestamp(authorDate),
  );
};
