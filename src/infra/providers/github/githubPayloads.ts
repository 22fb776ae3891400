import { z } from "zod";

const nullableString = z.string().nullable().optional();

const githubUserSchema = z
  .object({ login: z.string() })
  .passthrough()
  .nullable()
  .optional();

export const githubRepositorySchema = z
  .object({
    name: z.string(),
    full_name: z.string().optional(),
    description: nullableString,
    html_url: z.string(),
    created_at: nullableString,
    updated_at: nullableString,
  })
  .passthrough();

export const githubPullRequestSchema = z
  .object({
    number: z.number().int(),
    title: nullableString,
    user: githubUserSchema,
    state: nullableString,
    html_url: nullableString,
    body: nullableString,
    created_at: nullableString,
    updated_at: nullableString,
  })
  .passthrough();

export const githubIssueSchema = githubPullRequestSchema.extend({
  // Present only when the "issue" is really a pull request.
  pull_request: z.unknown().optional(),
});

export const githubCommitSchema = z
  .object({
    sha: z.string(),
    html_url: nullableString,
    author: githubUserSchema,
    commit: z
      .object({
        message: z.string(),
        author: z
          .object({ name: nullableString, date: nullableString })
          .passthrough()
          .nullable()
          .optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type GithubRepository = z.infer<typeof githubRepositorySchema>;
export type GithubPullRequest = z.infer<typeof githubPullRequestSchema>;
export type GithubIssue = z.infer<typeof githubIssueSchema>;
export type GithubCommit = z.infer<typeof githubCommitSchema>;

/**
 * A validated provider entity next to the payload exactly as received.
 */
export type Fetched<T> = {
  value: T;
  raw: unknown;
};
