export const sourceTypes = ["github", "site", "file", "pdf"] as const;

export type SourceType = (typeof sourceTypes)[number];

export type GithubOrgDescriptor = {
  type: "github";
  scope: "org";
  raw: string;
  locator: string;
  org: string;
};

export type GithubRepoDescriptor = {
  type: "github";
  scope: "repo";
  raw: string;
  locator: string;
  owner: string;
  repo: string;
};

export type SiteDescriptor = {
  type: "site";
  raw: string;
  locator: string;
  url: URL;
};

export type FileDescriptor = {
  type: "file" | "pdf";
  raw: string;
  locator: string;
  pattern: string;
};

export type SourceDescriptor =
  | GithubOrgDescriptor
  | GithubRepoDescriptor
  | SiteDescriptor
  | FileDescriptor;

export type DescriptorSkipReason =
  | "missing_separator"
  | "unknown_type"
  | "empty_locator"
  | "invalid_locator";

export type DescriptorParseOutcome =
  | { status: "parsed"; raw: string; descriptor: SourceDescriptor }
  | {
      status: "skipped";
      raw: string;
      reason: DescriptorSkipReason;
      detail: string;
    };
