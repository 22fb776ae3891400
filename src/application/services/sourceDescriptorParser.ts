import {
  sourceTypes,
  type DescriptorParseOutcome,
  type SourceDescriptor,
  type SourceType,
} from "../../core/entities/source";

const githubNamePattern = /^[A-Za-z0-9_.-]+$/;

const isSourceType = (value: string): value is SourceType =>
  sourceTypes.some((type) => type === value);

type GithubTarget =
  | { scope: "org"; org: string }
  | { scope: "repo"; owner: string; repo: string };

/**
 * Accepts `org`, `owner/repo`, or a github.com URL naming either.
 */
const parseGithubTarget = (locator: string): GithubTarget | null => {
  let segments: string[];

  if (/^https?:\/\//i.test(locator)) {
    try {
      segments = new URL(locator).pathname.split("/").filter(Boolean);
    } catch {
      return null;
    }
  } else {
    segments = locator.split("/");
    if (segments.length > 2) {
      return null;
    }
  }

  const [owner, rawRepo] = segments;
  if (!owner || !githubNamePattern.test(owner)) {
    return null;
  }

  if (rawRepo === undefined) {
    return { scope: "org", org: owner };
  }

  const repo = rawRepo.replace(/\.git$/, "");
  if (!githubNamePattern.test(repo)) {
    return null;
  }

  return { scope: "repo", owner, repo };
};

const parseHttpUrl = (locator: string): URL | null => {
  try {
    const url = new URL(locator);
    return url.protocol === "http:" || url.protocol === "https:" ? url : null;
  } catch {
    return null;
  }
};

/**
 * Splits on the first colon only, since locators (URLs) carry their own colons.
 * Never throws: anything unusable comes back as a skip with a reason.
 */
export const parseSourceDescriptor = (raw: string): DescriptorParseOutcome => {
  const separator = raw.indexOf(":");
  if (separator < 0) {
    return {
      status: "skipped",
      raw,
      reason: "missing_separator",
      detail: "Expected '<type>:<locator>'.",
    };
  }

  const type = raw.slice(0, separator).trim().toLowerCase();
  const locator = raw.slice(separator + 1).trim();

  if (!isSourceType(type)) {
    return {
      status: "skipped",
      raw,
      reason: "unknown_type",
      detail: `Unknown source type '${type}'. Expected one of: ${sourceTypes.join(", ")}.`,
    };
  }

  if (!locator) {
    return {
      status: "skipped",
      raw,
      reason: "empty_locator",
      detail: `Source type '${type}' needs a locator.`,
    };
  }

  const descriptor = toDescriptor(type, raw, locator);
  if (!descriptor) {
    return {
      status: "skipped",
      raw,
      reason: "invalid_locator",
      detail: `'${locator}' is not a valid ${type} locator.`,
    };
  }

  return { status: "parsed", raw, descriptor };
};

const toDescriptor = (
  type: SourceType,
  raw: string,
  locator: string,
): SourceDescriptor | null => {
  switch (type) {
    case "github": {
      const target = parseGithubTarget(locator);
      if (!target) return null;
      return target.scope === "org"
        ? { type, scope: "org", raw, locator, org: target.org }
        : {
            type,
            scope: "repo",
            raw,
            locator,
            owner: target.owner,
            repo: target.repo,
          };
    }
    case "site": {
      const url = parseHttpUrl(locator);
      return url ? { type, raw, locator, url } : null;
    }
    case "file":
    case "pdf":
      return { type, raw, locator, pattern: locator };
  }
};

export const parseSourceDescriptors = (
  sources: string[],
): DescriptorParseOutcome[] => sources.map(parseSourceDescriptor);

/**
 * Groups records under one logical origin: the org (or repo) for GitHub, the locator otherwise.
 */
export const sourceIdOf = (descriptor: SourceDescriptor): string => {
  if (descriptor.type === "github") {
    return descriptor.scope === "org"
      ? `github:${descriptor.org}`
      : `github:${descriptor.owner}/${descriptor.repo}`;
  }

  return `${descriptor.type}:${descriptor.locator}`;
};
