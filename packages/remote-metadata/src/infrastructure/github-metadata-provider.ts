import type { RemoteRepositoryMetadata } from "@repohealth/core";
import { createDefaultRemoteMetadata, type RepositoryMetadataProvider } from "../domain/types.js";
import { fetchJson, type FetchLike } from "./fetch-json.js";

export type GitHubMetadataProviderOptions = {
  token?: string;
  apiBaseUrl?: string;
  userAgent?: string;
  repositoryTimeoutMs?: number;
  pullRequestTimeoutMs?: number;
  retries?: number;
  retryBaseDelayMs?: number;
  fetchImpl?: FetchLike;
};

export const DEFAULT_GITHUB_API_BASE_URL = "https://api.github.com";
export const DEFAULT_USER_AGENT = "repohealth/0.1.0";

const DEFAULT_REPOSITORY_TIMEOUT_MS = 10_000;
const DEFAULT_PULL_REQUEST_TIMEOUT_MS = 5_000;
const DEFAULT_RETRY_BASE_DELAY_MS = 500;

type RepositoryPayload = {
  stars: number;
  rawOpenIssues: number;
  lastActivityAt: string | null;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toCount = (value: unknown): number =>
  typeof value === "number" && Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;

const toIsoTimestamp = (value: unknown): string | null => {
  if (typeof value !== "string") {
    return null;
  }

  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : new Date(parsed).toISOString();
};

const parseRepositoryPayload = (payload: unknown): RepositoryPayload | null => {
  if (!isRecord(payload)) {
    return null;
  }

  return {
    stars: toCount(payload["stargazers_count"]),
    rawOpenIssues: toCount(payload["open_issues_count"]),
    lastActivityAt: toIsoTimestamp(payload["updated_at"]),
  };
};

export class GitHubRepositoryMetadataProvider implements RepositoryMetadataProvider {
  private readonly cache = new Map<string, RemoteRepositoryMetadata>();

  constructor(private readonly options: GitHubMetadataProviderOptions = {}) {}

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": this.options.userAgent ?? DEFAULT_USER_AGENT,
      Accept: "application/vnd.github+json",
    };
    if (this.options.token !== undefined && this.options.token.length > 0) {
      headers["Authorization"] = `Bearer ${this.options.token}`;
    }

    return headers;
  }

  private request(path: string, timeoutMs: number): Promise<unknown> {
    const baseUrl = this.options.apiBaseUrl ?? DEFAULT_GITHUB_API_BASE_URL;
    return fetchJson(`${baseUrl}${path}`, {
      headers: this.headers(),
      timeoutMs,
      retries: this.options.retries ?? 0,
      baseDelayMs: this.options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS,
      ...(this.options.fetchImpl === undefined ? {} : { fetchImpl: this.options.fetchImpl }),
    });
  }

  private async fetchOpenPullRequestCount(repository: string): Promise<number | null> {
    try {
      const payload = await this.request(
        `/repos/${repository}/pulls?state=open&per_page=100`,
        this.options.pullRequestTimeoutMs ?? DEFAULT_PULL_REQUEST_TIMEOUT_MS,
      );
      return Array.isArray(payload) ? payload.length : null;
    } catch {
      return null;
    }
  }

  private async fetchMetadata(repository: string): Promise<RemoteRepositoryMetadata> {
    const defaults = createDefaultRemoteMetadata(repository);

    let repositoryPayload: RepositoryPayload | null;
    try {
      repositoryPayload = parseRepositoryPayload(
        await this.request(
          `/repos/${repository}`,
          this.options.repositoryTimeoutMs ?? DEFAULT_REPOSITORY_TIMEOUT_MS,
        ),
      );
    } catch {
      return defaults;
    }

    if (repositoryPayload === null) {
      return defaults;
    }

    // GitHub's open_issues_count includes open pull requests.
    const openPullRequests = await this.fetchOpenPullRequestCount(repository);

    return {
      ...defaults,
      stars: repositoryPayload.stars,
      openIssues:
        openPullRequests === null
          ? repositoryPayload.rawOpenIssues
          : Math.max(0, repositoryPayload.rawOpenIssues - openPullRequests),
      openPullRequests: openPullRequests ?? 0,
      lastActivityAt: repositoryPayload.lastActivityAt,
    };
  }

  async getRepositoryMetadata(repository: string): Promise<RemoteRepositoryMetadata> {
    const cached = this.cache.get(repository);
    if (cached !== undefined) {
      return cached;
    }

    const metadata = await this.fetchMetadata(repository);
    this.cache.set(repository, metadata);
    return metadata;
  }
}
