import { describe, expect, it } from "vitest";
import type { FetchLike } from "./fetch-json.js";
import { GitHubRepositoryMetadataProvider } from "./github-metadata-provider.js";
import { NoopRepositoryMetadataProvider } from "./noop-metadata-provider.js";

type RecordedCall = {
  url: string;
  init: RequestInit;
};

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });

const createFetch = (
  responses: ReadonlyArray<Response | Error>,
): { fetchImpl: FetchLike; calls: RecordedCall[] } => {
  const calls: RecordedCall[] = [];
  let index = 0;
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, init });
    const response = responses[index];
    index += 1;
    if (response === undefined) {
      throw new Error(`unexpected request ${url}`);
    }

    if (response instanceof Error) {
      throw response;
    }

    return response;
  };

  return { fetchImpl, calls };
};

const defaults = {
  repository: "acme/widgets",
  stars: 0,
  openIssues: 0,
  openPullRequests: 0,
  lastActivityAt: null,
  workflowStatus: "unknown",
};

describe("GitHubRepositoryMetadataProvider", () => {
  it("separates pull requests from the open issue count", async () => {
    const { fetchImpl, calls } = createFetch([
      jsonResponse({
        stargazers_count: 1532,
        open_issues_count: 30,
        updated_at: "2026-10-15T12:00:00Z",
      }),
      jsonResponse(Array.from({ length: 10 }, (_, number) => ({ number }))),
    ]);
    const provider = new GitHubRepositoryMetadataProvider({ token: "test-token", fetchImpl });

    const metadata = await provider.getRepositoryMetadata("acme/widgets");

    expect(metadata).toEqual({
      repository: "acme/widgets",
      stars: 1532,
      openIssues: 20,
      openPullRequests: 10,
      lastActivityAt: "2026-10-15T12:00:00.000Z",
      workflowStatus: "unknown",
    });
    expect(calls.map((call) => call.url)).toEqual([
      "https://api.github.com/repos/acme/widgets",
      "https://api.github.com/repos/acme/widgets/pulls?state=open&per_page=100",
    ]);
    expect(calls[0]?.init.headers).toEqual({
      "User-Agent": "repohealth/0.1.0",
      Accept: "application/vnd.github+json",
      Authorization: "Bearer test-token",
    });
  });

  it("omits the authorization header without a token", async () => {
    const { fetchImpl, calls } = createFetch([
      jsonResponse({ stargazers_count: 3, open_issues_count: 0 }),
      jsonResponse([]),
    ]);
    const provider = new GitHubRepositoryMetadataProvider({ fetchImpl });

    await provider.getRepositoryMetadata("acme/widgets");

    expect(calls[1]?.init.headers).toEqual({
      "User-Agent": "repohealth/0.1.0",
      Accept: "application/vnd.github+json",
    });
  });

  it("falls back to defaults when the repository request fails", async () => {
    const { fetchImpl } = createFetch([new TypeError("fetch failed")]);
    const provider = new GitHubRepositoryMetadataProvider({ fetchImpl });

    await expect(provider.getRepositoryMetadata("acme/widgets")).resolves.toEqual(defaults);
  });

  it("falls back to defaults for a non-success repository response", async () => {
    const { fetchImpl, calls } = createFetch([jsonResponse({ message: "Not Found" }, 404)]);
    const provider = new GitHubRepositoryMetadataProvider({ fetchImpl });

    await expect(provider.getRepositoryMetadata("acme/widgets")).resolves.toEqual(defaults);
    expect(calls).toHaveLength(1);
  });

  it("keeps the raw issue count when the pull request listing fails", async () => {
    const { fetchImpl } = createFetch([
      jsonResponse({ stargazers_count: 12, open_issues_count: 7, updated_at: "not a date" }),
      jsonResponse({ message: "Server Error" }, 500),
    ]);
    const provider = new GitHubRepositoryMetadataProvider({ fetchImpl });

    await expect(provider.getRepositoryMetadata("acme/widgets")).resolves.toEqual({
      ...defaults,
      stars: 12,
      openIssues: 7,
    });
  });

  it("retries throttled responses when retries are configured", async () => {
    const { fetchImpl, calls } = createFetch([
      jsonResponse({ message: "slow down" }, 503),
      jsonResponse({ stargazers_count: 5, open_issues_count: 1 }),
      jsonResponse([{ number: 1 }]),
    ]);
    const provider = new GitHubRepositoryMetadataProvider({
      fetchImpl,
      retries: 1,
      retryBaseDelayMs: 0,
    });

    const metadata = await provider.getRepositoryMetadata("acme/widgets");

    expect(calls).toHaveLength(3);
    expect(metadata).toMatchObject({ stars: 5, openIssues: 0, openPullRequests: 1 });
  });

  it("caches metadata per repository", async () => {
    const { fetchImpl, calls } = createFetch([
      jsonResponse({ stargazers_count: 1, open_issues_count: 0 }),
      jsonResponse([]),
    ]);
    const provider = new GitHubRepositoryMetadataProvider({ fetchImpl });

    const first = await provider.getRepositoryMetadata("acme/widgets");
    const second = await provider.getRepositoryMetadata("acme/widgets");

    expect(second).toBe(first);
    expect(calls).toHaveLength(2);
  });
});

describe("NoopRepositoryMetadataProvider", () => {
  it("returns the documented defaults", async () => {
    await expect(
      new NoopRepositoryMetadataProvider().getRepositoryMetadata("acme/widgets"),
    ).resolves.toEqual(defaults);
  });
});
