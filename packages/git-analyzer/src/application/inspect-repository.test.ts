import { describe, expect, it } from "vitest";
import { GitCommandError, type GitCommandClient } from "../infrastructure/git-command-client.js";
import { inspectRepository } from "./inspect-repository.js";

class StubGitCommandClient implements GitCommandClient {
  readonly calls: string[] = [];

  constructor(private readonly responses: Readonly<Record<string, string | Error>>) {}

  run(repositoryPath: string, args: readonly string[]): string {
    const key = args.join(" ");
    this.calls.push(`${repositoryPath}: ${key}`);
    const response = this.responses[key];
    if (response === undefined) {
      throw new GitCommandError(`unexpected git ${key}`, args);
    }

    if (response instanceof Error) {
      throw response;
    }

    return response;
  }
}

const baseResponses: Readonly<Record<string, string | Error>> = {
  "branch --show-current": "feature/login\n",
  "log -1 --format=%ci": "2024-01-15 10:30:00 +0100\n",
  "status --porcelain": " M src/a.ts\n?? notes.md\n",
  "rev-list --left-right --count @{upstream}...HEAD": "0\t0\n",
  "remote get-url origin": "git@github.com:acme/widgets.git\n",
};

describe("inspectRepository", () => {
  it("collects branch, commit time, working tree state and remote details", () => {
    const client = new StubGitCommandClient(baseResponses);

    const inspection = inspectRepository({ repositoryPath: "/work/widgets" }, client);

    expect(inspection).toEqual({
      targetPath: "/work/widgets",
      available: true,
      branch: "feature/login",
      lastCommitAt: "2024-01-15T10:30:00+01:00",
      uncommittedChanges: 2,
      status: "dirty",
      remoteSyncStatus: "clean",
      originUrl: "git@github.com:acme/widgets.git",
    });
    expect(client.calls.every((call) => call.startsWith("/work/widgets: "))).toBe(true);
  });

  it("defaults an empty branch name and tolerates missing upstream and origin", () => {
    const client = new StubGitCommandClient({
      ...baseResponses,
      "branch --show-current": "\n",
      "status --porcelain": "",
      "rev-list --left-right --count @{upstream}...HEAD": new GitCommandError("no upstream", []),
      "remote get-url origin": new GitCommandError("no such remote", []),
    });

    const inspection = inspectRepository({ repositoryPath: "/work/widgets" }, client);

    expect(inspection).toMatchObject({
      available: true,
      branch: "main",
      uncommittedChanges: 0,
      status: "clean",
      remoteSyncStatus: "unknown",
      originUrl: null,
    });
  });

  it("reads the configured remote name", () => {
    const client = new StubGitCommandClient({
      ...baseResponses,
      "remote get-url upstream": "https://github.com/acme/upstream-widgets\n",
    });

    const inspection = inspectRepository(
      { repositoryPath: "/work/widgets", config: { originRemote: "upstream" } },
      client,
    );

    expect(inspection).toMatchObject({ originUrl: "https://github.com/acme/upstream-widgets" });
  });

  it("reports the whole inspection as unavailable when a required command times out", () => {
    const client = new StubGitCommandClient({
      ...baseResponses,
      "log -1 --format=%ci": new GitCommandError("git log -1 --format=%ci timed out after 5000ms", [], true),
    });

    const inspection = inspectRepository({ repositoryPath: "/work/widgets" }, client);

    expect(inspection).toEqual({
      targetPath: "/work/widgets",
      available: false,
      reason: "git_command_timed_out",
      message: "git log -1 --format=%ci timed out after 5000ms",
    });
  });

  it("reports a failing required command as unavailable", () => {
    const client = new StubGitCommandClient({
      ...baseResponses,
      "status --porcelain": new GitCommandError("fatal: not a git repository", ["status"]),
    });

    const inspection = inspectRepository({ repositoryPath: "/work/widgets" }, client);

    expect(inspection).toEqual({
      targetPath: "/work/widgets",
      available: false,
      reason: "git_command_failed",
      message: "fatal: not a git repository",
    });
  });

  it("rethrows errors that are not git failures", () => {
    const client = new StubGitCommandClient({
      ...baseResponses,
      "status --porcelain": new TypeError("bad state"),
    });

    expect(() => inspectRepository({ repositoryPath: "/work/widgets" }, client)).toThrow("bad state");
  });
});
