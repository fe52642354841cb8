import { execFileSync } from "node:child_process";

export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly timedOut: boolean;

  constructor(message: string, args: readonly string[], timedOut = false) {
    super(message);
    this.name = "GitCommandError";
    this.args = args;
    this.timedOut = timedOut;
  }
}

export interface GitCommandClient {
  run(repositoryPath: string, args: readonly string[]): string;
}

export type ExecGitCommandClientOptions = {
  timeoutMs: number;
};

const isTimeoutError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ETIMEDOUT";

export class ExecGitCommandClient implements GitCommandClient {
  constructor(private readonly options: ExecGitCommandClientOptions) {}

  run(repositoryPath: string, args: readonly string[]): string {
    try {
      return execFileSync("git", ["-C", repositoryPath, ...args], {
        encoding: "utf8",
        maxBuffer: 1024 * 1024 * 16,
        stdio: ["ignore", "pipe", "pipe"],
        timeout: this.options.timeoutMs,
      });
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new GitCommandError(
          `git ${args.join(" ")} timed out after ${this.options.timeoutMs}ms`,
          args,
          true,
        );
      }

      const message = error instanceof Error ? error.message : "Unknown git execution error";
      throw new GitCommandError(message, args);
    }
  }
}
