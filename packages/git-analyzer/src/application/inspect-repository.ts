import type { RemoteSyncStatus, VcsInspection } from "@repohealth/core";
import {
  DEFAULT_GIT_INSPECTION_CONFIG,
  type GitInspectionConfig,
} from "../domain/inspection-config.js";
import { GitCommandError, type GitCommandClient } from "../infrastructure/git-command-client.js";
import {
  countStatusEntries,
  parseCommitTimestamp,
  parseRemoteSyncStatus,
} from "../parsing/git-output-parser.js";

export type InspectRepositoryInput = {
  repositoryPath: string;
  config?: Partial<GitInspectionConfig>;
};

const createEffectiveConfig = (
  overrides: Partial<GitInspectionConfig> | undefined,
): GitInspectionConfig => ({
  ...DEFAULT_GIT_INSPECTION_CONFIG,
  ...overrides,
});

const runOptional = (
  gitClient: GitCommandClient,
  repositoryPath: string,
  args: readonly string[],
): string | null => {
  try {
    return gitClient.run(repositoryPath, args);
  } catch (error) {
    if (error instanceof GitCommandError) {
      return null;
    }

    throw error;
  }
};

export const readRemoteSyncStatus = (
  gitClient: GitCommandClient,
  repositoryPath: string,
): RemoteSyncStatus => {
  const output = runOptional(gitClient, repositoryPath, [
    "rev-list",
    "--left-right",
    "--count",
    "@{upstream}...HEAD",
  ]);
  return output === null ? "unknown" : parseRemoteSyncStatus(output);
};

export const readOriginUrl = (
  gitClient: GitCommandClient,
  repositoryPath: string,
  remoteName: string,
): string | null => {
  const output = runOptional(gitClient, repositoryPath, ["remote", "get-url", remoteName]);
  if (output === null) {
    return null;
  }

  const url = output.trim();
  return url.length > 0 ? url : null;
};

export const inspectRepository = (
  input: InspectRepositoryInput,
  gitClient: GitCommandClient,
): VcsInspection => {
  const config = createEffectiveConfig(input.config);
  const repositoryPath = input.repositoryPath;

  let branchOutput: string;
  let lastCommitOutput: string;
  let statusOutput: string;
  try {
    branchOutput = gitClient.run(repositoryPath, ["branch", "--show-current"]);
    lastCommitOutput = gitClient.run(repositoryPath, ["log", "-1", "--format=%ci"]);
    statusOutput = gitClient.run(repositoryPath, ["status", "--porcelain"]);
  } catch (error) {
    if (error instanceof GitCommandError) {
      return {
        targetPath: repositoryPath,
        available: false,
        reason: error.timedOut ? "git_command_timed_out" : "git_command_failed",
        message: error.message,
      };
    }

    throw error;
  }

  const branch = branchOutput.trim();
  const uncommittedChanges = countStatusEntries(statusOutput);

  return {
    targetPath: repositoryPath,
    available: true,
    branch: branch.length > 0 ? branch : config.defaultBranch,
    lastCommitAt: parseCommitTimestamp(lastCommitOutput),
    uncommittedChanges,
    status: uncommittedChanges === 0 ? "clean" : "dirty",
    remoteSyncStatus: readRemoteSyncStatus(gitClient, repositoryPath),
    originUrl: readOriginUrl(gitClient, repositoryPath, config.originRemote),
  };
};
