import { inspectRepository } from "./application/inspect-repository.js";
import { DEFAULT_GIT_INSPECTION_CONFIG } from "./domain/inspection-config.js";
import { ExecGitCommandClient, type GitCommandClient } from "./infrastructure/git-command-client.js";

export type { InspectRepositoryInput } from "./application/inspect-repository.js";
export {
  DEFAULT_GIT_INSPECTION_CONFIG,
  type GitInspectionConfig,
} from "./domain/inspection-config.js";
export {
  ExecGitCommandClient,
  GitCommandError,
  type GitCommandClient,
} from "./infrastructure/git-command-client.js";
export { hasRepositoryMetadata, REPOSITORY_METADATA_ENTRY } from "./infrastructure/repository-metadata.js";
export { parseCommitTimestamp } from "./parsing/git-output-parser.js";
export { inspectRepository };

export const createGitCommandClient = (timeoutMs?: number): GitCommandClient =>
  new ExecGitCommandClient({
    timeoutMs: timeoutMs ?? DEFAULT_GIT_INSPECTION_CONFIG.commandTimeoutMs,
  });
