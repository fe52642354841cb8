import { createSilentLogger, type Logger } from "@repohealth/core";
import { createGitCommandClient } from "@repohealth/git-analyzer";
import { createRepositoryMetadataProvider } from "@repohealth/remote-metadata";
import type { ScanDependencies } from "./domain/scan-dependencies.js";

export { analyzeProject } from "./application/analyze-project.js";
export {
  scanRepositories,
  walkRepositories,
  type WalkRepositoriesInput,
} from "./application/walk-repositories.js";
export type { ScanDependencies } from "./domain/scan-dependencies.js";
export { listCandidateDirectories, resolveScanRoot } from "./infrastructure/scan-root.js";

export type CreateScanDependenciesInput = {
  logger?: Logger;
  githubToken?: string;
  remoteEnabled?: boolean;
  remoteRetries?: number;
  gitTimeoutMs?: number;
};

export const createScanDependencies = (
  input: CreateScanDependenciesInput = {},
): ScanDependencies => ({
  gitClient: createGitCommandClient(input.gitTimeoutMs),
  metadataProvider: createRepositoryMetadataProvider({
    ...(input.remoteEnabled === undefined ? {} : { enabled: input.remoteEnabled }),
    ...(input.githubToken === undefined ? {} : { token: input.githubToken }),
    ...(input.remoteRetries === undefined ? {} : { retries: input.remoteRetries }),
  }),
  logger: input.logger ?? createSilentLogger(),
});
