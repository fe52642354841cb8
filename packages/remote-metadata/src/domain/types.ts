import type { RemoteRepositoryMetadata } from "@repohealth/core";

export interface RepositoryMetadataProvider {
  getRepositoryMetadata(repository: string): Promise<RemoteRepositoryMetadata>;
}

export const createDefaultRemoteMetadata = (repository: string): RemoteRepositoryMetadata => ({
  repository,
  stars: 0,
  openIssues: 0,
  openPullRequests: 0,
  lastActivityAt: null,
  workflowStatus: "unknown",
});
