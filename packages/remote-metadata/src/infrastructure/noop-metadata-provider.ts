import type { RemoteRepositoryMetadata } from "@repohealth/core";
import { createDefaultRemoteMetadata, type RepositoryMetadataProvider } from "../domain/types.js";

export class NoopRepositoryMetadataProvider implements RepositoryMetadataProvider {
  async getRepositoryMetadata(repository: string): Promise<RemoteRepositoryMetadata> {
    return createDefaultRemoteMetadata(repository);
  }
}
