import type { RepositoryMetadataProvider } from "./domain/types.js";
import {
  GitHubRepositoryMetadataProvider,
  type GitHubMetadataProviderOptions,
} from "./infrastructure/github-metadata-provider.js";
import { NoopRepositoryMetadataProvider } from "./infrastructure/noop-metadata-provider.js";

export { createDefaultRemoteMetadata, type RepositoryMetadataProvider } from "./domain/types.js";
export { parseRemoteIdentifier } from "./parsing/remote-identifier.js";
export type { FetchLike } from "./infrastructure/fetch-json.js";
export {
  DEFAULT_GITHUB_API_BASE_URL,
  DEFAULT_USER_AGENT,
  GitHubRepositoryMetadataProvider,
  type GitHubMetadataProviderOptions,
} from "./infrastructure/github-metadata-provider.js";
export { NoopRepositoryMetadataProvider };

export type CreateRepositoryMetadataProviderInput = GitHubMetadataProviderOptions & {
  enabled?: boolean;
};

export const isRemoteMetadataDisabledByEnv = (env: NodeJS.ProcessEnv = process.env): boolean =>
  env["REPOHEALTH_REMOTE_METADATA"] === "none";

export const createRepositoryMetadataProvider = ({
  enabled,
  ...options
}: CreateRepositoryMetadataProviderInput = {}): RepositoryMetadataProvider => {
  if (enabled === false || isRemoteMetadataDisabledByEnv()) {
    return new NoopRepositoryMetadataProvider();
  }

  return new GitHubRepositoryMetadataProvider(options);
};
