import type { Logger } from "@repohealth/core";
import type { GitCommandClient, GitInspectionConfig } from "@repohealth/git-analyzer";
import type { HealthEngineConfig } from "@repohealth/health-engine";
import type {
  LanguageDetectionConfig,
  QualityHeuristicsConfig,
} from "@repohealth/quality-signals";
import type { RepositoryMetadataProvider } from "@repohealth/remote-metadata";

export type ScanDependencies = {
  gitClient: GitCommandClient;
  metadataProvider: RepositoryMetadataProvider;
  logger: Logger;
  now?: () => Date;
  gitConfig?: Partial<GitInspectionConfig>;
  qualityConfig?: Partial<QualityHeuristicsConfig>;
  languageConfig?: Partial<LanguageDetectionConfig>;
  healthConfig?: Partial<HealthEngineConfig>;
};
