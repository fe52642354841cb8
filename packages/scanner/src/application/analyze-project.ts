import { basename } from "node:path";
import type {
  Logger,
  ProjectRecord,
  RemoteRepositoryMetadata,
  ScanEntry,
  VcsSnapshot,
} from "@repohealth/core";
import { hasRepositoryMetadata, inspectRepository } from "@repohealth/git-analyzer";
import { computeHealthScore } from "@repohealth/health-engine";
import {
  analyzeManifests,
  type ManifestAnalysisProgressEvent,
} from "@repohealth/manifest-analyzer";
import { assessQuality, detectLanguages } from "@repohealth/quality-signals";
import {
  createDefaultRemoteMetadata,
  parseRemoteIdentifier,
  type RepositoryMetadataProvider,
} from "@repohealth/remote-metadata";
import type { ScanDependencies } from "../domain/scan-dependencies.js";

const createManifestProgressReporter = (
  logger: Logger,
  projectName: string,
): ((event: ManifestAnalysisProgressEvent) => void) => {
  return (event) => {
    switch (event.stage) {
      case "manifest_detected":
        logger.debug(`${projectName}: ${event.ecosystem} manifest (${event.count} dependencies)`);
        break;
      case "manifest_unreadable":
        logger.debug(`${projectName}: unreadable ${event.fileName} (${event.message})`);
        break;
    }
  };
};

const fetchRemoteMetadata = async (
  originUrl: string | null,
  provider: RepositoryMetadataProvider,
  logger: Logger,
  projectName: string,
): Promise<RemoteRepositoryMetadata | null> => {
  const repository = originUrl === null ? null : parseRemoteIdentifier(originUrl);
  if (repository === null) {
    logger.debug(`${projectName}: no remote hosting identifier`);
    return null;
  }

  try {
    return await provider.getRepositoryMetadata(repository);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.debug(`${projectName}: remote metadata unavailable for ${repository} (${message})`);
    return createDefaultRemoteMetadata(repository);
  }
};

export const analyzeProject = async (
  projectPath: string,
  dependencies: ScanDependencies,
): Promise<ScanEntry> => {
  const name = basename(projectPath);
  const { logger } = dependencies;

  if (!hasRepositoryMetadata(projectPath)) {
    return { kind: "skipped", name, path: projectPath, reason: "not_git_repository" };
  }

  const inspection = inspectRepository(
    {
      repositoryPath: projectPath,
      ...(dependencies.gitConfig === undefined ? {} : { config: dependencies.gitConfig }),
    },
    dependencies.gitClient,
  );
  if (!inspection.available) {
    logger.warn(`${name}: version control ${inspection.reason} (${inspection.message})`);
    return {
      kind: "skipped",
      name,
      path: projectPath,
      reason: "vcs_unavailable",
      message: inspection.message,
    };
  }

  const vcs: VcsSnapshot = {
    branch: inspection.branch,
    lastCommitAt: inspection.lastCommitAt,
    uncommittedChanges: inspection.uncommittedChanges,
    status: inspection.status,
    remoteSyncStatus: inspection.remoteSyncStatus,
  };

  const dependencySummary = analyzeManifests(
    { repositoryPath: projectPath },
    createManifestProgressReporter(logger, name),
  );
  const remote = await fetchRemoteMetadata(
    inspection.originUrl,
    dependencies.metadataProvider,
    logger,
    name,
  );
  const quality = await assessQuality({
    repositoryPath: projectPath,
    ...(dependencies.qualityConfig === undefined ? {} : { config: dependencies.qualityConfig }),
  });
  const languages = await detectLanguages({
    repositoryPath: projectPath,
    ...(dependencies.languageConfig === undefined ? {} : { config: dependencies.languageConfig }),
  });

  const health = computeHealthScore(
    { vcs, dependencies: dependencySummary, remote, quality },
    {
      now: (dependencies.now ?? (() => new Date()))(),
      ...(dependencies.healthConfig === undefined ? {} : { config: dependencies.healthConfig }),
    },
  );

  const record: ProjectRecord = {
    name,
    path: projectPath,
    vcs,
    languages,
    dependencies: dependencySummary,
    quality,
    remote,
    health,
  };

  return { kind: "project", record };
};
