import { basename } from "node:path";
import type { ProjectRecord, ScanEntry, ScanResult, SkippedDirectory } from "@repohealth/core";
import { hasRepositoryMetadata } from "@repohealth/git-analyzer";
import type { ScanDependencies } from "../domain/scan-dependencies.js";
import { listCandidateDirectories, resolveScanRoot } from "../infrastructure/scan-root.js";
import { analyzeProject } from "./analyze-project.js";

export type WalkRepositoriesInput = {
  rootPath: string;
  cwd?: string;
};

const analyzeIsolated = async (
  projectPath: string,
  dependencies: ScanDependencies,
): Promise<ScanEntry> => {
  try {
    return await analyzeProject(projectPath, dependencies);
  } catch (error) {
    const name = basename(projectPath);
    const message = error instanceof Error ? error.message : String(error);
    dependencies.logger.warn(`${name}: analysis failed (${message})`);
    return { kind: "skipped", name, path: projectPath, reason: "analysis_failed", message };
  }
};

export async function* walkRepositories(
  input: WalkRepositoriesInput,
  dependencies: ScanDependencies,
): AsyncGenerator<ScanEntry, void, undefined> {
  const rootPath = resolveScanRoot(input.rootPath, input.cwd);
  const children = await listCandidateDirectories(rootPath);

  if (hasRepositoryMetadata(rootPath)) {
    yield await analyzeIsolated(rootPath, dependencies);
  }

  for (const childPath of children) {
    yield await analyzeIsolated(childPath, dependencies);
  }
}

export const scanRepositories = async (
  input: WalkRepositoriesInput,
  dependencies: ScanDependencies,
  onEntry?: (entry: ScanEntry) => void,
): Promise<ScanResult> => {
  const projects: ProjectRecord[] = [];
  const skipped: SkippedDirectory[] = [];

  for await (const entry of walkRepositories(input, dependencies)) {
    onEntry?.(entry);
    if (entry.kind === "project") {
      projects.push(entry.record);
      continue;
    }

    skipped.push({
      name: entry.name,
      path: entry.path,
      reason: entry.reason,
      ...(entry.message === undefined ? {} : { message: entry.message }),
    });
  }

  return {
    rootPath: resolveScanRoot(input.rootPath, input.cwd),
    projects,
    skipped,
  };
};
