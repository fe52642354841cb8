import type { DependencyEcosystem, DependencySummary } from "@repohealth/core";
import {
  NO_DEPENDENCIES_SUMMARY,
  type ManifestCount,
  type ManifestDetector,
} from "../domain/types.js";
import { loadManifest } from "../infrastructure/fs-loader.js";
import { parseGoMod, parseRequirementsTxt } from "../parsing/line-manifest-parsers.js";
import { parsePackageJson } from "../parsing/package-json-parser.js";
import { parsePyprojectToml } from "../parsing/pyproject-parser.js";

export const MANIFEST_DETECTORS: readonly ManifestDetector[] = [
  { ecosystem: "npm", fileName: "package.json", parse: parsePackageJson },
  { ecosystem: "pip", fileName: "requirements.txt", parse: parseRequirementsTxt },
  { ecosystem: "poetry", fileName: "pyproject.toml", parse: parsePyprojectToml },
  { ecosystem: "go", fileName: "go.mod", parse: parseGoMod },
];

export type AnalyzeManifestsInput = {
  repositoryPath: string;
  detectors?: readonly ManifestDetector[];
};

export type ManifestAnalysisProgressEvent =
  | { stage: "manifest_detected"; ecosystem: DependencyEcosystem; count: number }
  | {
      stage: "manifest_unreadable";
      ecosystem: DependencyEcosystem;
      fileName: string;
      message: string;
    };

const runDetector = (
  repositoryPath: string,
  detector: ManifestDetector,
  onProgress?: (event: ManifestAnalysisProgressEvent) => void,
): ManifestCount | null => {
  try {
    const manifest = loadManifest(repositoryPath, detector.fileName);
    if (manifest === null) {
      return null;
    }

    const result = detector.parse(manifest.raw);
    if (result !== null) {
      onProgress?.({ stage: "manifest_detected", ecosystem: result.ecosystem, count: result.count });
    }
    return result;
  } catch (error) {
    onProgress?.({
      stage: "manifest_unreadable",
      ecosystem: detector.ecosystem,
      fileName: detector.fileName,
      message: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
};

export const summarizeManifestCounts = (results: readonly ManifestCount[]): DependencySummary => {
  const counts: Partial<Record<DependencyEcosystem, number>> = {};
  for (const result of results) {
    counts[result.ecosystem] = (counts[result.ecosystem] ?? 0) + result.count;
  }

  const details = results.map((result) => result.detail);

  return {
    hasDependencies: results.length > 0,
    counts,
    ecosystems: results.map((result) => result.ecosystem),
    details,
    summary: details.length > 0 ? details.join(", ") : NO_DEPENDENCIES_SUMMARY,
  };
};

export const analyzeManifests = (
  input: AnalyzeManifestsInput,
  onProgress?: (event: ManifestAnalysisProgressEvent) => void,
): DependencySummary => {
  const detectors = input.detectors ?? MANIFEST_DETECTORS;
  const results: ManifestCount[] = [];

  for (const detector of detectors) {
    const result = runDetector(input.repositoryPath, detector, onProgress);
    if (result !== null) {
      results.push(result);
    }
  }

  return summarizeManifestCounts(results);
};
