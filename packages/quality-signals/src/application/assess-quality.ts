import type { CiSystem, QualitySignals } from "@repohealth/core";
import {
  DEFAULT_QUALITY_HEURISTICS_CONFIG,
  type QualityHeuristicsConfig,
} from "../domain/quality-config.js";
import { countMatchingFiles, pathExists, regularFileSize } from "../infrastructure/file-system.js";

export type AssessQualityInput = {
  repositoryPath: string;
  config?: Partial<QualityHeuristicsConfig>;
};

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

const createEffectiveConfig = (
  overrides: Partial<QualityHeuristicsConfig> | undefined,
): QualityHeuristicsConfig => ({
  ...DEFAULT_QUALITY_HEURISTICS_CONFIG,
  ...overrides,
});

export const readmeTierForSize = (sizeInBytes: number, config: QualityHeuristicsConfig): number => {
  for (const threshold of config.readmeTierThresholds) {
    if (sizeInBytes > threshold.exceedsBytes) {
      return threshold.tier;
    }
  }

  return config.readmeMinimumTier;
};

export const coverageTierForMatches = (matches: number, config: QualityHeuristicsConfig): number =>
  matches > 0 ? clamp(Math.floor(matches / config.testCountPerTier), 1, config.maxTier) : 0;

const assessReadme = (
  root: string,
  config: QualityHeuristicsConfig,
): Pick<QualitySignals, "hasReadme" | "readmeTier"> => {
  for (const candidate of config.readmeCandidates) {
    if (!pathExists(root, candidate)) {
      continue;
    }

    const size = regularFileSize(root, candidate);
    return {
      hasReadme: true,
      readmeTier: size === null ? config.readmeMinimumTier : readmeTierForSize(size, config),
    };
  }

  return { hasReadme: false, readmeTier: 0 };
};

const countTestMatches = async (root: string, config: QualityHeuristicsConfig): Promise<number> => {
  let matches = config.testDirectories.filter((directory) => pathExists(root, directory)).length;

  for (const pattern of config.testFilePatterns) {
    matches += await countMatchingFiles(root, pattern, { ignore: config.searchIgnore }).catch(
      () => 0,
    );
  }

  return matches;
};

export const detectCiSystem = (root: string, config: QualityHeuristicsConfig): CiSystem =>
  config.ciMarkers.find((marker) => pathExists(root, marker.path))?.system ?? "none";

const countPresent = (root: string, candidates: readonly string[]): number =>
  candidates.filter((candidate) => pathExists(root, candidate)).length;

export const assessQuality = async (input: AssessQualityInput): Promise<QualitySignals> => {
  const config = createEffectiveConfig(input.config);
  const root = input.repositoryPath;

  const readme = assessReadme(root, config);
  const testMatches = await countTestMatches(root, config);
  const ciSystem = detectCiSystem(root, config);
  const structureBonus = config.structureBonusManifests.some((manifest) => pathExists(root, manifest))
    ? 1
    : 0;

  return {
    ...readme,
    hasTests: testMatches > 0,
    testCoverageTier: coverageTierForMatches(testMatches, config),
    hasCi: ciSystem !== "none",
    ciSystem,
    hasDocumentation: config.documentationMarkers.some((marker) => pathExists(root, marker)),
    qualityToolCount: countPresent(root, config.qualityToolFiles),
    structureScore: clamp(
      countPresent(root, config.structureDirectories) + structureBonus,
      0,
      config.maxStructureScore,
    ),
  };
};
