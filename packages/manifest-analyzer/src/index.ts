export {
  analyzeManifests,
  summarizeManifestCounts,
  MANIFEST_DETECTORS,
  type AnalyzeManifestsInput,
  type ManifestAnalysisProgressEvent,
} from "./application/analyze-manifests.js";
export {
  NO_DEPENDENCIES_SUMMARY,
  type ManifestCount,
  type ManifestDetector,
  type ManifestParser,
} from "./domain/types.js";
export { parsePackageJson } from "./parsing/package-json-parser.js";
export { parseGoMod, parseRequirementsTxt } from "./parsing/line-manifest-parsers.js";
export { parsePyprojectToml } from "./parsing/pyproject-parser.js";
