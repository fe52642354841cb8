export {
  assessQuality,
  coverageTierForMatches,
  detectCiSystem,
  readmeTierForSize,
  type AssessQualityInput,
} from "./application/assess-quality.js";
export { detectLanguages, type DetectLanguagesInput } from "./application/detect-languages.js";
export {
  DEFAULT_LANGUAGE_DETECTION_CONFIG,
  DEFAULT_QUALITY_HEURISTICS_CONFIG,
  type CiMarker,
  type LanguageDetectionConfig,
  type QualityHeuristicsConfig,
  type ReadmeTierThreshold,
} from "./domain/quality-config.js";
