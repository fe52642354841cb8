import type { CiSystem } from "@repohealth/core";

export type ReadmeTierThreshold = {
  exceedsBytes: number;
  tier: number;
};

export type CiMarker = {
  path: string;
  system: Exclude<CiSystem, "none">;
};

export type QualityHeuristicsConfig = {
  readmeCandidates: readonly string[];
  readmeTierThresholds: readonly ReadmeTierThreshold[];
  readmeMinimumTier: number;
  testDirectories: readonly string[];
  testFilePatterns: readonly string[];
  testCountPerTier: number;
  maxTier: number;
  ciMarkers: readonly CiMarker[];
  documentationMarkers: readonly string[];
  qualityToolFiles: readonly string[];
  structureDirectories: readonly string[];
  structureBonusManifests: readonly string[];
  maxStructureScore: number;
  searchIgnore: readonly string[];
};

export const DEFAULT_QUALITY_HEURISTICS_CONFIG: QualityHeuristicsConfig = {
  readmeCandidates: ["README.md", "README.rst", "README.txt", "readme.md"],
  readmeTierThresholds: [
    { exceedsBytes: 2000, tier: 5 },
    { exceedsBytes: 1000, tier: 4 },
    { exceedsBytes: 500, tier: 3 },
    { exceedsBytes: 200, tier: 2 },
  ],
  readmeMinimumTier: 1,
  testDirectories: ["test", "tests", "__tests__", "spec"],
  testFilePatterns: [
    "*_test.py",
    "*.test.js",
    "*_test.js",
    "*_spec.py",
    "*.spec.js",
    "test_*.py",
    "test*.py",
  ],
  testCountPerTier: 2,
  maxTier: 5,
  // Order matters: the first marker found decides the CI system.
  ciMarkers: [
    { path: ".github/workflows", system: "GitHub Actions" },
    { path: ".gitlab-ci.yml", system: "GitLab CI" },
    { path: ".travis.yml", system: "Travis CI" },
    { path: "azure-pipelines.yml", system: "Azure Pipelines" },
    { path: "Jenkinsfile", system: "Other CI" },
    { path: "circle.yml", system: "Other CI" },
    { path: ".circleci", system: "Other CI" },
  ],
  documentationMarkers: [
    "docs",
    "doc",
    "documentation",
    "wiki",
    "sphinx",
    "mkdocs.yml",
    "docusaurus.config.js",
  ],
  qualityToolFiles: [
    ".eslintrc",
    ".eslintrc.js",
    ".eslintrc.json",
    ".flake8",
    "setup.cfg",
    ".pylintrc",
    ".prettierrc",
    ".prettierrc.js",
    ".prettierrc.json",
    ".pre-commit-config.yaml",
    "mypy.ini",
    "pyproject.toml",
    ".editorconfig",
  ],
  structureDirectories: ["src", "lib", "app", "components", "utils", "config"],
  structureBonusManifests: ["package.json", "pyproject.toml"],
  maxStructureScore: 5,
  searchIgnore: ["**/node_modules/**", "**/.git/**"],
};

export type LanguageDetectionConfig = {
  extensions: Readonly<Record<string, string>>;
  maxLanguages: number;
  searchIgnore: readonly string[];
};

export const DEFAULT_LANGUAGE_DETECTION_CONFIG: LanguageDetectionConfig = {
  extensions: {
    ".py": "Python",
    ".js": "JavaScript",
    ".ts": "TypeScript",
    ".go": "Go",
    ".rs": "Rust",
    ".java": "Java",
    ".cpp": "C++",
    ".c": "C",
    ".html": "HTML",
    ".css": "CSS",
    ".vue": "Vue",
    ".php": "PHP",
    ".rb": "Ruby",
    ".swift": "Swift",
    ".kt": "Kotlin",
  },
  maxLanguages: 5,
  searchIgnore: ["**/node_modules/**", "**/.git/**"],
};
