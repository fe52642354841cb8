import type { DependencyEcosystem } from "@repohealth/core";

export type ManifestCount = {
  ecosystem: DependencyEcosystem;
  count: number;
  detail: string;
};

export type ManifestParser = (raw: string) => ManifestCount | null;

export type ManifestDetector = {
  ecosystem: DependencyEcosystem;
  fileName: string;
  parse: ManifestParser;
};

export const NO_DEPENDENCIES_SUMMARY = "No dependencies found";
