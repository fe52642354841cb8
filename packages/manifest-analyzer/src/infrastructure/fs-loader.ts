import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

export type ManifestFile = {
  path: string;
  raw: string;
};

export const loadManifest = (repositoryPath: string, fileName: string): ManifestFile | null => {
  const manifestPath = join(repositoryPath, fileName);
  if (!existsSync(manifestPath)) {
    return null;
  }

  return {
    path: manifestPath,
    raw: readFileSync(manifestPath, "utf8"),
  };
};
