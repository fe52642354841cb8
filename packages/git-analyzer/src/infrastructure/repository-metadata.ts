import { existsSync } from "node:fs";
import { join } from "node:path";

export const REPOSITORY_METADATA_ENTRY = ".git";

// A `.git` file (worktrees, submodules) counts as well as a directory.
export const hasRepositoryMetadata = (directoryPath: string): boolean =>
  existsSync(join(directoryPath, REPOSITORY_METADATA_ENTRY));
