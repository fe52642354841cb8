import { readdir, stat } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";

export const resolveScanRoot = (
  inputPath: string,
  cwd: string = process.cwd(),
  homeDirectory: string = homedir(),
): string => {
  if (inputPath === "~") {
    return homeDirectory;
  }

  if (inputPath.startsWith("~/")) {
    return join(homeDirectory, inputPath.slice(2));
  }

  return resolve(cwd, inputPath);
};

const isDirectoryTarget = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
};

// Symbolic links count when they resolve to a directory; dangling links are ignored.
export const listCandidateDirectories = async (rootPath: string): Promise<readonly string[]> => {
  const entries = await readdir(rootPath, { withFileTypes: true });
  const names: string[] = [];

  for (const entry of entries) {
    if (entry.name.startsWith(".")) {
      continue;
    }

    if (
      entry.isDirectory() ||
      (entry.isSymbolicLink() && (await isDirectoryTarget(join(rootPath, entry.name))))
    ) {
      names.push(entry.name);
    }
  }

  return names.sort((a, b) => a.localeCompare(b)).map((name) => join(rootPath, name));
};
