import { existsSync, statSync } from "node:fs";
import { join } from "node:path";
import fg from "fast-glob";

export const pathExists = (root: string, relativePath: string): boolean =>
  existsSync(join(root, relativePath));

export const regularFileSize = (root: string, relativePath: string): number | null => {
  try {
    const stats = statSync(join(root, relativePath));
    return stats.isFile() ? stats.size : null;
  } catch {
    return null;
  }
};

export type FileSearchOptions = {
  ignore: readonly string[];
};

const toGlobOptions = (root: string, options: FileSearchOptions): fg.Options => ({
  cwd: root,
  onlyFiles: true,
  dot: true,
  followSymbolicLinks: false,
  suppressErrors: true,
  ignore: [...options.ignore],
});

export const countMatchingFiles = async (
  root: string,
  fileNamePattern: string,
  options: FileSearchOptions,
): Promise<number> => {
  const matches = await fg(`**/${fileNamePattern}`, toGlobOptions(root, options));
  return matches.length;
};

export const streamProjectFiles = (
  root: string,
  options: FileSearchOptions,
): AsyncIterable<string | Buffer> => fg.stream("**/*", toGlobOptions(root, options));
