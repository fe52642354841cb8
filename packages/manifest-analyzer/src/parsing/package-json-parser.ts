import type { ManifestCount } from "../domain/types.js";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const countEntries = (block: unknown): number => {
  if (Array.isArray(block)) {
    return block.length;
  }

  return isRecord(block) ? Object.keys(block).length : 0;
};

export const parsePackageJson = (raw: string): ManifestCount => {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error("package.json root is not an object");
  }

  const dependencies = countEntries(parsed["dependencies"]);
  const devDependencies = countEntries(parsed["devDependencies"]);

  return {
    ecosystem: "npm",
    count: dependencies + devDependencies,
    detail: `npm: ${dependencies} deps, ${devDependencies} dev deps`,
  };
};
