import type { ManifestCount } from "../domain/types.js";

const splitLines = (raw: string): string[] => raw.split(/\r?\n/).map((line) => line.trim());

export const parseRequirementsTxt = (raw: string): ManifestCount => {
  const count = splitLines(raw).filter((line) => line.length > 0 && !line.startsWith("#")).length;

  return {
    ecosystem: "pip",
    count,
    detail: `pip: ${count} requirements`,
  };
};

const GO_DIRECTIVE_PATTERN = /^(module|go)(\s|$)/;

export const parseGoMod = (raw: string): ManifestCount => {
  const count = splitLines(raw).filter(
    (line) => line.length > 0 && !GO_DIRECTIVE_PATTERN.test(line),
  ).length;

  return {
    ecosystem: "go",
    count,
    detail: `go: ${count} modules`,
  };
};
