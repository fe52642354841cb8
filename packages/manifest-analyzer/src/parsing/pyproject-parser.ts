import type { ManifestCount } from "../domain/types.js";

const POETRY_DEPENDENCIES_HEADER = "[tool.poetry.dependencies]";
const POETRY_GROUP_PREFIX = "[tool.poetry.group.";
const INLINE_DEPENDENCIES_MARKER = "dependencies = [";

type Section = "none" | "dependencies" | "group";

const nextSection = (header: string): Section => {
  if (header === POETRY_DEPENDENCIES_HEADER) {
    return "dependencies";
  }

  if (header.startsWith(POETRY_GROUP_PREFIX) && header.includes("dependencies]")) {
    return "group";
  }

  return "none";
};

const isDeclaration = (line: string): boolean =>
  line.length > 0 && !line.startsWith("#") && line.includes("=");

// Rough cardinality of a PEP 621 `dependencies = [...]` array: quoted strings up to the first `]`.
const estimateInlineDependencies = (content: string): number => {
  const start = content.indexOf(INLINE_DEPENDENCIES_MARKER);
  if (start === -1) {
    return 0;
  }

  const end = content.indexOf("]", start);
  const section = content.slice(start, end === -1 ? undefined : end);
  const quotes = section.split('"').length - 1;
  return Math.floor(quotes / 2);
};

export const parsePyprojectToml = (raw: string): ManifestCount | null => {
  let section: Section = "none";
  let dependencies = 0;
  let groupDependencies = 0;

  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.startsWith("[")) {
      section = nextSection(line);
      continue;
    }

    if (!isDeclaration(line)) {
      continue;
    }

    if (section === "dependencies" && !line.startsWith("python")) {
      dependencies += 1;
    } else if (section === "group") {
      groupDependencies += 1;
    }
  }

  if (dependencies === 0) {
    dependencies = estimateInlineDependencies(raw);
  }

  if (dependencies === 0 && groupDependencies === 0) {
    return null;
  }

  return {
    ecosystem: "poetry",
    count: dependencies + groupDependencies,
    detail:
      groupDependencies > 0
        ? `poetry: ${dependencies} deps, ${groupDependencies} dev deps`
        : `poetry: ${dependencies} deps`,
  };
};
