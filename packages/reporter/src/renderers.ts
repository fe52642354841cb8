import type { ProjectRecord } from "@repohealth/core";
import {
  describeCommitAge,
  describeQuality,
  describeRemote,
  describeWorkingTree,
  formatAdjustments,
  formatScore,
  type ScanReport,
} from "./domain.js";

const describeTotals = (report: ScanReport): string =>
  `${report.totals.total} (healthy ${report.totals.healthy}, warning ${report.totals.warning}, unhealthy ${report.totals.unhealthy})`;

const describeLastCommit = (project: ProjectRecord, generatedAt: string): string =>
  project.vcs.lastCommitAt === null
    ? "unknown"
    : `${project.vcs.lastCommitAt} (${describeCommitAge(project.vcs.lastCommitAt, generatedAt)})`;

const describeLanguages = (project: ProjectRecord): string => project.languages.join(", ") || "none";

export const renderTextReport = (report: ScanReport): string => {
  const lines: string[] = [];
  lines.push("Repository Health Summary");
  lines.push(`  root: ${report.rootPath}`);
  lines.push(`  generatedAt: ${report.generatedAt}`);
  lines.push(`  projects: ${describeTotals(report)}`);
  lines.push(`  skipped: ${report.skipped.length}`);

  for (const project of report.projects) {
    lines.push("");
    lines.push(`${project.name} [${project.health.status}] ${formatScore(project.health.score)}`);
    lines.push(`  path: ${project.path}`);
    lines.push(`  branch: ${project.vcs.branch} (${describeWorkingTree(project)})`);
    lines.push(`  lastCommit: ${describeLastCommit(project, report.generatedAt)}`);
    lines.push(`  languages: ${describeLanguages(project)}`);
    lines.push(`  dependencies: ${project.dependencies.summary}`);
    lines.push(`  quality: ${describeQuality(project)}`);
    const remote = describeRemote(project);
    if (remote !== null) {
      lines.push(`  remote: ${remote}`);
    }
    lines.push(`  adjustments: ${formatAdjustments(project.health.adjustments)}`);
  }

  if (report.skipped.length > 0) {
    lines.push("");
    lines.push("Skipped");
    for (const directory of report.skipped) {
      lines.push(`  - ${directory.name} (${directory.reason})`);
    }
  }

  return lines.join("\n");
};

export const renderMarkdownReport = (report: ScanReport): string => {
  const lines: string[] = [];
  lines.push("# Repository Health Report");
  lines.push("");
  lines.push(`- root: \`${report.rootPath}\``);
  lines.push(`- generated at: \`${report.generatedAt}\``);
  lines.push(`- projects: ${describeTotals(report)}`);
  lines.push(`- skipped: \`${report.skipped.length}\``);

  for (const project of report.projects) {
    lines.push("");
    lines.push(`## ${project.name}`);
    lines.push(`- score: **${formatScore(project.health.score)}** (\`${project.health.status}\`)`);
    lines.push(`- path: \`${project.path}\``);
    lines.push(`- branch: \`${project.vcs.branch}\` (${describeWorkingTree(project)})`);
    lines.push(`- last commit: ${describeLastCommit(project, report.generatedAt)}`);
    lines.push(`- languages: ${describeLanguages(project)}`);
    lines.push(`- dependencies: ${project.dependencies.summary}`);
    lines.push(`- quality: ${describeQuality(project)}`);
    const remote = describeRemote(project);
    if (remote !== null) {
      lines.push(`- remote: ${remote}`);
    }
    lines.push(`- adjustments: ${formatAdjustments(project.health.adjustments)}`);
  }

  if (report.skipped.length > 0) {
    lines.push("");
    lines.push("## Skipped");
    for (const directory of report.skipped) {
      lines.push(`- \`${directory.name}\`: ${directory.reason}`);
    }
  }

  return lines.join("\n");
};

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (value: string | number): string =>
  String(value).replace(/[&<>"']/g, (character) => HTML_ESCAPES[character] ?? character);

const renderProjectRow = (project: ProjectRecord, generatedAt: string): string => {
  const cells = [
    project.name,
    formatScore(project.health.score),
    project.health.status,
    project.vcs.branch,
    describeLastCommit(project, generatedAt),
    project.vcs.uncommittedChanges,
    describeLanguages(project),
    project.dependencies.summary,
    describeRemote(project) ?? "none",
  ];

  return `      <tr class="${escapeHtml(project.health.status)}">${cells
    .map((cell) => `<td>${escapeHtml(cell)}</td>`)
    .join("")}</tr>`;
};

const PROJECT_TABLE_HEADINGS = [
  "Project",
  "Score",
  "Status",
  "Branch",
  "Last commit",
  "Uncommitted",
  "Languages",
  "Dependencies",
  "Remote",
];

export const renderHtmlReport = (report: ScanReport): string => {
  const lines: string[] = [];
  lines.push("<!DOCTYPE html>");
  lines.push('<html lang="en">');
  lines.push("<head>");
  lines.push('  <meta charset="utf-8">');
  lines.push("  <title>Repository Health Report</title>");
  lines.push("  <style>");
  lines.push("    body { font-family: sans-serif; margin: 2rem; }");
  lines.push("    table { border-collapse: collapse; width: 100%; }");
  lines.push("    th, td { border: 1px solid #ddd; padding: 0.4rem; text-align: left; }");
  lines.push("    tr.healthy td:nth-child(3) { color: #1a7f37; }");
  lines.push("    tr.warning td:nth-child(3) { color: #9a6700; }");
  lines.push("    tr.unhealthy td:nth-child(3) { color: #cf222e; }");
  lines.push("  </style>");
  lines.push("</head>");
  lines.push("<body>");
  lines.push("  <h1>Repository Health Report</h1>");
  lines.push(`  <p>Root: <code>${escapeHtml(report.rootPath)}</code></p>`);
  lines.push(`  <p>Generated at: ${escapeHtml(report.generatedAt)}</p>`);
  lines.push("  <ul>");
  lines.push(`    <li>Total: ${escapeHtml(report.totals.total)}</li>`);
  lines.push(`    <li>Healthy: ${escapeHtml(report.totals.healthy)}</li>`);
  lines.push(`    <li>Warning: ${escapeHtml(report.totals.warning)}</li>`);
  lines.push(`    <li>Unhealthy: ${escapeHtml(report.totals.unhealthy)}</li>`);
  lines.push("  </ul>");
  lines.push("  <table>");
  lines.push("    <thead>");
  lines.push(
    `      <tr>${PROJECT_TABLE_HEADINGS.map((heading) => `<th>${heading}</th>`).join("")}</tr>`,
  );
  lines.push("    </thead>");
  lines.push("    <tbody>");
  for (const project of report.projects) {
    lines.push(renderProjectRow(project, report.generatedAt));
  }
  lines.push("    </tbody>");
  lines.push("  </table>");

  if (report.skipped.length > 0) {
    lines.push("  <h2>Skipped</h2>");
    lines.push("  <ul>");
    for (const directory of report.skipped) {
      lines.push(`    <li>${escapeHtml(directory.name)} (${escapeHtml(directory.reason)})</li>`);
    }
    lines.push("  </ul>");
  }

  lines.push("</body>");
  lines.push("</html>");

  return lines.join("\n");
};
