import type { HealthAdjustment, ProjectRecord, SkippedDirectory } from "@repohealth/core";

export const REPORT_SCHEMA_VERSION = "repohealth.report.v1" as const;

export type ReportSchemaVersion = typeof REPORT_SCHEMA_VERSION;

export type ReportFormat = "json" | "text" | "md" | "html";

export type ScanReportTotals = {
  total: number;
  healthy: number;
  warning: number;
  unhealthy: number;
};

export type ScanReport = {
  schemaVersion: ReportSchemaVersion;
  generatedAt: string;
  rootPath: string;
  totals: ScanReportTotals;
  projects: readonly ProjectRecord[];
  skipped: readonly SkippedDirectory[];
};

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

export const formatScore = (score: number): string => `${score.toFixed(1)}/10`;

export const formatDelta = (delta: number): string => (delta > 0 ? `+${delta}` : `${delta}`);

export const formatAdjustments = (adjustments: readonly HealthAdjustment[]): string =>
  adjustments.map((adjustment) => `${adjustment.rule} ${formatDelta(adjustment.delta)}`).join(", ") ||
  "none";

export const describeCommitAge = (lastCommitAt: string | null, generatedAt: string): string => {
  if (lastCommitAt === null) {
    return "unknown";
  }

  const elapsed = Date.parse(generatedAt) - Date.parse(lastCommitAt);
  if (Number.isNaN(elapsed)) {
    return "unknown";
  }

  const days = Math.max(0, Math.floor(elapsed / ONE_DAY_MS));
  if (days === 0) {
    return "today";
  }

  return days === 1 ? "1 day ago" : `${days} days ago`;
};

export const describeWorkingTree = (project: ProjectRecord): string =>
  `${project.vcs.status}, ${project.vcs.uncommittedChanges} uncommitted changes, remote sync ${project.vcs.remoteSyncStatus}`;

export const describeQuality = (project: ProjectRecord): string => {
  const { quality } = project;
  return [
    `readme tier ${quality.readmeTier}`,
    `tests tier ${quality.testCoverageTier}`,
    `ci ${quality.ciSystem}`,
    `docs ${quality.hasDocumentation ? "yes" : "no"}`,
    `tools ${quality.qualityToolCount}`,
    `structure ${quality.structureScore}`,
  ].join(", ");
};

export const describeRemote = (project: ProjectRecord): string | null => {
  if (project.remote === null) {
    return null;
  }

  const { remote } = project;
  return `${remote.repository} (${remote.stars} stars, ${remote.openIssues} open issues, ${remote.openPullRequests} open pull requests)`;
};
