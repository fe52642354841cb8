import type { HealthStatus, ProjectRecord, ScanResult } from "@repohealth/core";
import { REPORT_SCHEMA_VERSION, type ScanReport, type ScanReportTotals } from "./domain.js";

export type CreateScanReportOptions = {
  generatedAt?: string;
};

const countStatus = (projects: readonly ProjectRecord[], status: HealthStatus): number =>
  projects.filter((project) => project.health.status === status).length;

const computeTotals = (projects: readonly ProjectRecord[]): ScanReportTotals => ({
  total: projects.length,
  healthy: countStatus(projects, "healthy"),
  warning: countStatus(projects, "warning"),
  unhealthy: countStatus(projects, "unhealthy"),
});

export const createScanReport = (
  scan: ScanResult,
  options: CreateScanReportOptions = {},
): ScanReport => {
  const projects = [...scan.projects].sort(
    (a, b) => b.health.score - a.health.score || a.name.localeCompare(b.name),
  );

  return {
    schemaVersion: REPORT_SCHEMA_VERSION,
    generatedAt: options.generatedAt ?? new Date().toISOString(),
    rootPath: scan.rootPath,
    totals: computeTotals(projects),
    projects,
    skipped: scan.skipped,
  };
};
