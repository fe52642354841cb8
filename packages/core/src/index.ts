export {
  createSilentLogger,
  createStderrLogger,
  LOG_LEVELS,
  parseLogLevel,
  type LogLevel,
  type Logger,
  type LogSink,
} from "./logger.js";

export type WorkingTreeStatus = "clean" | "dirty";

export type RemoteSyncStatus = "clean" | "dirty" | "unknown";

export type VcsSnapshot = {
  branch: string;
  lastCommitAt: string | null;
  uncommittedChanges: number;
  status: WorkingTreeStatus;
  remoteSyncStatus: RemoteSyncStatus;
};

export type VcsInspectionAvailable = VcsSnapshot & {
  targetPath: string;
  available: true;
  originUrl: string | null;
};

export type VcsInspectionUnavailable = {
  targetPath: string;
  available: false;
  reason: "git_command_failed" | "git_command_timed_out";
  message: string;
};

export type VcsInspection = VcsInspectionAvailable | VcsInspectionUnavailable;

export type DependencyEcosystem = "npm" | "pip" | "poetry" | "go";

export type DependencySummary = {
  hasDependencies: boolean;
  counts: Readonly<Partial<Record<DependencyEcosystem, number>>>;
  ecosystems: readonly DependencyEcosystem[];
  details: readonly string[];
  summary: string;
};

export type CiSystem =
  | "GitHub Actions"
  | "GitLab CI"
  | "Travis CI"
  | "Azure Pipelines"
  | "Other CI"
  | "none";

export type QualitySignals = {
  hasReadme: boolean;
  readmeTier: number;
  hasTests: boolean;
  testCoverageTier: number;
  hasCi: boolean;
  ciSystem: CiSystem;
  hasDocumentation: boolean;
  qualityToolCount: number;
  structureScore: number;
};

export type WorkflowStatus = "unknown";

export type RemoteRepositoryMetadata = {
  repository: string;
  stars: number;
  openIssues: number;
  openPullRequests: number;
  lastActivityAt: string | null;
  workflowStatus: WorkflowStatus;
};

export type HealthStatus = "healthy" | "warning" | "unhealthy";

export type HealthRuleId =
  | "vcs.uncommitted"
  | "vcs.commit_age"
  | "vcs.remote_sync"
  | "dependencies.present"
  | "dependencies.volume"
  | "dependencies.multi_ecosystem"
  | "remote.open_issues"
  | "remote.open_pull_requests"
  | "remote.stars"
  | "remote.recent_activity"
  | "quality.readme"
  | "quality.documentation"
  | "quality.tests"
  | "quality.ci"
  | "quality.tools"
  | "quality.structure";

export type HealthAdjustment = {
  rule: HealthRuleId;
  delta: number;
};

export type HealthAssessment = {
  score: number;
  status: HealthStatus;
  adjustments: readonly HealthAdjustment[];
};

export type ProjectRecord = {
  readonly name: string;
  readonly path: string;
  readonly vcs: Readonly<VcsSnapshot>;
  readonly languages: readonly string[];
  readonly dependencies: Readonly<DependencySummary>;
  readonly quality: Readonly<QualitySignals>;
  readonly remote: Readonly<RemoteRepositoryMetadata> | null;
  readonly health: Readonly<HealthAssessment>;
};

export type SkipReason = "not_git_repository" | "vcs_unavailable" | "analysis_failed";

export type SkippedDirectory = {
  name: string;
  path: string;
  reason: SkipReason;
  message?: string;
};

export type ScanEntry =
  | { kind: "project"; record: ProjectRecord }
  | ({ kind: "skipped" } & SkippedDirectory);

export type ScanResult = {
  rootPath: string;
  projects: readonly ProjectRecord[];
  skipped: readonly SkippedDirectory[];
};
