export type GitInspectionConfig = {
  commandTimeoutMs: number;
  defaultBranch: string;
  originRemote: string;
};

export const DEFAULT_GIT_INSPECTION_CONFIG: GitInspectionConfig = {
  commandTimeoutMs: 5000,
  defaultBranch: "main",
  originRemote: "origin",
};
