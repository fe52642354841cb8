import type {
  DependencySummary,
  HealthRuleId,
  QualitySignals,
  RemoteRepositoryMetadata,
  VcsSnapshot,
} from "@repohealth/core";
import type { HealthEngineConfig, RangeDelta, ThresholdDelta } from "../config.js";
import { sum, wholeDaysBetween } from "./math.js";

export type HealthScoreInputs = {
  vcs: Pick<VcsSnapshot, "uncommittedChanges" | "lastCommitAt" | "remoteSyncStatus">;
  dependencies: Pick<DependencySummary, "hasDependencies" | "counts" | "ecosystems">;
  remote: RemoteRepositoryMetadata | null;
  quality: QualitySignals;
};

export type HealthRuleContext = {
  now: Date;
  config: HealthEngineConfig;
};

export type HealthRule = {
  id: HealthRuleId;
  evaluate: (inputs: HealthScoreInputs, context: HealthRuleContext) => number;
};

const firstTierDelta = (value: number, tiers: readonly ThresholdDelta[]): number =>
  tiers.find((tier) => value > tier.above)?.delta ?? 0;

const inRange = (value: number, range: RangeDelta): boolean =>
  value >= range.min && value <= range.max;

const totalDependencies = (dependencies: HealthScoreInputs["dependencies"]): number =>
  sum(Object.values(dependencies.counts).map((count) => count ?? 0));

const uncommittedRule: HealthRule = {
  id: "vcs.uncommitted",
  evaluate: ({ vcs }, { config }) => {
    const changes = vcs.uncommittedChanges;
    if (changes <= 0) {
      return 0;
    }

    const tier = config.vcs.uncommittedTiers.find((candidate) => changes > candidate.above);
    if (tier !== undefined) {
      return tier.delta;
    }

    const penalty = Math.abs(changes * config.vcs.uncommittedPerChangeDelta);
    return -Math.min(config.vcs.uncommittedMaxMinorPenalty, penalty);
  },
};

const commitAgeRule: HealthRule = {
  id: "vcs.commit_age",
  evaluate: ({ vcs }, { now, config }) => {
    if (vcs.lastCommitAt === null) {
      return 0;
    }

    const days = wholeDaysBetween(vcs.lastCommitAt, now);
    return days === null ? 0 : firstTierDelta(days, config.vcs.commitAgeDayTiers);
  },
};

const remoteSyncRule: HealthRule = {
  id: "vcs.remote_sync",
  evaluate: ({ vcs }, { config }) =>
    vcs.remoteSyncStatus === "unknown" ? config.vcs.unknownRemoteSyncDelta : 0,
};

const dependenciesPresentRule: HealthRule = {
  id: "dependencies.present",
  evaluate: ({ dependencies }, { config }) =>
    dependencies.hasDependencies ? config.dependencies.presentDelta : 0,
};

const dependencyVolumeRule: HealthRule = {
  id: "dependencies.volume",
  evaluate: ({ dependencies }, { config }) => {
    if (!dependencies.hasDependencies) {
      return 0;
    }

    const total = totalDependencies(dependencies);
    if (inRange(total, config.dependencies.healthyVolume)) {
      return config.dependencies.healthyVolume.delta;
    }

    return firstTierDelta(total, [config.dependencies.excessiveVolume]);
  },
};

const multiEcosystemRule: HealthRule = {
  id: "dependencies.multi_ecosystem",
  evaluate: ({ dependencies }, { config }) =>
    firstTierDelta(dependencies.ecosystems.length, [config.dependencies.multiEcosystem]),
};

const openIssuesRule: HealthRule = {
  id: "remote.open_issues",
  evaluate: ({ remote }, { config }) =>
    remote === null ? 0 : firstTierDelta(remote.openIssues, config.remote.openIssueTiers),
};

const openPullRequestsRule: HealthRule = {
  id: "remote.open_pull_requests",
  evaluate: ({ remote }, { config }) => {
    if (remote === null) {
      return 0;
    }

    if (inRange(remote.openPullRequests, config.remote.activePullRequests)) {
      return config.remote.activePullRequests.delta;
    }

    return firstTierDelta(remote.openPullRequests, [config.remote.excessivePullRequests]);
  },
};

const starsRule: HealthRule = {
  id: "remote.stars",
  evaluate: ({ remote }, { config }) =>
    remote === null ? 0 : firstTierDelta(remote.stars, config.remote.starTiers),
};

const recentActivityRule: HealthRule = {
  id: "remote.recent_activity",
  evaluate: ({ remote, vcs }, { now, config }) => {
    if (remote === null || remote.lastActivityAt === null || vcs.lastCommitAt === null) {
      return 0;
    }

    const days = wholeDaysBetween(remote.lastActivityAt, now);
    return days !== null && days <= config.remote.recentActivityMaxDays
      ? config.remote.recentActivityDelta
      : 0;
  },
};

const readmeRule: HealthRule = {
  id: "quality.readme",
  evaluate: ({ quality }, { config }) =>
    quality.hasReadme
      ? config.quality.readmeBase + quality.readmeTier * config.quality.readmeTierWeight
      : 0,
};

const documentationRule: HealthRule = {
  id: "quality.documentation",
  evaluate: ({ quality }, { config }) =>
    quality.hasDocumentation ? config.quality.documentationDelta : 0,
};

const testsRule: HealthRule = {
  id: "quality.tests",
  evaluate: ({ quality }, { config }) =>
    quality.hasTests
      ? config.quality.testsBase + quality.testCoverageTier * config.quality.testTierWeight
      : 0,
};

const ciRule: HealthRule = {
  id: "quality.ci",
  evaluate: ({ quality }, { config }) => (quality.hasCi ? config.quality.ciDelta : 0),
};

const toolsRule: HealthRule = {
  id: "quality.tools",
  evaluate: ({ quality }, { config }) =>
    Math.min(config.quality.maxToolBonus, quality.qualityToolCount * config.quality.toolWeight),
};

const structureRule: HealthRule = {
  id: "quality.structure",
  evaluate: ({ quality }, { config }) => quality.structureScore * config.quality.structureWeight,
};

export const HEALTH_RULES: readonly HealthRule[] = [
  uncommittedRule,
  commitAgeRule,
  remoteSyncRule,
  dependenciesPresentRule,
  dependencyVolumeRule,
  multiEcosystemRule,
  openIssuesRule,
  openPullRequestsRule,
  starsRule,
  recentActivityRule,
  readmeRule,
  documentationRule,
  testsRule,
  ciRule,
  toolsRule,
  structureRule,
];
