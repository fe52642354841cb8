export type ThresholdDelta = {
  above: number;
  delta: number;
};

export type RangeDelta = {
  min: number;
  max: number;
  delta: number;
};

export type HealthEngineConfig = {
  baseline: number;
  scoreRange: {
    min: number;
    max: number;
  };
  vcs: {
    // Tiers are checked in order; the first match wins.
    uncommittedTiers: readonly ThresholdDelta[];
    uncommittedPerChangeDelta: number;
    uncommittedMaxMinorPenalty: number;
    commitAgeDayTiers: readonly ThresholdDelta[];
    unknownRemoteSyncDelta: number;
  };
  dependencies: {
    presentDelta: number;
    healthyVolume: RangeDelta;
    excessiveVolume: ThresholdDelta;
    multiEcosystem: ThresholdDelta;
  };
  remote: {
    openIssueTiers: readonly ThresholdDelta[];
    activePullRequests: RangeDelta;
    excessivePullRequests: ThresholdDelta;
    starTiers: readonly ThresholdDelta[];
    recentActivityMaxDays: number;
    recentActivityDelta: number;
  };
  quality: {
    readmeBase: number;
    readmeTierWeight: number;
    documentationDelta: number;
    testsBase: number;
    testTierWeight: number;
    ciDelta: number;
    toolWeight: number;
    maxToolBonus: number;
    structureWeight: number;
  };
  status: {
    healthyAtLeast: number;
    warningAtLeast: number;
  };
};

export const DEFAULT_HEALTH_ENGINE_CONFIG: HealthEngineConfig = {
  baseline: 10,
  scoreRange: {
    min: 0,
    max: 10,
  },
  vcs: {
    uncommittedTiers: [
      { above: 50, delta: -3 },
      { above: 10, delta: -2 },
    ],
    uncommittedPerChangeDelta: -0.1,
    uncommittedMaxMinorPenalty: 1,
    commitAgeDayTiers: [
      { above: 365, delta: -4 },
      { above: 180, delta: -2.5 },
      { above: 60, delta: -1.5 },
      { above: 14, delta: -0.5 },
    ],
    unknownRemoteSyncDelta: -0.5,
  },
  dependencies: {
    presentDelta: 0.5,
    healthyVolume: { min: 5, max: 50, delta: 0.3 },
    excessiveVolume: { above: 100, delta: -0.5 },
    multiEcosystem: { above: 1, delta: 0.2 },
  },
  remote: {
    openIssueTiers: [
      { above: 50, delta: -1.5 },
      { above: 20, delta: -1 },
      { above: 10, delta: -0.5 },
    ],
    activePullRequests: { min: 1, max: 5, delta: 0.3 },
    excessivePullRequests: { above: 10, delta: -0.3 },
    starTiers: [
      { above: 1000, delta: 0.5 },
      { above: 100, delta: 0.3 },
      { above: 10, delta: 0.1 },
    ],
    recentActivityMaxDays: 7,
    recentActivityDelta: 0.2,
  },
  quality: {
    readmeBase: 0.3,
    readmeTierWeight: 0.1,
    documentationDelta: 0.4,
    testsBase: 0.5,
    testTierWeight: 0.1,
    ciDelta: 0.6,
    toolWeight: 0.1,
    maxToolBonus: 0.5,
    structureWeight: 0.1,
  },
  status: {
    healthyAtLeast: 8,
    warningAtLeast: 5,
  },
};
