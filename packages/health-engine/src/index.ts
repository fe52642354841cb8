export {
  computeHealthScore,
  evaluateHealthRules,
  toHealthStatus,
  type ComputeHealthScoreOptions,
} from "./application/compute-health-score.js";
export {
  DEFAULT_HEALTH_ENGINE_CONFIG,
  type HealthEngineConfig,
  type RangeDelta,
  type ThresholdDelta,
} from "./config.js";
export {
  HEALTH_RULES,
  type HealthRule,
  type HealthRuleContext,
  type HealthScoreInputs,
} from "./domain/health-rules.js";
