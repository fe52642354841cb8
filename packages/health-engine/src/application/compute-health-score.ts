import type { HealthAdjustment, HealthAssessment, HealthStatus } from "@repohealth/core";
import { DEFAULT_HEALTH_ENGINE_CONFIG, type HealthEngineConfig } from "../config.js";
import { HEALTH_RULES, type HealthRule, type HealthScoreInputs } from "../domain/health-rules.js";
import { clamp, round4, sum } from "../domain/math.js";

export type ComputeHealthScoreOptions = {
  now?: Date;
  config?: Partial<HealthEngineConfig>;
  rules?: readonly HealthRule[];
};

const createEffectiveConfig = (
  overrides: Partial<HealthEngineConfig> | undefined,
): HealthEngineConfig => ({
  ...DEFAULT_HEALTH_ENGINE_CONFIG,
  ...overrides,
});

export const evaluateHealthRules = (
  inputs: HealthScoreInputs,
  options: ComputeHealthScoreOptions = {},
): readonly HealthAdjustment[] => {
  const context = {
    now: options.now ?? new Date(),
    config: createEffectiveConfig(options.config),
  };

  return (options.rules ?? HEALTH_RULES).map((rule) => ({
    rule: rule.id,
    delta: rule.evaluate(inputs, context),
  }));
};

export const toHealthStatus = (
  score: number,
  thresholds: HealthEngineConfig["status"] = DEFAULT_HEALTH_ENGINE_CONFIG.status,
): HealthStatus => {
  if (score >= thresholds.healthyAtLeast) {
    return "healthy";
  }

  return score >= thresholds.warningAtLeast ? "warning" : "unhealthy";
};

export const computeHealthScore = (
  inputs: HealthScoreInputs,
  options: ComputeHealthScoreOptions = {},
): HealthAssessment => {
  const config = createEffectiveConfig(options.config);
  const contributions = evaluateHealthRules(inputs, options);
  const rawScore = config.baseline + sum(contributions.map((adjustment) => adjustment.delta));
  const score = round4(clamp(rawScore, config.scoreRange.min, config.scoreRange.max));

  return {
    score,
    status: toHealthStatus(score, config.status),
    adjustments: contributions
      .filter((adjustment) => adjustment.delta !== 0)
      .map((adjustment) => ({ rule: adjustment.rule, delta: round4(adjustment.delta) })),
  };
};
