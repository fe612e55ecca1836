import { defaultLogger, type Logger } from '../utils/logger';
import {
  QUALITY_THRESHOLDS,
  STRATEGY_POLICIES,
  THRESHOLD_KEYS,
  type QualityThresholds,
  type StrategyPolicies,
} from './config';
import { buildScenarioIndex } from './indexes';
import { createAccumulator, finalizeResult } from './result';
import { StrategyEnum, type ScenarioInput } from './schemas';
import { checkStructure, VALIDATION_STAGES } from './stages';
import type { ValidationResult } from './types';

export interface ValidatorOptions {
  logger?: Logger;
  thresholds?: Partial<QualityThresholds>;
  policies?: Partial<StrategyPolicies>;
}

// Overrides left undefined keep the default.
function resolveThresholds(overrides: Partial<QualityThresholds> = {}): QualityThresholds {
  const thresholds = { ...QUALITY_THRESHOLDS };
  for (const key of THRESHOLD_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      thresholds[key] = value;
    }
  }
  return thresholds;
}

function resolvePolicies(overrides: Partial<StrategyPolicies> = {}): StrategyPolicies {
  const policies = { ...STRATEGY_POLICIES };
  for (const strategy of StrategyEnum.options) {
    const policy = overrides[strategy];
    if (policy !== undefined) {
      policies[strategy] = policy;
    }
  }
  return policies;
}

/**
 * Validates candidate satellite clusterings against the scenario they were
 * generated for.
 *
 * Holds configuration only; every call builds its own indexes and result,
 * so one instance can serve concurrent callers.
 */
export class ClusterValidator {
  private readonly logger: Logger;
  private readonly thresholds: QualityThresholds;
  private readonly policies: StrategyPolicies;

  constructor(options: ValidatorOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.thresholds = resolveThresholds(options.thresholds);
    this.policies = resolvePolicies(options.policies);
  }

  validate(output: unknown, scenario: ScenarioInput): ValidationResult {
    const acc = createAccumulator();

    try {
      const index = buildScenarioIndex(scenario);
      if (index.duplicateSatelliteIds.length > 0) {
        this.logger.warn('Scenario lists satellites more than once; keeping the last entry', {
          timestamp: scenario.timestamp,
          satelliteIds: index.duplicateSatelliteIds,
        });
      }

      const structure = checkStructure(output);
      if (!structure.ok) {
        acc.errors.push(...structure.errors);
      } else {
        const ctx = {
          scenario,
          index,
          clusters: structure.clusters,
          thresholds: this.thresholds,
          policies: this.policies,
        };
        for (const stage of VALIDATION_STAGES) {
          stage(ctx, acc);
        }
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Cluster validation aborted by an internal fault', {
        timestamp: scenario.timestamp,
        error: message,
      });
      acc.errors.push(`internal validation error: ${message}`);
    }

    const result = finalizeResult(acc);
    if (!result.is_valid) {
      this.logger.info(`Clustering rejected with ${result.errors.length} error(s)`, {
        timestamp: scenario.timestamp,
        warnings: result.warnings.length,
      });
    }
    return result;
  }
}

export function validateClustering(
  output: unknown,
  scenario: ScenarioInput,
  options?: ValidatorOptions
): ValidationResult {
  return new ClusterValidator(options).validate(output, scenario);
}
