import type { ValidationAccumulator, ValidationResult } from './types';

export function createAccumulator(): ValidationAccumulator {
  return { errors: [], warnings: [], details: {}, clusterMetrics: [] };
}

export function finalizeResult(acc: ValidationAccumulator): ValidationResult {
  return {
    is_valid: acc.errors.length === 0,
    errors: [...acc.errors],
    warnings: [...acc.warnings],
    details: { ...acc.details },
    cluster_metrics: [...acc.clusterMetrics],
  };
}

/** Result for an input that never reached the engine. */
export function unparseableResult(reason: string): ValidationResult {
  return {
    is_valid: false,
    errors: [`unparseable record: ${reason}`],
    warnings: [],
    details: {},
    cluster_metrics: [],
  };
}
