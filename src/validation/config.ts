import type { Strategy } from './schemas';

export type QualityThresholds = {
  minLinkStrength: number;
  minObservationQuality: number;
  minMasterHealth: number;
  minClusterHealth: number;
  mergeLinkStrength: number;
};

export const THRESHOLD_KEYS: readonly (keyof QualityThresholds)[] = [
  'minLinkStrength',
  'minObservationQuality',
  'minMasterHealth',
  'minClusterHealth',
  'mergeLinkStrength',
];

export const QUALITY_THRESHOLDS: QualityThresholds = {
  minLinkStrength: parseFloat(process.env.MIN_LINK_STRENGTH || '0.3'),
  minObservationQuality: parseFloat(process.env.MIN_OBSERVATION_QUALITY || '0.5'),
  minMasterHealth: parseFloat(process.env.MIN_MASTER_HEALTH || '0.7'),
  minClusterHealth: parseFloat(process.env.MIN_CLUSTER_HEALTH || '0.6'),
  mergeLinkStrength: parseFloat(process.env.MERGE_LINK_STRENGTH || '0.7'),
};

/**
 * Cluster-size policy for a clustering strategy.
 *
 * `balanced` accepts sizes within `tolerance` (a fraction) of the fleet
 * size divided evenly across clusters; `cap` accepts sizes up to
 * `maxClusterSize`. Both bound satellites per assigned target.
 */
export type StrategyPolicy =
  | { kind: 'balanced'; tolerance: number; maxSatsPerTarget: number }
  | { kind: 'cap'; maxClusterSize: number; maxSatsPerTarget: number };

export type StrategyPolicies = Record<Strategy, StrategyPolicy>;

export const STRATEGY_POLICIES: StrategyPolicies = {
  balanced: { kind: 'balanced', tolerance: 0.5, maxSatsPerTarget: 1 },
  quality: { kind: 'cap', maxClusterSize: 6, maxSatsPerTarget: 2 },
};
