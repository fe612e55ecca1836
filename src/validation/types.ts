import type { QualityThresholds, StrategyPolicies } from './config';
import type { ScenarioIndex } from './indexes';
import type { Cluster, ScenarioInput } from './schemas';

export type TargetCoverageDetails = {
  input_targets: number;
  output_targets: number;
  coverage_rate: number;
};

export type SatelliteAssignmentDetails = {
  total_satellites: number;
  assigned_satellites: number;
  utilization_rate: number;
};

export type LinkQualityDetails = {
  overall_avg_strength: number | null;
  cluster_count: number;
};

export type ObservationQualityDetails = {
  overall_avg_quality: number | null;
  cluster_count: number;
};

export type HealthDetails = {
  avg_master_health: number | null;
  avg_cluster_health: number | null;
};

export type ClusterMergeDetails = {
  candidate_pairs: number;
  max_inter_cluster_strength: number | null;
};

/** Sections are absent when the stage producing them did not run. */
export interface ValidationDetails {
  target_coverage?: TargetCoverageDetails;
  satellite_assignment?: SatelliteAssignmentDetails;
  link_quality?: LinkQualityDetails;
  observation_quality?: ObservationQualityDetails;
  health?: HealthDetails;
  cluster_merge?: ClusterMergeDetails;
}

export interface ClusterMetrics {
  cluster_id: number;
  size: number;
  avg_link_strength: number | null;
  avg_observation_quality: number | null;
  master_health: number | null;
  avg_health: number | null;
}

export interface ValidationResult {
  readonly is_valid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly details: Readonly<ValidationDetails>;
  readonly cluster_metrics: readonly ClusterMetrics[];
}

/** Mutable collections shared by the stages of one validation call. */
export interface ValidationAccumulator {
  errors: string[];
  warnings: string[];
  details: ValidationDetails;
  clusterMetrics: ClusterMetrics[];
}

export interface StageContext {
  scenario: ScenarioInput;
  index: ScenarioIndex;
  clusters: readonly Cluster[];
  thresholds: QualityThresholds;
  policies: StrategyPolicies;
}

export type ValidationStage = (ctx: StageContext, acc: ValidationAccumulator) => void;
