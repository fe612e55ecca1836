import { formatScore } from '../../utils/format';
import { mean } from '../../utils/stats';
import type { ScenarioIndex } from '../indexes';
import type { Cluster } from '../schemas';
import type { ClusterMetrics, StageContext, ValidationAccumulator } from '../types';

function averageLinkStrength(index: ScenarioIndex, sats: readonly number[]): number | null {
  const weights: number[] = [];
  for (let i = 0; i < sats.length; i++) {
    for (let j = i + 1; j < sats.length; j++) {
      const weight = index.linkWeight(sats[i], sats[j]);
      if (weight !== undefined) {
        weights.push(weight);
      }
    }
  }
  return mean(weights);
}

function averageObservationQuality(index: ScenarioIndex, cluster: Cluster): number | null {
  const qualities: number[] = [];
  for (const sat of cluster.sats) {
    for (const target of cluster.targets) {
      const quality = index.targetQuality(sat, target);
      if (quality !== undefined) {
        qualities.push(quality);
      }
    }
  }
  return mean(qualities);
}

function scoreCluster(index: ScenarioIndex, cluster: Cluster): ClusterMetrics {
  const healths: number[] = [];
  for (const sat of cluster.sats) {
    const attr = index.satelliteById.get(sat);
    if (attr) {
      healths.push(attr.health);
    }
  }
  return {
    cluster_id: cluster.cluster_id,
    size: cluster.sats.length,
    avg_link_strength: averageLinkStrength(index, cluster.sats),
    avg_observation_quality: averageObservationQuality(index, cluster),
    master_health: index.satelliteById.get(cluster.master)?.health ?? null,
    avg_health: mean(healths),
  };
}

function defined(values: Array<number | null>): number[] {
  return values.filter((value): value is number => value !== null);
}

/**
 * Scores link strength, observation quality and health per non-empty
 * cluster. Pairs without a scenario value are left out of the averages
 * rather than counted as zero.
 */
export function scoreQuality(ctx: StageContext, acc: ValidationAccumulator): void {
  const { thresholds } = ctx;
  const scored = ctx.clusters
    .filter((cluster) => cluster.sats.length > 0)
    .map((cluster) => ({ master: cluster.master, metrics: scoreCluster(ctx.index, cluster) }));
  const metrics = scored.map((entry) => entry.metrics);

  const linkWarnings: string[] = [];
  const observationWarnings: string[] = [];
  const healthWarnings: string[] = [];

  for (const { master, metrics: m } of scored) {
    if (m.avg_link_strength !== null && m.avg_link_strength < thresholds.minLinkStrength) {
      linkWarnings.push(
        `cluster ${m.cluster_id} avg link strength low: ${formatScore(m.avg_link_strength)}`
      );
    }
    if (
      m.avg_observation_quality !== null &&
      m.avg_observation_quality < thresholds.minObservationQuality
    ) {
      observationWarnings.push(
        `cluster ${m.cluster_id} avg observation quality low: ${formatScore(m.avg_observation_quality)}`
      );
    }
    if (m.master_health !== null && m.master_health < thresholds.minMasterHealth) {
      healthWarnings.push(
        `cluster ${m.cluster_id} master ${master} health low: ${formatScore(m.master_health)}`
      );
    }
    if (m.avg_health !== null && m.avg_health < thresholds.minClusterHealth) {
      healthWarnings.push(`cluster ${m.cluster_id} avg health low: ${formatScore(m.avg_health)}`);
    }
  }

  acc.warnings.push(...linkWarnings, ...observationWarnings, ...healthWarnings);
  acc.clusterMetrics.push(...metrics);

  const linkAverages = defined(metrics.map((m) => m.avg_link_strength));
  const observationAverages = defined(metrics.map((m) => m.avg_observation_quality));
  acc.details.link_quality = {
    overall_avg_strength: mean(linkAverages),
    cluster_count: linkAverages.length,
  };
  acc.details.observation_quality = {
    overall_avg_quality: mean(observationAverages),
    cluster_count: observationAverages.length,
  };
  acc.details.health = {
    avg_master_health: mean(defined(metrics.map((m) => m.master_health))),
    avg_cluster_health: mean(defined(metrics.map((m) => m.avg_health))),
  };
}
