import { formatScore } from '../../utils/format';
import type { StrategyPolicy } from '../config';
import type { Cluster } from '../schemas';
import type { StageContext, ValidationAccumulator } from '../types';

function sizeViolation(
  policy: StrategyPolicy,
  cluster: Cluster,
  expectedSize: number
): string | null {
  const size = cluster.sats.length;
  switch (policy.kind) {
    case 'balanced': {
      const low = expectedSize * (1 - policy.tolerance);
      const high = expectedSize * (1 + policy.tolerance);
      if (size < low || size > high) {
        return `strategy constraint violation: cluster ${cluster.cluster_id} size ${size} out of balanced range [${formatScore(low)}, ${formatScore(high)}]`;
      }
      return null;
    }
    case 'cap':
      if (size > policy.maxClusterSize) {
        return `strategy constraint violation: cluster ${cluster.cluster_id} size ${size} exceeds quality cap ${policy.maxClusterSize}`;
      }
      return null;
  }
}

export function checkStrategyConstraints(ctx: StageContext, acc: ValidationAccumulator): void {
  const policy = ctx.policies[ctx.scenario.strategy];
  // Empty clusters were already rejected by the master-node stage.
  const clusters = ctx.clusters.filter((cluster) => cluster.sats.length > 0);
  if (clusters.length === 0) {
    return;
  }
  const expectedSize = ctx.index.satelliteById.size / clusters.length;

  for (const cluster of clusters) {
    const violation = sizeViolation(policy, cluster, expectedSize);
    if (violation) {
      acc.warnings.push(violation);
    }

    const satCount = cluster.sats.length;
    const targetCount = cluster.targets.length;
    if (targetCount === 0) {
      acc.warnings.push(`cluster ${cluster.cluster_id} has no targets`);
    } else if (satCount > policy.maxSatsPerTarget * targetCount) {
      acc.warnings.push(
        `cluster ${cluster.cluster_id} satellite count (${satCount}) exceeds ${policy.maxSatsPerTarget}× target count (${targetCount})`
      );
    }
  }
}
