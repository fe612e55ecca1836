import { formatScore } from '../../utils/format';
import { max } from '../../utils/stats';
import type { StageContext, ValidationAccumulator } from '../types';

interface ClusterPair {
  first: number;
  second: number;
  strength: number;
}

/**
 * Flags pairs of clusters joined by strong inter-satellite links, which a
 * generator aiming for the fewest clusters should have merged.
 */
export function adviseMerges(ctx: StageContext, acc: ValidationAccumulator): void {
  const clusterOf = new Map<number, number>();
  ctx.clusters.forEach((cluster, position) => {
    for (const sat of cluster.sats) {
      if (!clusterOf.has(sat)) {
        clusterOf.set(sat, position);
      }
    }
  });

  const pairs = new Map<string, ClusterPair>();
  for (const link of ctx.index.links) {
    const a = clusterOf.get(link.a);
    const b = clusterOf.get(link.b);
    if (a === undefined || b === undefined || a === b) {
      continue;
    }
    const first = Math.min(a, b);
    const second = Math.max(a, b);
    const key = `${first}:${second}`;
    const pair = pairs.get(key) ?? { first, second, strength: 0 };
    pair.strength += link.weight;
    pairs.set(key, pair);
  }

  const candidates = Array.from(pairs.values())
    .filter((pair) => pair.strength > ctx.thresholds.mergeLinkStrength)
    .sort((x, y) => x.first - y.first || x.second - y.second);

  for (const pair of candidates) {
    const firstId = ctx.clusters[pair.first].cluster_id;
    const secondId = ctx.clusters[pair.second].cluster_id;
    acc.warnings.push(
      `clusters ${firstId} and ${secondId} could be merged: inter-cluster link strength ${formatScore(pair.strength)}`
    );
  }

  acc.details.cluster_merge = {
    candidate_pairs: candidates.length,
    max_inter_cluster_strength: max(Array.from(pairs.values(), (pair) => pair.strength)),
  };
}
