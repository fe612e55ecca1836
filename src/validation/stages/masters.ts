import { formatIdList, sortedIds } from '../../utils/format';
import type { StageContext, ValidationAccumulator } from '../types';

export function checkMasterNodes(ctx: StageContext, acc: ValidationAccumulator): void {
  const clustersByMaster = new Map<number, number[]>();

  for (const cluster of ctx.clusters) {
    if (cluster.sats.length === 0) {
      acc.errors.push(`cluster ${cluster.cluster_id} empty cluster`);
    } else if (!cluster.sats.includes(cluster.master)) {
      acc.errors.push(
        `cluster ${cluster.cluster_id} master not in its own cluster: ${cluster.master}`
      );
    }
    const owners = clustersByMaster.get(cluster.master) ?? [];
    owners.push(cluster.cluster_id);
    clustersByMaster.set(cluster.master, owners);
  }

  for (const master of sortedIds(clustersByMaster.keys())) {
    const owners = clustersByMaster.get(master) ?? [];
    if (owners.length > 1) {
      acc.errors.push(`duplicate master: ${master} in clusters ${formatIdList(owners)}`);
    }
  }
}
