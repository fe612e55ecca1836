import { formatIdList, sortedIds } from '../../utils/format';
import type { StageContext, ValidationAccumulator } from '../types';

export function checkTargetCoverage(ctx: StageContext, acc: ValidationAccumulator): void {
  const inputTargets = ctx.index.targetIds;
  const outputTargets = new Set<number>();
  for (const cluster of ctx.clusters) {
    for (const target of cluster.targets) {
      outputTargets.add(target);
    }
  }

  const missing = sortedIds(inputTargets).filter((id) => !outputTargets.has(id));
  const unknown = sortedIds(outputTargets).filter((id) => !inputTargets.has(id));

  if (missing.length > 0) {
    acc.errors.push(`missing targets: ${formatIdList(missing)}`);
  }
  if (unknown.length > 0) {
    acc.errors.push(`unknown targets: ${formatIdList(unknown)}`);
  }

  const covered = outputTargets.size - unknown.length;
  acc.details.target_coverage = {
    input_targets: inputTargets.size,
    output_targets: outputTargets.size,
    // A scenario without targets is trivially covered.
    coverage_rate: inputTargets.size === 0 ? 1 : covered / inputTargets.size,
  };
}

export function checkSatelliteAssignment(ctx: StageContext, acc: ValidationAccumulator): void {
  const { satelliteById } = ctx.index;
  const assignments = new Map<number, number[]>();
  for (const cluster of ctx.clusters) {
    for (const sat of cluster.sats) {
      const owners = assignments.get(sat) ?? [];
      owners.push(cluster.cluster_id);
      assignments.set(sat, owners);
    }
  }

  for (const sat of sortedIds(assignments.keys())) {
    const owners = assignments.get(sat) ?? [];
    if (owners.length > 1) {
      acc.errors.push(`duplicate assignment: satellite ${sat} in clusters ${formatIdList(owners)}`);
    }
  }

  const assigned = sortedIds(assignments.keys());
  const unknown = assigned.filter((id) => !satelliteById.has(id));
  if (unknown.length > 0) {
    acc.errors.push(`unknown satellites: ${formatIdList(unknown)}`);
  }

  const unused = sortedIds(satelliteById.keys()).filter((id) => !assignments.has(id));
  if (unused.length > 0) {
    acc.warnings.push(`unused satellites: ${formatIdList(unused)}`);
  }

  const knownAssigned = assigned.length - unknown.length;
  acc.details.satellite_assignment = {
    total_satellites: satelliteById.size,
    assigned_satellites: knownAssigned,
    utilization_rate: satelliteById.size === 0 ? 0 : knownAssigned / satelliteById.size,
  };
}
