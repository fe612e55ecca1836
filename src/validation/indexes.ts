import type { SatelliteAttr, ScenarioInput } from './schemas';

export interface UndirectedLink {
  a: number;
  b: number;
  weight: number;
}

export interface ScenarioIndex {
  satelliteById: ReadonlyMap<number, SatelliteAttr>;
  /** Distinct target ids referenced by the scenario's target links. */
  targetIds: ReadonlySet<number>;
  /** Satellite ids listed more than once; the last entry wins. */
  duplicateSatelliteIds: readonly number[];
  /** One entry per unordered satellite pair, carrying its last listed weight. */
  links: readonly UndirectedLink[];
  linkWeight(a: number, b: number): number | undefined;
  targetQuality(satelliteId: number, targetId: number): number | undefined;
}

function pairKey(a: number, b: number): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}

function observationKey(satelliteId: number, targetId: number): string {
  return `${satelliteId}>${targetId}`;
}

export function buildScenarioIndex(scenario: ScenarioInput): ScenarioIndex {
  const satelliteById = new Map<number, SatelliteAttr>();
  const duplicates = new Set<number>();
  for (const sat of scenario.satellites) {
    if (satelliteById.has(sat.id)) {
      duplicates.add(sat.id);
    }
    satelliteById.set(sat.id, sat);
  }

  const links = new Map<string, UndirectedLink>();
  for (const link of scenario.satellite_links) {
    links.set(pairKey(link.from, link.to), {
      a: Math.min(link.from, link.to),
      b: Math.max(link.from, link.to),
      weight: link.weight,
    });
  }

  const qualities = new Map<string, number>();
  const targetIds = new Set<number>();
  for (const edge of scenario.target_links) {
    qualities.set(observationKey(edge.from, edge.to), edge.quality);
    targetIds.add(edge.to);
  }

  return {
    satelliteById,
    targetIds,
    duplicateSatelliteIds: Array.from(duplicates).sort((a, b) => a - b),
    links: Array.from(links.values()),
    linkWeight: (a, b) => links.get(pairKey(a, b))?.weight,
    targetQuality: (satelliteId, targetId) =>
      qualities.get(observationKey(satelliteId, targetId)),
  };
}
