import type { z } from 'zod';
import { ClusterSchema, MISSING_FIELD, type Cluster } from '../schemas';

export type StructureCheck =
  | { ok: true; clusters: Cluster[] }
  | { ok: false; errors: string[] };

function describeIssue(position: number, issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  if (issue.code === 'custom') {
    return `cluster ${position} ${issue.message}`;
  }
  if (path === '') {
    return `cluster ${position}: ${issue.message}`;
  }
  if (issue.message === MISSING_FIELD) {
    return `cluster ${position} missing required field: ${path}`;
  }
  return `cluster ${position} field ${path}: ${issue.message}`;
}

/**
 * Checks the shape of a candidate clustering. Any error here is fatal:
 * the later stages assume every cluster parsed.
 */
export function checkStructure(output: unknown): StructureCheck {
  if (typeof output !== 'object' || output === null || Array.isArray(output)) {
    return { ok: false, errors: ['output must be an object'] };
  }
  if (!('clusters' in output)) {
    return { ok: false, errors: ['missing clusters field'] };
  }
  const rawClusters = output.clusters;
  if (!Array.isArray(rawClusters)) {
    return { ok: false, errors: ['clusters must be an array'] };
  }

  const errors: string[] = [];
  const clusters: Cluster[] = [];
  rawClusters.forEach((raw: unknown, position) => {
    const parsed = ClusterSchema.safeParse(raw);
    if (parsed.success) {
      clusters.push(parsed.data);
    } else {
      errors.push(...parsed.error.issues.map((issue) => describeIssue(position, issue)));
    }
  });

  return errors.length > 0 ? { ok: false, errors } : { ok: true, clusters };
}
