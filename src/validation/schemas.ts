import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ScenarioParseError } from './errors';

const unitInterval = z.number().min(0).max(1);
const entityId = z.number().int();
const position = z.tuple([z.number(), z.number(), z.number()]);

export const StrategyEnum = z.enum(['balanced', 'quality']);
export type Strategy = z.infer<typeof StrategyEnum>;

// Spellings emitted by older scenario generators.
const LEGACY_STRATEGIES = new Map<string, Strategy>([
  ['balance', 'balanced'],
  ['quailty', 'quality'],
]);

export const StrategySchema = z.preprocess(
  (value) => (typeof value === 'string' ? LEGACY_STRATEGIES.get(value) ?? value : value),
  StrategyEnum
);

export const SatelliteAttrSchema = z.object({
  id: entityId,
  health: unitInterval,
  position,
});

export const LinkEdgeSchema = z.object({
  from: entityId,
  to: entityId,
  weight: unitInterval,
});

export const TargetEdgeSchema = z.object({
  from: entityId,
  to: entityId,
  quality: unitInterval,
});

export const ScenarioInputSchema = z.object({
  timestamp: z.string().default(''),
  strategy: StrategySchema.default('balanced'),
  satellites: z.array(SatelliteAttrSchema),
  satellite_links: z.array(LinkEdgeSchema).default([]),
  target_links: z.array(TargetEdgeSchema).default([]),
});

export type SatelliteAttr = z.infer<typeof SatelliteAttrSchema>;
export type LinkEdge = z.infer<typeof LinkEdgeSchema>;
export type TargetEdge = z.infer<typeof TargetEdgeSchema>;
export type ScenarioInput = z.infer<typeof ScenarioInputSchema>;

/**
 * Scenario as written by the dataset generator: `sat_attrs`, `sat_edges`
 * with weight `w` and `target_edges` with quality `q`.
 */
export const ScenarioWireSchema = z
  .object({
    timestamp: z.string().default(''),
    strategy: StrategySchema.default('balanced'),
    sat_attrs: z.array(
      z.object({ id: entityId, health: unitInterval, pos: position })
    ),
    sat_edges: z
      .array(z.object({ from: entityId, to: entityId, w: unitInterval }))
      .default([]),
    target_edges: z
      .array(z.object({ from: entityId, to: entityId, q: unitInterval }))
      .default([]),
  })
  .transform(
    (wire): ScenarioInput => ({
      timestamp: wire.timestamp,
      strategy: wire.strategy,
      satellites: wire.sat_attrs.map((sat) => ({
        id: sat.id,
        health: sat.health,
        position: sat.pos,
      })),
      satellite_links: wire.sat_edges.map((edge) => ({
        from: edge.from,
        to: edge.to,
        weight: edge.w,
      })),
      target_links: wire.target_edges.map((edge) => ({
        from: edge.from,
        to: edge.to,
        quality: edge.q,
      })),
    })
  );

function isWireScenario(raw: unknown): boolean {
  return typeof raw === 'object' && raw !== null && 'sat_attrs' in raw;
}

export function parseScenario(raw: unknown): ScenarioInput {
  const schema: z.ZodType<ScenarioInput, z.ZodTypeDef, unknown> = isWireScenario(raw)
    ? ScenarioWireSchema
    : ScenarioInputSchema;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ScenarioParseError('Scenario failed schema validation', parsed.error.issues);
  }
  return parsed.data;
}

export function parseScenarioText(text: string): ScenarioInput {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ScenarioParseError(
      `Scenario is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseScenario(raw);
}

export const MISSING_FIELD = 'missing required field';
const ID_MESSAGE = 'must be an integer id';
const ID_LIST_MESSAGE = 'must be an array of integer ids';

const clusterIdField = z
  .number({ required_error: MISSING_FIELD, invalid_type_error: ID_MESSAGE })
  .int({ message: ID_MESSAGE });

function idListField(kind: 'satellite' | 'target') {
  return z
    .array(z.number({ invalid_type_error: ID_MESSAGE }).int({ message: ID_MESSAGE }), {
      required_error: MISSING_FIELD,
      invalid_type_error: ID_LIST_MESSAGE,
    })
    .superRefine((ids, ctx) => {
      const seen = new Set<number>();
      const reported = new Set<number>();
      for (const id of ids) {
        if (seen.has(id) && !reported.has(id)) {
          reported.add(id);
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `duplicate ${kind} within cluster: ${id}`,
          });
        }
        seen.add(id);
      }
    });
}

export const ClusterSchema = z.object(
  {
    cluster_id: clusterIdField,
    master: clusterIdField,
    sats: idListField('satellite'),
    targets: idListField('target'),
  },
  { invalid_type_error: 'must be an object' }
);

export const CandidateOutputSchema = z.object({
  chain_of_thought: z.string().optional(),
  clusters: z.array(ClusterSchema),
});

export type Cluster = z.infer<typeof ClusterSchema>;
export type CandidateOutput = z.infer<typeof CandidateOutputSchema>;

export function candidateOutputJsonSchema(): ReturnType<typeof zodToJsonSchema> {
  return zodToJsonSchema(CandidateOutputSchema, 'CandidateOutput');
}
