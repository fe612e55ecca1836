import { describe, it, expect } from '@jest/globals';
import { ScenarioParseError } from '../src/validation/errors';
import {
  candidateOutputJsonSchema,
  parseScenario,
  parseScenarioText,
} from '../src/validation/schemas';

describe('parseScenario', () => {
  it('fills defaults for optional scenario fields', () => {
    expect(parseScenario({ satellites: [] })).toEqual({
      timestamp: '',
      strategy: 'balanced',
      satellites: [],
      satellite_links: [],
      target_links: [],
    });
  });

  it('reads the generator wire format and its legacy strategy spelling', () => {
    const scenario = parseScenario({
      timestamp: '2025-06-27T03:00:00Z',
      strategy: 'balance',
      sat_attrs: [{ id: 161, health: 1.0, pos: [1, 2, 3] }],
      sat_edges: [{ from: 161, to: 162, w: 0.4 }],
      target_edges: [{ from: 161, to: 21, q: 0.84 }],
    });

    expect(scenario).toEqual({
      timestamp: '2025-06-27T03:00:00Z',
      strategy: 'balanced',
      satellites: [{ id: 161, health: 1.0, position: [1, 2, 3] }],
      satellite_links: [{ from: 161, to: 162, weight: 0.4 }],
      target_links: [{ from: 161, to: 21, quality: 0.84 }],
    });
  });

  it('maps the misspelled quality strategy', () => {
    expect(parseScenario({ strategy: 'quailty', satellites: [] }).strategy).toBe('quality');
  });

  it('rejects out-of-range values with the failing path', () => {
    let caught: unknown;
    try {
      parseScenario({ satellites: [{ id: 1, health: 2, position: [0, 0, 0] }] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ScenarioParseError);
    if (caught instanceof ScenarioParseError) {
      expect(caught.issues.map((issue) => issue.path)).toEqual([['satellites', 0, 'health']]);
      expect(caught.message.split('\n')[0]).toBe('Scenario failed schema validation');
    }
  });

  it('rejects unknown strategies', () => {
    expect(() => parseScenario({ strategy: 'greedy', satellites: [] })).toThrow(ScenarioParseError);
  });
});

describe('parseScenarioText', () => {
  it('rejects text that is not JSON', () => {
    expect(() => parseScenarioText('not json')).toThrow(/^Scenario is not valid JSON: /);
  });

  it('parses JSON text', () => {
    expect(parseScenarioText('{"satellites":[]}').satellites).toEqual([]);
  });
});

describe('candidateOutputJsonSchema', () => {
  it('describes the candidate output under a named definition', () => {
    const schema = candidateOutputJsonSchema();

    expect(schema).toHaveProperty('$ref', '#/definitions/CandidateOutput');
    expect(schema).toHaveProperty('definitions.CandidateOutput.required', ['clusters']);
  });
});
