import { describe, it, expect } from '@jest/globals';
import { parseCandidateText } from '../src/validation/candidateParser';
import { CandidateParseError } from '../src/validation/errors';

describe('parseCandidateText', () => {
  it('splits a think block from the cluster array that follows it', () => {
    const text =
      '<think>\nGroup by links.\n</think>\n[{"cluster_id":1,"master":125,"sats":[125],"targets":[1]}]';

    expect(parseCandidateText(text)).toEqual({
      reasoning: 'Group by links.',
      output: { clusters: [{ cluster_id: 1, master: 125, sats: [125], targets: [1] }] },
    });
  });

  it('reads a fenced json block and prefers its chain_of_thought', () => {
    const text = 'Here is the plan.\n```json\n{"chain_of_thought":"cot","clusters":[]}\n```';

    expect(parseCandidateText(text)).toEqual({
      reasoning: 'cot',
      output: { chain_of_thought: 'cot', clusters: [] },
    });
  });

  it('falls back to the text before the fence for reasoning', () => {
    const text = 'Here is the plan.\n```\n{"clusters":[]}\n```\nThanks';

    expect(parseCandidateText(text)).toEqual({
      reasoning: 'Here is the plan.',
      output: { clusters: [] },
    });
  });

  it('accepts an upper-case fence tag', () => {
    const text = 'Plan\n```JSON\n{"clusters":[]}\n```';

    expect(parseCandidateText(text)).toEqual({
      reasoning: 'Plan',
      output: { clusters: [] },
    });
  });

  it('finds bare JSON inside surrounding prose', () => {
    expect(parseCandidateText('result: {"clusters":[]} done')).toEqual({
      reasoning: '',
      output: { clusters: [] },
    });
  });

  it('fails when there is no JSON payload', () => {
    expect(() => parseCandidateText('no payload here')).toThrow(
      new CandidateParseError('No JSON payload found in candidate text')
    );
  });

  it('fails on an unterminated payload', () => {
    expect(() => parseCandidateText('start { "clusters": [')).toThrow(
      'Candidate JSON payload is not terminated'
    );
  });

  it('fails on malformed JSON', () => {
    expect(() => parseCandidateText('{"clusters": [1,}')).toThrow(
      /^Candidate JSON is malformed: /
    );
  });
});
