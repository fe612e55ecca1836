import { CandidateParseError } from './errors';

export interface ParsedCandidate {
  /** Generator reasoning, when the text carries any. */
  reasoning: string;
  output: unknown;
}

const THINK_PATTERN = /<think>([\s\S]*?)<\/think>([\s\S]*)$/;
const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new CandidateParseError(
      `Candidate JSON is malformed: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}

/** Slices from the first `{` or `[` to the last matching closer. */
function jsonSpan(text: string): string {
  const objectStart = text.indexOf('{');
  const arrayStart = text.indexOf('[');
  const starts = [objectStart, arrayStart].filter((index) => index !== -1);
  if (starts.length === 0) {
    throw new CandidateParseError('No JSON payload found in candidate text');
  }
  const start = Math.min(...starts);
  const end = text.lastIndexOf(start === objectStart ? '}' : ']');
  if (end < start) {
    throw new CandidateParseError('Candidate JSON payload is not terminated');
  }
  return text.slice(start, end + 1);
}

function chainOfThought(payload: unknown): string | null {
  if (
    typeof payload === 'object' &&
    payload !== null &&
    'chain_of_thought' in payload &&
    typeof payload.chain_of_thought === 'string'
  ) {
    return payload.chain_of_thought;
  }
  return null;
}

/**
 * Extracts a candidate clustering from raw generator text. Accepts a
 * `<think>` block followed by a cluster array, a fenced ```json block, or
 * bare JSON. A bare cluster array is wrapped as `{ clusters }`.
 */
export function parseCandidateText(text: string): ParsedCandidate {
  const think = THINK_PATTERN.exec(text);
  const body = think ? think[2] : text;

  const fenced = FENCE_PATTERN.exec(body);
  const payload = parseJson(fenced ? fenced[1] : jsonSpan(body));
  const preamble = fenced ? body.slice(0, fenced.index).trim() : '';

  return {
    reasoning: think ? think[1].trim() : chainOfThought(payload) ?? preamble,
    output: Array.isArray(payload) ? { clusters: payload } : payload,
  };
}
