import { describe, it, expect, jest } from '@jest/globals';
import {
  checkJsonLines,
  datasetFormatFromPath,
  parseDatasetText,
  type DatasetRecord,
} from '../src/dataset/parseDataset';
import { validateDataset } from '../src/dataset/validateDataset';
import { DatasetFormatError } from '../src/validation/errors';
import { silentLogger, withoutInfo, type Logger } from '../src/utils/logger';

const wireScenario = JSON.stringify({
  timestamp: '2025-06-27T03:00:00Z',
  strategy: 'balance',
  sat_attrs: [{ id: 161, health: 1.0, pos: [0, 0, 0] }],
  sat_edges: [],
  target_edges: [{ from: 161, to: 21, q: 0.84 }],
});

const thinkAnswer =
  '<think>One satellite sees the only target.</think>\n' +
  '[{"cluster_id":1,"master":161,"sats":[161],"targets":[21]}]';

function recordingLogger() {
  return {
    error: jest.fn<Logger['error']>(),
    warn: jest.fn<Logger['warn']>(),
    info: jest.fn<Logger['info']>(),
  };
}

function chatRecord(user: string, assistant: string): DatasetRecord {
  return {
    messages: [
      { role: 'system', content: 'Cluster the satellites.' },
      { role: 'user', content: user },
      { role: 'assistant', content: assistant },
    ],
  };
}

describe('datasetFormatFromPath', () => {
  it('detects json and jsonl files', () => {
    expect(datasetFormatFromPath('data/train.json')).toBe('json');
    expect(datasetFormatFromPath('data/train.JSONL')).toBe('jsonl');
  });

  it('rejects other extensions', () => {
    expect(() => datasetFormatFromPath('data/train.csv')).toThrow(
      'Unsupported dataset file type: .csv. Supported formats: .json, .jsonl'
    );
  });
});

describe('parseDatasetText', () => {
  it('reads one record per non-blank line', () => {
    const line = JSON.stringify(chatRecord('{}', '{}'));
    const records = parseDatasetText(`${line}\n\n${line}\n`, 'jsonl');

    expect(records).toHaveLength(2);
    expect(records[0]?.messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant']);
  });

  it('reports the line of a broken jsonl record', () => {
    const line = JSON.stringify(chatRecord('{}', '{}'));
    let caught: unknown;
    try {
      parseDatasetText(`${line}\n{broken`, 'jsonl');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DatasetFormatError);
    if (caught instanceof DatasetFormatError) {
      expect(caught.line).toBe(2);
      expect(caught.message).toBe('line 2: not valid JSON');
    }
  });

  it('requires a JSON array for json datasets', () => {
    expect(() => parseDatasetText('{"messages":[]}', 'json')).toThrow(
      'Dataset must be a JSON array of records'
    );
  });

  it('rejects records without messages', () => {
    expect(() => parseDatasetText('[{"prompt":"x"}]', 'json')).toThrow(
      /^line 1: not a chat record\n- messages: /
    );
  });
});

describe('checkJsonLines', () => {
  it('lists the lines that fail to parse', () => {
    expect(checkJsonLines('{"a":1}\n\nnot json\n[1,2]\n{')).toEqual({
      valid: false,
      errorLines: [3, 5],
    });
  });

  it('accepts a clean file', () => {
    expect(checkJsonLines('{"a":1}\n{"b":2}\n')).toEqual({ valid: true, errorLines: [] });
  });
});

describe('validateDataset', () => {
  it('validates each record against its own scenario', () => {
    const [entry] = validateDataset([chatRecord(wireScenario, thinkAnswer)], {
      logger: silentLogger,
    });

    expect(entry?.id).toBe('2025-06-27T03:00:00Z');
    expect(entry?.reasoning).toBe('One satellite sees the only target.');
    expect(entry?.result.is_valid).toBe(true);
    expect(entry?.result.errors).toEqual([]);
    expect(entry?.result.details.target_coverage?.coverage_rate).toBe(1);
  });

  it('marks unparseable records invalid and keeps going', () => {
    const logger = recordingLogger();

    const entries = validateDataset(
      [chatRecord(wireScenario, thinkAnswer), chatRecord('not json', thinkAnswer)],
      { logger }
    );

    expect(entries.map((e) => e.id)).toEqual(['2025-06-27T03:00:00Z', 'record-2']);
    const broken = entries[1]?.result;
    expect(broken?.is_valid).toBe(false);
    expect(broken?.errors).toHaveLength(1);
    expect(broken?.errors[0]).toMatch(/^unparseable record: Scenario is not valid JSON: /);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('treats a record without an assistant message as unparseable', () => {
    const record: DatasetRecord = { messages: [{ role: 'user', content: wireScenario }] };

    const [entry] = validateDataset([record], { logger: silentLogger });

    expect(entry?.result.errors).toEqual(['unparseable record: record has no assistant message']);
  });

  it('drops rejection info lines when given an info-free logger', () => {
    const logger = recordingLogger();
    const uncovered = thinkAnswer.replace('"targets":[21]', '"targets":[]');

    const [entry] = validateDataset([chatRecord(wireScenario, uncovered)], {
      logger: withoutInfo(logger),
    });

    expect(entry?.result.errors).toEqual(['missing targets: [21]']);
    expect(logger.info).not.toHaveBeenCalled();
  });
});

describe('withoutInfo', () => {
  it('forwards warnings and errors only', () => {
    const logger = recordingLogger();
    const quiet = withoutInfo(logger);

    quiet.info('Clustering rejected with 1 error(s)');
    quiet.warn('Skipping unparseable dataset record record-1', { error: 'bad' });
    quiet.error('Cluster validation aborted by an internal fault');

    expect(logger.info).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith('Skipping unparseable dataset record record-1', {
      error: 'bad',
    });
    expect(logger.error).toHaveBeenCalledWith(
      'Cluster validation aborted by an internal fault',
      undefined
    );
  });
});
