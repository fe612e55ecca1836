import * as path from 'path';
import { z } from 'zod';
import { DatasetFormatError, formatIssues } from '../validation/errors';

export const ChatMessageSchema = z.object({
  role: z.string(),
  content: z.string(),
});

export const DatasetRecordSchema = z.object({
  messages: z.array(ChatMessageSchema),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type DatasetRecord = z.infer<typeof DatasetRecordSchema>;
export type DatasetFormat = 'json' | 'jsonl';

export function datasetFormatFromPath(filePath: string): DatasetFormat {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case '.json':
      return 'json';
    case '.jsonl':
      return 'jsonl';
    default:
      throw new DatasetFormatError(
        `Unsupported dataset file type: ${ext || '(none)'}. Supported formats: .json, .jsonl`
      );
  }
}

function toRecord(raw: unknown, line: number): DatasetRecord {
  const parsed = DatasetRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DatasetFormatError(
      `not a chat record\n${formatIssues(parsed.error.issues)}`,
      line
    );
  }
  return parsed.data;
}

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Reads a chat-format training dataset: a JSON array of records, or one
 * record per line. For `json` input the reported line is the record's
 * 1-based position in the array.
 */
export function parseDatasetText(text: string, format: DatasetFormat): DatasetRecord[] {
  if (format === 'json') {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new DatasetFormatError(
        `Dataset is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (!Array.isArray(raw)) {
      throw new DatasetFormatError('Dataset must be a JSON array of records');
    }
    return raw.map((entry: unknown, i) => toRecord(entry, i + 1));
  }

  const records: DatasetRecord[] = [];
  splitLines(text).forEach((line, i) => {
    if (line.trim() === '') {
      return;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      throw new DatasetFormatError('not valid JSON', i + 1);
    }
    records.push(toRecord(raw, i + 1));
  });
  return records;
}

export interface JsonLinesCheck {
  valid: boolean;
  /** 1-based numbers of non-empty lines that do not parse. */
  errorLines: number[];
}

export function checkJsonLines(text: string): JsonLinesCheck {
  const errorLines: number[] = [];
  splitLines(text).forEach((line, i) => {
    if (line.trim() === '') {
      return;
    }
    try {
      JSON.parse(line);
    } catch {
      errorLines.push(i + 1);
    }
  });
  return { valid: errorLines.length === 0, errorLines };
}
