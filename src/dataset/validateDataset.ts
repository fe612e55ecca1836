import { defaultLogger } from '../utils/logger';
import { parseCandidateText } from '../validation/candidateParser';
import { ClusterValidator, type ValidatorOptions } from '../validation/engine';
import {
  CandidateParseError,
  DatasetFormatError,
  ScenarioParseError,
} from '../validation/errors';
import { unparseableResult } from '../validation/result';
import { parseScenarioText } from '../validation/schemas';
import type { ValidationResult } from '../validation/types';
import type { ChatMessage, DatasetRecord } from './parseDataset';

export interface DatasetValidationEntry {
  /** Scenario timestamp, or `record-N` when the record has none. */
  id: string;
  reasoning: string;
  result: ValidationResult;
}

function findMessage(record: DatasetRecord, role: string): ChatMessage {
  const message = record.messages.find((m) => m.role === role);
  if (!message) {
    throw new DatasetFormatError(`record has no ${role} message`);
  }
  return message;
}

function isRecordError(error: unknown): error is Error {
  return (
    error instanceof ScenarioParseError ||
    error instanceof CandidateParseError ||
    error instanceof DatasetFormatError
  );
}

export function validateDataset(
  records: readonly DatasetRecord[],
  options: ValidatorOptions = {}
): DatasetValidationEntry[] {
  const logger = options.logger ?? defaultLogger;
  const validator = new ClusterValidator(options);

  return records.map((record, i) => {
    const fallbackId = `record-${i + 1}`;
    try {
      const scenario = parseScenarioText(findMessage(record, 'user').content);
      const candidate = parseCandidateText(findMessage(record, 'assistant').content);
      return {
        id: scenario.timestamp || fallbackId,
        reasoning: candidate.reasoning,
        result: validator.validate(candidate.output, scenario),
      };
    } catch (error) {
      if (!isRecordError(error)) {
        throw error;
      }
      logger.warn(`Skipping unparseable dataset record ${fallbackId}`, {
        error: error.message,
      });
      return { id: fallbackId, reasoning: '', result: unparseableResult(error.message) };
    }
  });
}
