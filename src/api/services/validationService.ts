import { parseCandidateText } from '../../validation/candidateParser';
import type { ClusterValidator } from '../../validation/engine';
import { CandidateParseError, ScenarioParseError } from '../../validation/errors';
import { renderReport } from '../../validation/report';
import { parseScenario, type ScenarioInput } from '../../validation/schemas';
import type { ValidationResult } from '../../validation/types';
import { createError } from '../middleware/errorHandler';
import type { TextValidation, ValidationReport } from '../types/api';

export class ValidationService {
  constructor(private validator: ClusterValidator) {}

  validate(rawScenario: unknown, output: unknown): ValidationResult {
    return this.validator.validate(output, this.scenarioFrom(rawScenario));
  }

  validateWithReport(rawScenario: unknown, output: unknown): ValidationReport {
    const result = this.validate(rawScenario, output);
    return { result, report: renderReport(result) };
  }

  validateText(rawScenario: unknown, text: string): TextValidation {
    const scenario = this.scenarioFrom(rawScenario);
    try {
      const candidate = parseCandidateText(text);
      return {
        reasoning: candidate.reasoning,
        result: this.validator.validate(candidate.output, scenario),
      };
    } catch (error) {
      if (error instanceof CandidateParseError) {
        throw createError(error.message, 422, 'INVALID_CANDIDATE');
      }
      throw error;
    }
  }

  private scenarioFrom(raw: unknown): ScenarioInput {
    try {
      return parseScenario(raw);
    } catch (error) {
      if (error instanceof ScenarioParseError) {
        throw createError(error.message, 400, 'INVALID_SCENARIO');
      }
      throw error;
    }
  }
}
