import { z } from 'zod';
import type { ValidationResult } from '../../validation/types';

// Request/Response types for API endpoints

export const ValidateBodySchema = z.object({
  scenario: z.unknown(),
  output: z.unknown(),
});

export const ValidateTextBodySchema = z.object({
  scenario: z.unknown(),
  text: z.string(),
});

export interface DataResponse<T> {
  data: T;
}

export interface ValidationReport {
  result: ValidationResult;
  report: string;
}

export interface TextValidation {
  reasoning: string;
  result: ValidationResult;
}
