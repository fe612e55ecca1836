import type { FastifyRequest, FastifyReply } from 'fastify';
import type { z } from 'zod';
import { candidateOutputJsonSchema } from '../../validation/schemas';
import type { ValidationResult } from '../../validation/types';
import { createError } from '../middleware/errorHandler';
import type { ValidationService } from '../services/validationService';
import {
  ValidateBodySchema,
  ValidateTextBodySchema,
  type DataResponse,
  type TextValidation,
  type ValidationReport,
} from '../types/api';

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || 'body');
    throw createError(
      `Invalid request body: ${fields.join(', ')}`,
      400,
      'INVALID_REQUEST'
    );
  }
  return parsed.data;
}

export class ValidationController {
  constructor(private validationService: ValidationService) {}

  async validate(request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) {
    const { scenario, output } = parseBody(ValidateBodySchema, request.body);
    const response: DataResponse<ValidationResult> = {
      data: this.validationService.validate(scenario, output),
    };
    reply.send(response);
  }

  async validateWithReport(
    request: FastifyRequest<{ Body: unknown }>,
    reply: FastifyReply
  ) {
    const { scenario, output } = parseBody(ValidateBodySchema, request.body);
    const response: DataResponse<ValidationReport> = {
      data: this.validationService.validateWithReport(scenario, output),
    };
    reply.send(response);
  }

  async validateText(request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) {
    const { scenario, text } = parseBody(ValidateTextBodySchema, request.body);
    const response: DataResponse<TextValidation> = {
      data: this.validationService.validateText(scenario, text),
    };
    reply.send(response);
  }

  async getCandidateSchema(_request: FastifyRequest, reply: FastifyReply) {
    reply.send({ data: candidateOutputJsonSchema() });
  }
}
