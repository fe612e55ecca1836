import type { FastifyInstance } from 'fastify';
import { ValidationController } from '../controllers/validationController';
import { ValidationService } from '../services/validationService';
import type { ClusterValidator } from '../../validation/engine';

export function registerValidationRoutes(
  fastify: FastifyInstance,
  validator: ClusterValidator
) {
  const validationService = new ValidationService(validator);
  const controller = new ValidationController(validationService);

  // POST /api/validate
  fastify.post<{ Body: unknown }>('/api/validate', async (request, reply) => {
    await controller.validate(request, reply);
  });

  // POST /api/validate/report
  fastify.post<{ Body: unknown }>('/api/validate/report', async (request, reply) => {
    await controller.validateWithReport(request, reply);
  });

  // POST /api/validate/text - raw generator output
  fastify.post<{ Body: unknown }>('/api/validate/text', async (request, reply) => {
    await controller.validateText(request, reply);
  });

  // GET /api/schema/candidate
  fastify.get('/api/schema/candidate', async (request, reply) => {
    await controller.getCandidateSchema(request, reply);
  });
}
