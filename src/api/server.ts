import 'dotenv/config';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { errorHandler } from './middleware';
import { registerValidationRoutes } from './routes';
import { ClusterValidator } from '../validation/engine';
import type { Logger } from '../utils/logger';

export interface ServerOptions {
  /** Engine shared by every request; built from the environment when omitted. */
  validator?: ClusterValidator;
}

async function buildServer(options: ServerOptions = {}) {
  const fastify = Fastify({
    logger: {
      level: process.env.LOG_LEVEL || 'info',
      transport:
        process.env.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
    },
  });

  // Register CORS
  await fastify.register(cors, {
    origin: process.env.CORS_ORIGIN || '*',
    credentials: true,
  });

  fastify.setErrorHandler(errorHandler);

  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  const engineLogger: Logger = {
    error: (msg, ctx) => fastify.log.error(ctx ?? {}, msg),
    warn: (msg, ctx) => fastify.log.warn(ctx ?? {}, msg),
    info: (msg, ctx) => fastify.log.info(ctx ?? {}, msg),
  };
  registerValidationRoutes(
    fastify,
    options.validator ?? new ClusterValidator({ logger: engineLogger })
  );

  return fastify;
}

async function start() {
  try {
    const server = await buildServer();
    // Use PORT (set by hosting platforms) or fall back to API_PORT or 3000
    const port = parseInt(process.env.PORT || process.env.API_PORT || '3000', 10);
    const host = process.env.API_HOST || '0.0.0.0';

    await server.listen({ port, host });

    console.log(`Validation API listening on http://${host}:${port}`);
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }
}

if (require.main === module) {
  start().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}

export { buildServer, start };
