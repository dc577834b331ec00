import Fastify from 'fastify';
import { ZodError } from 'zod';
import { config, engineSettings } from '../config.js';
import { isEngineError } from '../engine/errors.js';
import type { OddsFormat } from '../engine/odds-format.js';
import type { EngineSettings } from '../engine/settings.js';
import { logger } from '../utils/logger.js';
import { analysisRoutes } from './routes/analysis.js';
import { healthRoutes } from './routes/health.js';

export interface ServerOptions {
  settings?: EngineSettings;
  oddsFormat?: OddsFormat;
  /** Disable Fastify's request logging, e.g. under test */
  logger?: boolean;
}

export async function createServer(options: ServerOptions = {}) {
  const settings = options.settings ?? engineSettings;
  const oddsFormat = options.oddsFormat ?? config.ODDS_FORMAT;
  const logging = options.logger ?? config.NODE_ENV !== 'test';

  const app = Fastify({ logger: logging ? logger : false });

  app.setErrorHandler((err, request, reply) => {
    if (isEngineError(err)) {
      return reply.status(400).send({ error: err.message, code: err.code });
    }
    if (err instanceof ZodError) {
      return reply.status(400).send({
        error: 'Invalid request body',
        code: 'INVALID_REQUEST',
        issues: err.issues.map((i) => `${i.path.join('.') || '(body)'}: ${i.message}`),
      });
    }
    if (err.statusCode && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message, code: err.code });
    }
    request.log.error({ err }, 'Unhandled error');
    return reply.status(500).send({ error: 'Internal server error', code: 'INTERNAL' });
  });

  await app.register(healthRoutes, { settings });
  await app.register(analysisRoutes, { prefix: '/analysis', settings, oddsFormat });

  return app;
}
