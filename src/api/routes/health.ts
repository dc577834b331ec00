import type { FastifyPluginAsync } from 'fastify';
import type { EngineSettings } from '../../engine/settings.js';

export interface HealthRouteOptions {
  settings: EngineSettings;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (app, opts) => {
  app.get('/health', async () => {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      settings: opts.settings,
    };
  });
};
