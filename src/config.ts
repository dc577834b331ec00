import { z } from 'zod';
import { resolveSettings, type EngineSettings } from './engine/settings.js';
import { oddsFormatSchema } from './validation/schemas.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  MIN_EV_THRESHOLD: z.coerce.number().default(0.05),
  MIN_CONFIDENCE: z.coerce.number().default(0.6),
  FORM_WEIGHT: z.coerce.number().default(0.2),
  HOME_ADVANTAGE_WEIGHT: z.coerce.number().default(0.1),
  DRAW_PROBABILITY: z.coerce.number().default(0.1),
  ODDS_FORMAT: oddsFormatSchema.default('decimal'),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;

export function settingsFromConfig(cfg: Config): EngineSettings {
  return resolveSettings({
    minEvThreshold: cfg.MIN_EV_THRESHOLD,
    minConfidence: cfg.MIN_CONFIDENCE,
    formWeight: cfg.FORM_WEIGHT,
    homeAdvantageWeight: cfg.HOME_ADVANTAGE_WEIGHT,
    drawProbability: cfg.DRAW_PROBABILITY,
  });
}

export const engineSettings = settingsFromConfig(config);
