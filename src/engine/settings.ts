import { z } from 'zod';
import { InvalidSettingsError } from './errors.js';

const settingsSchema = z.object({
  /** EV an outcome must strictly exceed to be recommended */
  minEvThreshold: z.number().finite(),
  /** Probability a pick needs to be flagged as confident */
  minConfidence: z.number().min(0).max(1),
  /** Multiplier applied to a team's recent win ratio */
  formWeight: z.number().finite().min(0),
  homeAdvantageWeight: z.number().finite().min(0),
  /** Fixed probability mass assigned to a draw when draw odds are offered */
  drawProbability: z.number().min(0).lt(1),
});

export type EngineSettings = Readonly<z.infer<typeof settingsSchema>>;

export const DEFAULT_SETTINGS: EngineSettings = Object.freeze({
  minEvThreshold: 0.05,
  minConfidence: 0.6,
  formWeight: 0.2,
  homeAdvantageWeight: 0.1,
  drawProbability: 0.1,
});

/**
 * Merge overrides onto the defaults and validate the result.
 */
export function resolveSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  const parsed = settingsSchema.safeParse({ ...DEFAULT_SETTINGS, ...overrides });
  if (!parsed.success) {
    throw new InvalidSettingsError(
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    );
  }
  return Object.freeze(parsed.data);
}
