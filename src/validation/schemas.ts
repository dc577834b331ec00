import { z } from 'zod';

const optionalText = z.string().optional();

export const oddsFormatSchema = z.enum(['decimal', 'american', 'fractional']);

/** A price as sent by a client: a number, or a string such as "5/2" or "+150" */
export const priceSchema = z.union([z.number(), z.string()]);

export const matchContextSchema = z.object({
  team1Name: z.string(),
  team2Name: z.string(),
  team1Form: optionalText,
  team2Form: optionalText,
  team1Record: optionalText,
  team2Record: optionalText,
  headToHead: optionalText,
  homeTeam: optionalText,
  additionalContext: optionalText,
});

export const oddsRequestSchema = z.object({
  team1Odds: priceSchema,
  team2Odds: priceSchema,
  drawOdds: priceSchema.optional(),
  team1Strength: z.number(),
  team2Strength: z.number(),
  oddsFormat: oddsFormatSchema.optional(),
});

export const matchRequestSchema = matchContextSchema.extend({
  team1Odds: priceSchema,
  team2Odds: priceSchema,
  drawOdds: priceSchema.optional(),
  oddsFormat: oddsFormatSchema.optional(),
});

export const gameListingSchema = matchContextSchema.extend({
  team1Odds: z.number(),
  team2Odds: z.number(),
  drawOdds: z.number().optional(),
  sport: optionalText,
  commenceTime: optionalText,
  source: optionalText,
});

export const slateRequestSchema = z.object({
  games: z.array(gameListingSchema).max(500),
});
