import type { FastifyPluginAsync } from 'fastify';
import { analyzeMatch } from '../../engine/match-analyzer.js';
import { toDecimalOdds, type OddsFormat } from '../../engine/odds-format.js';
import { valueOdds } from '../../engine/odds-valuator.js';
import type { EngineSettings } from '../../engine/settings.js';
import { estimateTeamStrength } from '../../engine/team-strength.js';
import { loadDemoSlate } from '../../slate/demo-slate.js';
import { analyzeSlate } from '../../slate/slate-analyzer.js';
import type { MatchOdds } from '../../types/index.js';
import {
  matchContextSchema,
  matchRequestSchema,
  oddsRequestSchema,
  slateRequestSchema,
} from '../../validation/schemas.js';

export interface AnalysisRouteOptions {
  settings: EngineSettings;
  /** Format assumed for prices when a request does not name one */
  oddsFormat: OddsFormat;
}

type RawPrices = { team1Odds: number | string; team2Odds: number | string; drawOdds?: number | string };

function toMatchOdds(prices: RawPrices, format: OddsFormat): MatchOdds {
  return {
    team1Odds: toDecimalOdds(prices.team1Odds, format, 'team1'),
    team2Odds: toDecimalOdds(prices.team2Odds, format, 'team2'),
    drawOdds: prices.drawOdds === undefined ? undefined : toDecimalOdds(prices.drawOdds, format, 'draw'),
  };
}

export const analysisRoutes: FastifyPluginAsync<AnalysisRouteOptions> = async (app, opts) => {
  const { settings } = opts;

  // POST /analysis/strength — team strength only
  app.post('/strength', async (request) => {
    const context = matchContextSchema.parse(request.body);
    return estimateTeamStrength(context, settings);
  });

  // POST /analysis/odds — value a set of prices against known strengths
  app.post('/odds', async (request) => {
    const body = oddsRequestSchema.parse(request.body);
    const odds = toMatchOdds(body, body.oddsFormat ?? opts.oddsFormat);
    return valueOdds(
      { ...odds, team1Strength: body.team1Strength, team2Strength: body.team2Strength },
      settings,
    );
  });

  // POST /analysis/match — strength, valuation and verdict in one call
  app.post('/match', async (request) => {
    const { oddsFormat, team1Odds, team2Odds, drawOdds, ...context } = matchRequestSchema.parse(
      request.body,
    );
    const odds = toMatchOdds({ team1Odds, team2Odds, drawOdds }, oddsFormat ?? opts.oddsFormat);
    return analyzeMatch({ ...context, ...odds }, settings);
  });

  // POST /analysis/slate — batch of games in decimal odds; bad games are reported, not fatal
  app.post('/slate', async (request) => {
    const { games } = slateRequestSchema.parse(request.body);
    return analyzeSlate(games, settings);
  });

  // GET /analysis/demo — bundled sample slate
  app.get('/demo', async () => {
    return analyzeSlate(loadDemoSlate(), settings);
  });
};
