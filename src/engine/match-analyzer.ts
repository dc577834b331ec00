import type { MatchRequest } from '../types/match.js';
import type { AnalysisOutcome, MatchAnalysis, Verdict } from '../types/result.js';
import type { ValuationResult, ValueBet } from '../types/valuation.js';
import { isEngineError } from './errors.js';
import { valueOdds } from './odds-valuator.js';
import { DEFAULT_SETTINGS, type EngineSettings } from './settings.js';
import { estimateTeamStrength } from './team-strength.js';

/** Highest-EV value bet; on a tie the earlier outcome (team1, team2, draw) wins. */
export function bestValueBet(valuation: ValuationResult): ValueBet | null {
  let best: ValueBet | null = null;
  for (const rec of valuation.recommendations) {
    if (!best || rec.expectedValue > best.expectedValue) best = rec;
  }
  return best;
}

export function buildVerdict(
  team1: string,
  team2: string,
  valuation: ValuationResult,
  settings: EngineSettings,
): Verdict {
  const pick = bestValueBet(valuation);
  if (!pick) {
    return {
      recommendation: 'No bet recommended',
      pick: null,
      expectedValue: 0,
      confidence: 0,
      confident: false,
    };
  }

  const label = pick.outcome === 'team1' ? team1 : pick.outcome === 'team2' ? team2 : 'Draw';
  return {
    recommendation: `Bet on ${label}`,
    pick,
    expectedValue: pick.expectedValue,
    confidence: pick.actualProbability,
    confident: pick.actualProbability >= settings.minConfidence,
  };
}

/**
 * Estimate team strength, value the odds against it and settle on a verdict.
 * Validation errors propagate unchanged.
 */
export function analyzeMatch(
  request: MatchRequest,
  settings: EngineSettings = DEFAULT_SETTINGS,
): MatchAnalysis {
  const strength = estimateTeamStrength(request, settings);
  const valuation = valueOdds(
    {
      team1Odds: request.team1Odds,
      team2Odds: request.team2Odds,
      drawOdds: request.drawOdds,
      team1Strength: strength.team1Score,
      team2Strength: strength.team2Score,
    },
    settings,
  );

  const team1 = request.team1Name.trim();
  const team2 = request.team2Name.trim();
  return {
    team1,
    team2,
    strength,
    valuation,
    verdict: buildVerdict(team1, team2, valuation, settings),
  };
}

/** Like analyzeMatch, but engine validation failures come back as a tagged failure. */
export function tryAnalyzeMatch(
  request: MatchRequest,
  settings: EngineSettings = DEFAULT_SETTINGS,
): AnalysisOutcome {
  try {
    return { ok: true, value: analyzeMatch(request, settings) };
  } catch (err) {
    if (!isEngineError(err)) throw err;
    return { ok: false, error: { code: err.code, message: err.message } };
  }
}
