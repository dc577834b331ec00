/**
 * Odds valuator.
 *
 * implied = 1 / odds
 * EV      = actual × odds − 1
 *
 * With a draw market the draw gets a fixed prior (drawProbability) and the two
 * team probabilities share what is left. Outcomes whose EV strictly exceeds
 * minEvThreshold are returned as value bets, in the order team1, team2, draw.
 */

import type {
  OddsInput,
  Outcome,
  OutcomeValuation,
  ValuationResult,
  ValueBet,
} from '../types/valuation.js';
import { InvalidInputError, InvalidOddsError } from './errors.js';
import { DEFAULT_SETTINGS, type EngineSettings } from './settings.js';

function assertValidOdds(outcome: Outcome, odds: number): void {
  if (!Number.isFinite(odds) || odds <= 1) {
    throw new InvalidOddsError(outcome, odds);
  }
}

function assertValidStrength(field: string, strength: number): void {
  if (!Number.isFinite(strength) || strength < 0 || strength > 1) {
    throw new InvalidInputError(field, `${field} must be between 0 and 1 (got ${strength})`);
  }
}

export function impliedProbability(odds: number): number {
  return 1 / odds;
}

export function expectedValue(actualProbability: number, odds: number): number {
  return actualProbability * odds - 1;
}

function valuate(outcome: Outcome, odds: number, actualProbability: number): OutcomeValuation {
  const implied = impliedProbability(odds);
  return {
    outcome,
    odds,
    impliedProbability: implied,
    actualProbability,
    expectedValue: expectedValue(actualProbability, odds),
    edge: actualProbability - implied,
  };
}

function toValueBet(v: OutcomeValuation): ValueBet {
  return {
    outcome: v.outcome,
    expectedValue: v.expectedValue,
    odds: v.odds,
    impliedProbability: v.impliedProbability,
    actualProbability: v.actualProbability,
  };
}

export function valueOdds(
  input: OddsInput,
  settings: EngineSettings = DEFAULT_SETTINGS,
): ValuationResult {
  const { team1Odds, team2Odds, drawOdds, team1Strength, team2Strength } = input;

  assertValidOdds('team1', team1Odds);
  assertValidOdds('team2', team2Odds);
  if (drawOdds !== undefined) assertValidOdds('draw', drawOdds);
  assertValidStrength('team1Strength', team1Strength);
  assertValidStrength('team2Strength', team2Strength);

  // Estimator output already sums to 1; this only matters for hand-built input
  const totalStrength = team1Strength + team2Strength;
  let team1Actual = totalStrength > 0 ? team1Strength / totalStrength : 0.5;
  let team2Actual = totalStrength > 0 ? team2Strength / totalStrength : 0.5;

  let draw: OutcomeValuation | null = null;
  if (drawOdds !== undefined) {
    const remaining = 1 - settings.drawProbability;
    team1Actual *= remaining;
    team2Actual *= remaining;
    draw = valuate('draw', drawOdds, settings.drawProbability);
  }

  const team1 = valuate('team1', team1Odds, team1Actual);
  const team2 = valuate('team2', team2Odds, team2Actual);
  const outcomes = draw ? [team1, team2, draw] : [team1, team2];

  return {
    team1,
    team2,
    draw,
    outcomes,
    recommendations: outcomes
      .filter((o) => o.expectedValue > settings.minEvThreshold)
      .map(toValueBet),
    overround: outcomes.reduce((sum, o) => sum + o.impliedProbability, 0),
    threshold: settings.minEvThreshold,
  };
}
