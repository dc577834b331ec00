/**
 * Team strength estimator.
 *
 * Both teams start from a neutral 0.5. Recent form adds win ratio x formWeight,
 * the home side adds homeAdvantageWeight, then the pair is normalized to sum to 1.
 * Records, head-to-head and free-text context are listed as factors only.
 */

import type { MatchContext } from '../types/match.js';
import type { StrengthResult } from '../types/valuation.js';
import { InvalidInputError } from './errors.js';
import { DEFAULT_SETTINGS, type EngineSettings } from './settings.js';
import { roundTo } from '../utils/math.js';

const NEUTRAL_SCORE = 0.5;
const FORM_PATTERN = /^[WLD]*$/;

function requireName(value: string | undefined, field: string): string {
  const name = value?.trim() ?? '';
  if (!name) throw new InvalidInputError(field, `${field} is required`);
  return name;
}

function present(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Share of wins in a W/L/D form string, or null when there is no form to read.
 */
export function formWinRatio(form: string | undefined, field = 'form'): number | null {
  const normalized = present(form)?.toUpperCase();
  if (!normalized) return null;
  if (!FORM_PATTERN.test(normalized)) {
    throw new InvalidInputError(field, `${field} may only contain W, L or D (got "${form}")`);
  }
  const wins = [...normalized].filter((c) => c === 'W').length;
  return wins / normalized.length;
}

export function estimateTeamStrength(
  context: MatchContext,
  settings: EngineSettings = DEFAULT_SETTINGS,
): StrengthResult {
  const team1 = requireName(context.team1Name, 'team1Name');
  const team2 = requireName(context.team2Name, 'team2Name');

  let team1Score = NEUTRAL_SCORE;
  let team2Score = NEUTRAL_SCORE;
  const factors: string[] = [];

  const team1Ratio = formWinRatio(context.team1Form, 'team1Form');
  if (team1Ratio !== null) {
    team1Score += team1Ratio * settings.formWeight;
    factors.push(`${team1} recent form: ${present(context.team1Form)}`);
  }

  const team2Ratio = formWinRatio(context.team2Form, 'team2Form');
  if (team2Ratio !== null) {
    team2Score += team2Ratio * settings.formWeight;
    factors.push(`${team2} recent form: ${present(context.team2Form)}`);
  }

  const team1Record = present(context.team1Record);
  if (team1Record) factors.push(`${team1} season record: ${team1Record}`);
  const team2Record = present(context.team2Record);
  if (team2Record) factors.push(`${team2} season record: ${team2Record}`);

  const home = present(context.homeTeam)?.toLowerCase();
  if (home === team1.toLowerCase()) {
    team1Score += settings.homeAdvantageWeight;
    factors.push(`${team1} has home advantage`);
  } else if (home === team2.toLowerCase()) {
    team2Score += settings.homeAdvantageWeight;
    factors.push(`${team2} has home advantage`);
  }

  const headToHead = present(context.headToHead);
  if (headToHead) factors.push(`Head-to-head: ${headToHead}`);
  const extra = present(context.additionalContext);
  if (extra) factors.push(`Additional context: ${extra}`);

  const total = team1Score + team2Score;
  if (total > 0) {
    team1Score /= total;
    team2Score /= total;
  } else {
    team1Score = NEUTRAL_SCORE;
    team2Score = NEUTRAL_SCORE;
  }

  return {
    team1Score,
    team2Score,
    rounded: { team1Score: roundTo(team1Score, 3), team2Score: roundTo(team2Score, 3) },
    factors,
  };
}
