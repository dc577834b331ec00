import { tryAnalyzeMatch } from '../engine/match-analyzer.js';
import { DEFAULT_SETTINGS, type EngineSettings } from '../engine/settings.js';
import type { GameListing, SlateEntry, SlateReport, SlateSummary } from '../types/index.js';
import { logger } from '../utils/logger.js';

function gameKey(game: GameListing): string {
  return `${game.team1Name.trim().toLowerCase()}|${game.team2Name.trim().toLowerCase()}`;
}

/**
 * Drop repeated fixtures, keyed on the lower-cased team pair. First listing wins.
 */
export function dedupeGames(games: GameListing[]): { unique: GameListing[]; skipped: number } {
  const seen = new Set<string>();
  const unique: GameListing[] = [];
  for (const game of games) {
    const key = gameKey(game);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(game);
  }
  return { unique, skipped: games.length - unique.length };
}

export function summarizeSlate(entries: SlateEntry[], duplicatesSkipped = 0): SlateSummary {
  let withValue = 0;
  let withoutValue = 0;
  let failed = 0;
  for (const entry of entries) {
    if (!entry.ok) failed++;
    else if (entry.value.verdict.pick) withValue++;
    else withoutValue++;
  }
  return { total: entries.length, withValue, withoutValue, failed, duplicatesSkipped };
}

/**
 * Analyze every game on a slate independently. A game that fails validation is
 * reported as a failed entry and does not stop the rest.
 */
export function analyzeSlate(
  games: GameListing[],
  settings: EngineSettings = DEFAULT_SETTINGS,
): SlateReport {
  const { unique, skipped } = dedupeGames(games);
  if (skipped > 0) logger.debug({ skipped }, 'Skipped duplicate games on slate');

  const entries: SlateEntry[] = unique.map((game) => {
    const outcome = tryAnalyzeMatch(game, settings);
    if (!outcome.ok) {
      logger.warn(
        { team1: game.team1Name, team2: game.team2Name, code: outcome.error.code },
        `Skipping game: ${outcome.error.message}`,
      );
    }
    return { game, ...outcome };
  });

  const summary = summarizeSlate(entries, skipped);
  logger.info(summary, 'Slate analyzed');
  return { entries, summary };
}
