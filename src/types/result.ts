import type { EngineErrorCode } from '../engine/errors.js';
import type { GameListing } from './match.js';
import type { StrengthResult, ValuationResult, ValueBet } from './valuation.js';

export interface Verdict {
  recommendation: string;
  pick: ValueBet | null;
  expectedValue: number;
  confidence: number;
  confident: boolean;
}

export interface MatchAnalysis {
  team1: string;
  team2: string;
  strength: StrengthResult;
  valuation: ValuationResult;
  verdict: Verdict;
}

export interface AnalysisFailure {
  code: EngineErrorCode;
  message: string;
}

export type AnalysisOutcome =
  | { ok: true; value: MatchAnalysis }
  | { ok: false; error: AnalysisFailure };

export type SlateEntry = {
  game: GameListing;
} & AnalysisOutcome;

export interface SlateSummary {
  total: number;
  withValue: number;
  withoutValue: number;
  failed: number;
  duplicatesSkipped: number;
}

export interface SlateReport {
  entries: SlateEntry[];
  summary: SlateSummary;
}
