export type { MatchContext, MatchOdds, MatchRequest, GameListing } from './match.js';
export type {
  Outcome,
  StrengthResult,
  OddsInput,
  OutcomeValuation,
  ValueBet,
  ValuationResult,
} from './valuation.js';
export type {
  Verdict,
  MatchAnalysis,
  AnalysisFailure,
  AnalysisOutcome,
  SlateEntry,
  SlateSummary,
  SlateReport,
} from './result.js';
