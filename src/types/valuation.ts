export type Outcome = 'team1' | 'team2' | 'draw';

export interface StrengthResult {
  /** Full precision; team1Score + team2Score === 1 */
  team1Score: number;
  team2Score: number;
  /** Scores rounded to 3 decimals for display */
  rounded: { team1Score: number; team2Score: number };
  factors: string[];
}

export interface OddsInput {
  team1Odds: number;
  team2Odds: number;
  drawOdds?: number;
  team1Strength: number;
  team2Strength: number;
}

export interface OutcomeValuation {
  outcome: Outcome;
  odds: number;
  impliedProbability: number;
  actualProbability: number;
  expectedValue: number;
  /** actualProbability - impliedProbability */
  edge: number;
}

export interface ValueBet {
  outcome: Outcome;
  expectedValue: number;
  odds: number;
  impliedProbability: number;
  actualProbability: number;
}

export interface ValuationResult {
  team1: OutcomeValuation;
  team2: OutcomeValuation;
  draw: OutcomeValuation | null;
  /** Every evaluated outcome in the order team1, team2, draw */
  outcomes: OutcomeValuation[];
  recommendations: ValueBet[];
  /** Sum of implied probabilities; anything above 1 is the bookmaker's margin */
  overround: number;
  threshold: number;
}
