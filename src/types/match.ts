/** Facts about a fixture fed to the team strength estimator. */
export interface MatchContext {
  team1Name: string;
  team2Name: string;
  /** Recent results, most recent last, e.g. "WWLWD" */
  team1Form?: string;
  team2Form?: string;
  /** Season record such as "15W-5L-3D"; context only */
  team1Record?: string;
  team2Record?: string;
  headToHead?: string;
  /** Must name team1 or team2 to have any effect */
  homeTeam?: string;
  additionalContext?: string;
}

export interface MatchOdds {
  team1Odds: number;
  team2Odds: number;
  drawOdds?: number;
}

export type MatchRequest = MatchContext & MatchOdds;

/** A game on a slate, as handed over by whatever collects fixtures and prices. */
export interface GameListing extends MatchRequest {
  sport?: string;
  commenceTime?: string;
  source?: string;
}
