import { describe, it, expect } from 'vitest';
import { analyzeMatch, tryAnalyzeMatch } from '../../src/engine/match-analyzer.js';
import { InvalidOddsError } from '../../src/engine/errors.js';

describe('analyzeMatch', () => {
  it('should back the side with the best expected value', () => {
    const analysis = analyzeMatch({
      team1Name: 'Arsenal',
      team2Name: 'Chelsea',
      team1Form: 'WWWWW',
      team2Form: 'LLLLL',
      homeTeam: 'Arsenal',
      team1Odds: 2.0,
      team2Odds: 2.5,
    });

    // raw 0.8 vs 0.5 → 8/13 vs 5/13
    expect(analysis.strength.team1Score).toBeCloseTo(8 / 13, 9);
    expect(analysis.valuation.team1.expectedValue).toBeCloseTo(3 / 13, 9);
    expect(analysis.valuation.team2.expectedValue).toBeCloseTo(-1 / 26, 9);

    expect(analysis.verdict.recommendation).toBe('Bet on Arsenal');
    expect(analysis.verdict.pick?.outcome).toBe('team1');
    expect(analysis.verdict.expectedValue).toBeCloseTo(3 / 13, 9);
    expect(analysis.verdict.confidence).toBeCloseTo(8 / 13, 9);
    expect(analysis.verdict.confident).toBe(true);
  });

  it('should pick the higher EV when both sides qualify', () => {
    const analysis = analyzeMatch({
      team1Name: 'Arsenal',
      team2Name: 'Chelsea',
      team1Odds: 2.4,
      team2Odds: 2.8,
    });

    expect(analysis.valuation.recommendations.map((r) => r.outcome)).toEqual(['team1', 'team2']);
    expect(analysis.verdict.recommendation).toBe('Bet on Chelsea');
    expect(analysis.verdict.expectedValue).toBeCloseTo(0.4, 9);
    expect(analysis.verdict.confidence).toBe(0.5);
    expect(analysis.verdict.confident).toBe(false);
  });

  it('should label a draw pick', () => {
    const analysis = analyzeMatch({
      team1Name: 'Arsenal',
      team2Name: 'Chelsea',
      team1Odds: 1.5,
      team2Odds: 1.5,
      drawOdds: 20,
    });
    expect(analysis.verdict.recommendation).toBe('Bet on Draw');
    expect(analysis.verdict.confidence).toBe(0.1);
  });

  it('should recommend no bet when nothing clears the threshold', () => {
    const analysis = analyzeMatch({
      team1Name: 'Barcelona',
      team2Name: 'Real Madrid',
      team1Form: 'WWLWW',
      team2Form: 'WLWWL',
      homeTeam: 'Barcelona',
      team1Odds: 2.1,
      team2Odds: 1.9,
      drawOdds: 3.5,
    });

    // 0.76 / 1.38 × 0.9 × 2.1 − 1 ≈ 0.0409, just under 0.05
    expect(analysis.valuation.team1.expectedValue).toBeCloseTo(0.0409, 4);
    expect(analysis.verdict).toEqual({
      recommendation: 'No bet recommended',
      pick: null,
      expectedValue: 0,
      confidence: 0,
      confident: false,
    });
  });

  it('should report trimmed team names', () => {
    const analysis = analyzeMatch({
      team1Name: ' Arsenal ',
      team2Name: 'Chelsea',
      team1Odds: 2.4,
      team2Odds: 1.6,
    });
    expect(analysis.team1).toBe('Arsenal');
    expect(analysis.verdict.recommendation).toBe('Bet on Arsenal');
  });

  it('should let validation errors propagate', () => {
    expect(() =>
      analyzeMatch({ team1Name: 'Arsenal', team2Name: 'Chelsea', team1Odds: 1, team2Odds: 2 }),
    ).toThrow(InvalidOddsError);
  });
});

describe('tryAnalyzeMatch', () => {
  it('should wrap a successful analysis', () => {
    const outcome = tryAnalyzeMatch({
      team1Name: 'Arsenal',
      team2Name: 'Chelsea',
      team1Odds: 2.4,
      team2Odds: 1.6,
    });
    expect(outcome.ok).toBe(true);
    if (outcome.ok) expect(outcome.value.team2).toBe('Chelsea');
  });

  it('should turn engine errors into a tagged failure', () => {
    const outcome = tryAnalyzeMatch({
      team1Name: 'Arsenal',
      team2Name: 'Chelsea',
      team1Odds: 1,
      team2Odds: 2,
    });
    expect(outcome).toEqual({
      ok: false,
      error: {
        code: 'INVALID_ODDS',
        message: 'Invalid team1 odds 1: must be a decimal price above 1.0',
      },
    });
  });
});
