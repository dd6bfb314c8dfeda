import {
  allocateStakes,
  bestOddsByOutcome,
  impliedProbabilitySum,
  isValidOdds,
  profitPercent,
  requiredOutcomes,
} from './arbitrage.math';

describe('arbitrage math', () => {
  const quotedAt = new Date('2024-05-01T12:00:00Z');

  describe('requiredOutcomes', () => {
    it('should know the fixed outcome sets', () => {
      expect(requiredOutcomes('1X2')).toEqual(['HOME', 'DRAW', 'AWAY']);
      expect(requiredOutcomes('BTTS')).toEqual(['YES', 'NO']);
      expect(requiredOutcomes('OU_2.5')).toEqual(['OVER', 'UNDER']);
    });

    it('should return null for markets without a fixed set', () => {
      expect(requiredOutcomes('FIRST_SCORER')).toBeNull();
      expect(requiredOutcomes('OU_x')).toBeNull();
      expect(requiredOutcomes('toString')).toBeNull();
    });
  });

  it('should only accept finite odds above 1', () => {
    expect(isValidOdds(1.01)).toBe(true);
    expect(isValidOdds(1)).toBe(false);
    expect(isValidOdds(0.5)).toBe(false);
    expect(isValidOdds(Number.POSITIVE_INFINITY)).toBe(false);
  });

  it('should pick the highest price per outcome and break ties by bookmaker name', () => {
    const best = bestOddsByOutcome([
      { outcome: 'HOME', bookmaker: 'book-b', odds: 2.1, quotedAt },
      { outcome: 'HOME', bookmaker: 'book-a', odds: 2.1, quotedAt },
      { outcome: 'DRAW', bookmaker: 'book-c', odds: 3.4, quotedAt },
      { outcome: 'DRAW', bookmaker: 'book-a', odds: 3.6, quotedAt },
      { outcome: 'AWAY', bookmaker: 'book-c', odds: 4.0, quotedAt },
    ]);

    expect(best.map(leg => [leg.outcome, leg.bookmaker, leg.odds])).toEqual([
      ['AWAY', 'book-c', 4.0],
      ['DRAW', 'book-a', 3.6],
      ['HOME', 'book-a', 2.1],
    ]);
  });

  describe('a three-way sure bet at 2.1 / 3.8 / 4.2', () => {
    const odds = [2.1, 3.8, 4.2];

    it('should have an implied sum of 130/133', () => {
      expect(impliedProbabilitySum(odds)).toBeCloseTo(130 / 133, 12);
      expect(profitPercent(impliedProbabilitySum(odds))).toBeCloseTo(2.307692, 5);
    });

    it('should split 100 into cent stakes with equal payouts', () => {
      const plan = allocateStakes(
        [
          { outcome: 'HOME', odds: 2.1 },
          { outcome: 'DRAW', odds: 3.8 },
          { outcome: 'AWAY', odds: 4.2 },
        ],
        100,
      );

      expect(plan.allocations).toEqual([
        { outcome: 'HOME', stake: 48.72, payout: 102.31 },
        { outcome: 'DRAW', stake: 26.92, payout: 102.3 },
        { outcome: 'AWAY', stake: 24.36, payout: 102.31 },
      ]);
      expect(plan.totalStake).toBe(100);
      expect(plan.guaranteedPayout).toBe(102.3);
      expect(plan.guaranteedProfit).toBe(2.3);
    });
  });

  it('should find no arbitrage when the implied sum exceeds 1', () => {
    const sum = impliedProbabilitySum([1.9, 3.2, 3.9]);

    expect(sum).toBeCloseTo(1.0952, 4);
    expect(profitPercent(sum)).toBeLessThan(0);
  });
});
