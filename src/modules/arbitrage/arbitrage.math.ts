/**
 * Sure-bet arithmetic over decimal odds. Money is handled in integer cents and odds in
 * thousandths, so stakes sum exactly to the requested total.
 */

export interface PricedOutcome {
  outcome: string;
  bookmaker: string;
  odds: number;
  quotedAt: Date;
}

export interface StakeAllocation {
  outcome: string;
  stake: number;
  payout: number;
}

export interface StakePlan {
  totalStake: number;
  allocations: StakeAllocation[];
  guaranteedPayout: number;
  guaranteedProfit: number;
}

const KNOWN_OUTCOMES = new Map<string, readonly string[]>([
  ['1X2', ['HOME', 'DRAW', 'AWAY']],
  ['BTTS', ['YES', 'NO']],
]);

/**
 * Outcomes a market must have priced before it can be checked, or null when the market
 * has no fixed outcome set.
 */
export function requiredOutcomes(marketCode: string): readonly string[] | null {
  const known = KNOWN_OUTCOMES.get(marketCode);
  if (known) return known;
  if (/^OU_\d+(\.\d+)?$/.test(marketCode)) return ['OVER', 'UNDER'];
  return null;
}

export function isValidOdds(odds: number): boolean {
  return Number.isFinite(odds) && odds > 1;
}

/**
 * Highest price per outcome. Equal prices go to the bookmaker that sorts first.
 */
export function bestOddsByOutcome(quotes: PricedOutcome[]): PricedOutcome[] {
  const best = new Map<string, PricedOutcome>();

  for (const quote of quotes) {
    const current = best.get(quote.outcome);
    if (
      !current ||
      quote.odds > current.odds ||
      (quote.odds === current.odds && quote.bookmaker < current.bookmaker)
    ) {
      best.set(quote.outcome, quote);
    }
  }

  return Array.from(best.values()).sort((a, b) => a.outcome.localeCompare(b.outcome));
}

export function impliedProbabilitySum(odds: number[]): number {
  return odds.reduce((sum, o) => sum + 1 / o, 0);
}

export function profitPercent(impliedSum: number): number {
  return (1 / impliedSum - 1) * 100;
}

/**
 * Stake split for total stake S: stake_i = S * (1/o_i) / Σ(1/o_j), rounded to cents by
 * largest remainder. Payouts are stake times odds, rounded to the cent.
 */
export function allocateStakes(legs: { outcome: string; odds: number }[], totalStake: number): StakePlan {
  const totalCents = Math.round(totalStake * 100);
  const impliedSum = impliedProbabilitySum(legs.map(leg => leg.odds));

  const shares = legs.map((leg, index) => {
    const exact = (totalCents * (1 / leg.odds)) / impliedSum;
    const cents = Math.floor(exact);
    return { index, cents, remainder: exact - cents };
  });

  let leftover = totalCents - shares.reduce((sum, share) => sum + share.cents, 0);
  const byRemainder = [...shares].sort((a, b) => b.remainder - a.remainder || a.index - b.index);
  for (const share of byRemainder) {
    if (leftover <= 0) break;
    share.cents += 1;
    leftover -= 1;
  }

  const allocations = legs.map((leg, index) => {
    const stakeCents = shares[index].cents;
    const payoutCents = Math.round((stakeCents * Math.round(leg.odds * 1000)) / 1000);
    return { outcome: leg.outcome, stake: stakeCents / 100, payout: payoutCents / 100 };
  });

  const minPayoutCents = Math.min(...allocations.map(a => Math.round(a.payout * 100)));

  return {
    totalStake: totalCents / 100,
    allocations,
    guaranteedPayout: minPayoutCents / 100,
    guaranteedProfit: (minPayoutCents - totalCents) / 100,
  };
}
