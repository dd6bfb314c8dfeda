export interface Divergence {
  l1Distance: number;
  /** null when the canary puts zero mass on a market production gives mass to. */
  klDivergence: number | null;
  marketCount: number;
}

/**
 * Compares two probability maps market by market over the union of their codes;
 * a code missing on one side counts as probability 0 there.
 */
export function computeDivergence(
  production: Record<string, number>,
  canary: Record<string, number>,
): Divergence {
  const codes = Array.from(new Set([...Object.keys(production), ...Object.keys(canary)])).sort();

  let l1Distance = 0;
  let kl = 0;
  let klDefined = true;

  for (const code of codes) {
    const p = production[code] ?? 0;
    const q = canary[code] ?? 0;

    l1Distance += Math.abs(p - q);

    if (q > 0) {
      if (p > 0) kl += p * Math.log(p / q);
    } else if (p > 0) {
      klDefined = false;
    }
  }

  return {
    l1Distance,
    klDivergence: klDefined ? kl : null,
    marketCount: codes.length,
  };
}
