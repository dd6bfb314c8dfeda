import catalogJson from './market-catalog.json';

export type ScoreTerm = 'home' | 'away' | 'total' | 'diff' | 'parity';
export type Comparator = 'eq' | 'ne' | 'gt' | 'gte' | 'lt' | 'lte';

/** All listed comparisons must hold. */
export type Conditions = Partial<Record<ScoreTerm, Partial<Record<Comparator, number>>>>;

export type ScorelinePredicate = (homeGoals: number, awayGoals: number) => boolean;

export interface MarketDefinition {
  code: string;
  group: string;
  predicate: ScorelinePredicate;
}

export interface MarketGroup {
  name: string;
  /** Outcomes partition the scoreline grid, so their probabilities sum to 1. */
  exclusive: boolean;
  codes: string[];
}

export interface MarketCatalog {
  version: number;
  markets: MarketDefinition[];
  groups: MarketGroup[];
}

const SCORE_TERMS: readonly ScoreTerm[] = ['home', 'away', 'total', 'diff', 'parity'];
const COMPARATORS: readonly Comparator[] = ['eq', 'ne', 'gt', 'gte', 'lt', 'lte'];

const TERM_VALUE: Record<ScoreTerm, (home: number, away: number) => number> = {
  home: (home) => home,
  away: (_home, away) => away,
  total: (home, away) => home + away,
  diff: (home, away) => home - away,
  parity: (home, away) => (home + away) % 2,
};

const COMPARE: Record<Comparator, (value: number, operand: number) => boolean> = {
  eq: (value, operand) => value === operand,
  ne: (value, operand) => value !== operand,
  gt: (value, operand) => value > operand,
  gte: (value, operand) => value >= operand,
  lt: (value, operand) => value < operand,
  lte: (value, operand) => value <= operand,
};

export class MarketCatalogError extends Error {
  constructor(message: string) {
    super(`Invalid market catalog: ${message}`);
    this.name = 'MarketCatalogError';
  }
}

/**
 * Parses the declarative catalog table. Each market is a predicate over the final score;
 * `when` is a conjunction of comparisons, `anyOf` a disjunction of such conjunctions.
 */
export function parseMarketCatalog(raw: unknown): MarketCatalog {
  if (!isRecord(raw) || typeof raw.version !== 'number' || !Array.isArray(raw.groups)) {
    throw new MarketCatalogError('expected { version, groups[] }');
  }

  const markets: MarketDefinition[] = [];
  const groups: MarketGroup[] = [];
  const seen = new Set<string>();

  for (const rawGroup of raw.groups) {
    if (!isRecord(rawGroup) || typeof rawGroup.group !== 'string' || !Array.isArray(rawGroup.markets)) {
      throw new MarketCatalogError('group entries need a name and markets[]');
    }

    const group: MarketGroup = {
      name: rawGroup.group,
      exclusive: rawGroup.exclusive === true,
      codes: [],
    };

    for (const rawMarket of rawGroup.markets) {
      if (!isRecord(rawMarket) || typeof rawMarket.code !== 'string') {
        throw new MarketCatalogError(`market without code in group ${group.name}`);
      }
      if (seen.has(rawMarket.code)) {
        throw new MarketCatalogError(`duplicate market code ${rawMarket.code}`);
      }
      seen.add(rawMarket.code);

      markets.push({
        code: rawMarket.code,
        group: group.name,
        predicate: compilePredicate(rawMarket, rawMarket.code),
      });
      group.codes.push(rawMarket.code);
    }

    groups.push(group);
  }

  return { version: raw.version, markets, groups };
}

function compilePredicate(rawMarket: Record<string, unknown>, code: string): ScorelinePredicate {
  if (rawMarket.when !== undefined) {
    return compileConditions(rawMarket.when, code);
  }

  if (Array.isArray(rawMarket.anyOf) && rawMarket.anyOf.length > 0) {
    const alternatives = rawMarket.anyOf.map((alt: unknown) => compileConditions(alt, code));
    return (home, away) => alternatives.some(alt => alt(home, away));
  }

  throw new MarketCatalogError(`market ${code} needs "when" or "anyOf"`);
}

function compileConditions(raw: unknown, code: string): ScorelinePredicate {
  if (!isRecord(raw)) {
    throw new MarketCatalogError(`market ${code} has a malformed condition`);
  }

  const checks: ScorelinePredicate[] = [];

  for (const [termKey, rawComparisons] of Object.entries(raw)) {
    const term = SCORE_TERMS.find(t => t === termKey);
    if (!term || !isRecord(rawComparisons)) {
      throw new MarketCatalogError(`market ${code} uses unknown term ${termKey}`);
    }

    for (const [comparatorKey, operand] of Object.entries(rawComparisons)) {
      const comparator = COMPARATORS.find(c => c === comparatorKey);
      if (!comparator || typeof operand !== 'number') {
        throw new MarketCatalogError(`market ${code} has bad comparison ${termKey}.${comparatorKey}`);
      }

      const valueOf = TERM_VALUE[term];
      const compare = COMPARE[comparator];
      checks.push((home, away) => compare(valueOf(home, away), operand));
    }
  }

  if (checks.length === 0) {
    throw new MarketCatalogError(`market ${code} has an empty condition`);
  }

  return (home, away) => checks.every(check => check(home, away));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const MARKET_CATALOG: MarketCatalog = parseMarketCatalog(catalogJson);
