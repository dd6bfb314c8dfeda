import { InvalidSignalError } from '../../common/errors/domain.errors';
import { MarketCatalog } from './catalog/market-catalog';

/**
 * Fitted parameters a registered model version carries. Versions that omit a value
 * fall back to the defaults below.
 */
export interface ScorelineModelParameters {
  /** Dixon-Coles low-score dependence; negative values inflate 0-0 and 1-1. */
  rho: number;
  homeAdvantage: number;
  /** Log-rate shift per 400 Elo points of difference. */
  eloWeight: number;
  refereeWeight: number;
  formWeight: number;
  maxGoals: number;
  /** Grid mass allowed to fall outside 0..maxGoals before the result is flagged. */
  truncationBudget: number;
}

export const DEFAULT_SCORELINE_PARAMETERS: Readonly<ScorelineModelParameters> = {
  rho: -0.08,
  homeAdvantage: 1.08,
  eloWeight: 0.35,
  refereeWeight: 0.1,
  formWeight: 0.15,
  maxGoals: 10,
  truncationBudget: 1e-4,
};

export interface ScorelineInputs {
  homeXgFor: number;
  homeXgAgainst: number;
  awayXgFor: number;
  awayXgAgainst: number;
  homeElo: number;
  awayElo: number;
  refereeBias: number;
  homeForm: number | null;
  awayForm: number | null;
}

export interface ExpectedGoals {
  home: number;
  away: number;
}

export interface ScorelineGrid {
  maxGoals: number;
  /** cells[h][a] = P(home scores h, away scores a), normalised to sum to 1. */
  cells: number[][];
  rawMass: number;
  truncated: boolean;
}

export const GRID_TOLERANCE = 1e-6;

const MIN_RATE = 0.05;
const MAX_RATE = 8;

const PARAMETER_BOUNDS: Record<keyof ScorelineModelParameters, [number, number]> = {
  rho: [-0.3, 0.3],
  homeAdvantage: [0.5, 2],
  eloWeight: [0, 2],
  refereeWeight: [0, 1],
  formWeight: [0, 1],
  maxGoals: [4, 20],
  truncationBudget: [0, 0.05],
};

const PARAMETER_KEYS: readonly (keyof ScorelineModelParameters)[] = [
  'rho',
  'homeAdvantage',
  'eloWeight',
  'refereeWeight',
  'formWeight',
  'maxGoals',
  'truncationBudget',
];

export function resolveParameters(
  overrides?: Partial<ScorelineModelParameters> | null,
): ScorelineModelParameters {
  const params: ScorelineModelParameters = { ...DEFAULT_SCORELINE_PARAMETERS, ...(overrides ?? {}) };

  for (const name of PARAMETER_KEYS) {
    const [min, max] = PARAMETER_BOUNDS[name];
    const value = params[name];
    if (!Number.isFinite(value) || value < min || value > max) {
      throw new InvalidSignalError(`parameters.${name}`, value);
    }
  }

  if (!Number.isInteger(params.maxGoals)) {
    throw new InvalidSignalError('parameters.maxGoals', params.maxGoals);
  }

  return params;
}

export function validateInputs(inputs: ScorelineInputs): void {
  const positive = ['homeXgFor', 'homeXgAgainst', 'awayXgFor', 'awayXgAgainst', 'homeElo', 'awayElo'] as const;

  for (const field of positive) {
    const value = inputs[field];
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidSignalError(field, value);
    }
  }

  if (!Number.isFinite(inputs.refereeBias) || Math.abs(inputs.refereeBias) > 1) {
    throw new InvalidSignalError('refereeBias', inputs.refereeBias);
  }

  for (const field of ['homeForm', 'awayForm'] as const) {
    const value = inputs[field];
    if (value !== null && (!Number.isFinite(value) || value < 0 || value > 3)) {
      throw new InvalidSignalError(field, value);
    }
  }
}

/**
 * Scoring rates for both sides: the average of own attack and opponent defence xG,
 * shifted in log space by Elo difference, referee bias and recent form.
 */
export function expectedGoals(inputs: ScorelineInputs, params: ScorelineModelParameters): ExpectedGoals {
  const attackHome = (inputs.homeXgFor + inputs.awayXgAgainst) / 2;
  const attackAway = (inputs.awayXgFor + inputs.homeXgAgainst) / 2;

  const formDelta =
    inputs.homeForm !== null && inputs.awayForm !== null ? (inputs.homeForm - inputs.awayForm) / 3 : 0;

  const shift =
    params.eloWeight * ((inputs.homeElo - inputs.awayElo) / 400) +
    params.refereeWeight * inputs.refereeBias +
    params.formWeight * formDelta;

  return {
    home: clamp(attackHome * params.homeAdvantage * Math.exp(shift / 2), MIN_RATE, MAX_RATE),
    away: clamp(attackAway * Math.exp(-shift / 2), MIN_RATE, MAX_RATE),
  };
}

export function buildScorelineGrid(rates: ExpectedGoals, params: ScorelineModelParameters): ScorelineGrid {
  const maxGoals = params.maxGoals;
  const homeDist = poissonDist(rates.home, maxGoals);
  const awayDist = poissonDist(rates.away, maxGoals);

  const raw: number[][] = [];
  let rawMass = 0;

  for (let h = 0; h <= maxGoals; h++) {
    const row: number[] = [];
    for (let a = 0; a <= maxGoals; a++) {
      const p = homeDist[h] * awayDist[a] * lowScoreFactor(h, a, rates, params.rho);
      row.push(p);
      rawMass += p;
    }
    raw.push(row);
  }

  const cells = raw.map(row => row.map(p => p / rawMass));

  let total = 0;
  for (let h = 0; h <= maxGoals; h++) {
    for (let a = 0; a <= maxGoals; a++) {
      total += cells[h][a];
    }
  }
  if (!(Math.abs(total - 1) <= GRID_TOLERANCE)) {
    throw new Error(`Scoreline grid sums to ${total}`);
  }

  return {
    maxGoals,
    cells,
    rawMass,
    truncated: Math.abs(1 - rawMass) > params.truncationBudget,
  };
}

/** Sums the grid over each market's predicate, visiting cells in increasing goal order. */
export function priceMarkets(grid: ScorelineGrid, catalog: MarketCatalog): Record<string, number> {
  const prices: Record<string, number> = {};

  for (const market of catalog.markets) {
    let p = 0;
    for (let h = 0; h <= grid.maxGoals; h++) {
      for (let a = 0; a <= grid.maxGoals; a++) {
        if (market.predicate(h, a)) p += grid.cells[h][a];
      }
    }
    prices[market.code] = clamp(p, 0, 1);
  }

  return prices;
}

/** 1 minus the normalised entropy of the 1X2 distribution. */
export function outcomeConfidence(home: number, draw: number, away: number): number {
  let entropy = 0;
  for (const p of [home, draw, away]) {
    if (p > 0) entropy -= p * Math.log(p);
  }
  return clamp(1 - entropy / Math.log(3), 0, 1);
}

function lowScoreFactor(h: number, a: number, rates: ExpectedGoals, rho: number): number {
  let tau = 1;
  if (h === 0 && a === 0) tau = 1 - rates.home * rates.away * rho;
  else if (h === 0 && a === 1) tau = 1 + rates.home * rho;
  else if (h === 1 && a === 0) tau = 1 + rates.away * rho;
  else if (h === 1 && a === 1) tau = 1 - rho;
  return Math.max(0, tau);
}

function poissonDist(lambda: number, maxK: number): number[] {
  const dist: number[] = new Array(maxK + 1).fill(0);
  dist[0] = Math.exp(-lambda);
  for (let k = 1; k <= maxK; k++) {
    dist[k] = dist[k - 1] * (lambda / k);
  }
  return dist;
}

function clamp(v: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, v));
}
