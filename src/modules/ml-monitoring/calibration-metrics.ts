import { InvalidSignalError } from '../../common/errors/domain.errors';
import { MatchOutcome } from './entities/calibration-event.entity';

export interface OutcomeProbabilities {
  pHome: number;
  pDraw: number;
  pAway: number;
}

export interface SettledPrediction extends OutcomeProbabilities {
  outcome: MatchOutcome;
}

export interface ReliabilityBin {
  lower: number;
  upper: number;
  count: number;
  meanConfidence: number | null;
  accuracy: number | null;
}

export interface CalibrationTotals {
  served: number;
  correct: number;
  brierSum: number;
  logLossSum: number;
  ece: number | null;
}

const LOG_FLOOR = 1e-9;

export function outcomeFromScore(homeGoals: number, awayGoals: number): MatchOutcome {
  if (homeGoals > awayGoals) return MatchOutcome.HOME;
  if (homeGoals < awayGoals) return MatchOutcome.AWAY;
  return MatchOutcome.DRAW;
}

/** Scales the three probabilities to sum to 1. */
export function normaliseProbabilities(p: OutcomeProbabilities): OutcomeProbabilities {
  for (const field of ['pHome', 'pDraw', 'pAway'] as const) {
    if (!Number.isFinite(p[field]) || p[field] < 0 || p[field] > 1) {
      throw new InvalidSignalError(field, p[field]);
    }
  }

  const sum = p.pHome + p.pDraw + p.pAway;
  if (sum <= 0) {
    throw new InvalidSignalError('pHome + pDraw + pAway', sum);
  }

  return { pHome: p.pHome / sum, pDraw: p.pDraw / sum, pAway: p.pAway / sum };
}

function probabilityOf(p: OutcomeProbabilities, outcome: MatchOutcome): number {
  if (outcome === MatchOutcome.HOME) return p.pHome;
  if (outcome === MatchOutcome.DRAW) return p.pDraw;
  return p.pAway;
}

/** Most probable outcome; ties resolve in H, D, A order. */
export function predictedOutcome(p: OutcomeProbabilities): MatchOutcome {
  let best = MatchOutcome.HOME;
  if (p.pDraw > probabilityOf(p, best)) best = MatchOutcome.DRAW;
  if (p.pAway > probabilityOf(p, best)) best = MatchOutcome.AWAY;
  return best;
}

export function brierContribution(p: OutcomeProbabilities, outcome: MatchOutcome): number {
  const indicator = (o: MatchOutcome) => (o === outcome ? 1 : 0);
  return (
    (p.pHome - indicator(MatchOutcome.HOME)) ** 2 +
    (p.pDraw - indicator(MatchOutcome.DRAW)) ** 2 +
    (p.pAway - indicator(MatchOutcome.AWAY)) ** 2
  );
}

export function logLossContribution(p: OutcomeProbabilities, outcome: MatchOutcome): number {
  return -Math.log(Math.max(probabilityOf(p, outcome), LOG_FLOOR));
}

/**
 * Top-label reliability table: each prediction lands in the bin of its highest
 * probability, and is a hit when that outcome happened.
 */
export function reliabilityBins(events: SettledPrediction[], bins: number = 10): ReliabilityBin[] {
  const binCount = Math.max(2, Math.floor(bins));
  const sums = new Array<number>(binCount).fill(0);
  const hits = new Array<number>(binCount).fill(0);
  const counts = new Array<number>(binCount).fill(0);

  for (const event of events) {
    const predicted = predictedOutcome(event);
    const confidence = probabilityOf(event, predicted);
    const index = Math.min(Math.floor(confidence * binCount), binCount - 1);

    sums[index] += confidence;
    hits[index] += predicted === event.outcome ? 1 : 0;
    counts[index] += 1;
  }

  return counts.map((count, i) => ({
    lower: i / binCount,
    upper: (i + 1) / binCount,
    count,
    meanConfidence: count > 0 ? sums[i] / count : null,
    accuracy: count > 0 ? hits[i] / count : null,
  }));
}

/** Count-weighted mean |confidence - accuracy| over non-empty bins; null without events. */
export function expectedCalibrationError(events: SettledPrediction[], bins: number = 10): number | null {
  if (events.length === 0) return null;

  let ece = 0;
  for (const bin of reliabilityBins(events, bins)) {
    if (bin.count === 0 || bin.meanConfidence === null || bin.accuracy === null) continue;
    ece += (bin.count / events.length) * Math.abs(bin.meanConfidence - bin.accuracy);
  }
  return ece;
}

export function summarise(events: SettledPrediction[], bins: number = 10): CalibrationTotals {
  let correct = 0;
  let brierSum = 0;
  let logLossSum = 0;

  for (const event of events) {
    if (predictedOutcome(event) === event.outcome) correct++;
    brierSum += brierContribution(event, event.outcome);
    logLossSum += logLossContribution(event, event.outcome);
  }

  return {
    served: events.length,
    correct,
    brierSum,
    logLossSum,
    ece: expectedCalibrationError(events, bins),
  };
}

/** UTC calendar day of a timestamp, YYYY-MM-DD. */
export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Half-open [start, end) bounds of a UTC day. */
export function dayBounds(day: string): [Date, Date] {
  const start = new Date(`${day}T00:00:00.000Z`);
  if (Number.isNaN(start.getTime()) || utcDay(start) !== day) {
    throw new InvalidSignalError('day', day);
  }
  return [start, new Date(start.getTime() + 24 * 3600 * 1000)];
}
