import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { InjectRepository } from '@nestjs/typeorm';
import { And, Between, LessThan, MoreThanOrEqual, Repository } from 'typeorm';
import { CalibrationEvent, MatchOutcome } from '../entities/calibration-event.entity';
import { ModelMetricsDaily } from '../entities/model-metrics-daily.entity';
import { MarketProbability } from '../../markets/entities/market-probability.entity';
import { ModelRegistryService } from '../../model-registry/services/model-registry.service';
import { QueueService } from '../../queue/services/queue.service';
import { MetricsService } from '../../../common/services/metrics.service';
import { InvalidSignalError } from '../../../common/errors/domain.errors';
import { errorMessage } from '../../../common/utils/retry';
import {
  OutcomeProbabilities,
  ReliabilityBin,
  SettledPrediction,
  dayBounds,
  normaliseProbabilities,
  outcomeFromScore,
  reliabilityBins,
  summarise,
  utcDay,
} from '../calibration-metrics';

export interface RecordEventInput extends OutcomeProbabilities {
  fixtureId: string;
  modelVersionId: string;
  outcome: MatchOutcome;
}

export interface RecordEventResult {
  created: boolean;
  event: CalibrationEvent | null;
}

export interface SettlementResult {
  fixtureId: string;
  outcome: MatchOutcome;
  recorded: string[];
  alreadyRecorded: string[];
  skipped: string[];
}

export interface DailyCalibration {
  modelVersionId: string;
  day: string;
  served: number;
  correct: number;
  accuracy: number | null;
  brierSum: number;
  brierMean: number | null;
  logLossSum: number;
  ece: number | null;
}

export interface GateAlert {
  code: 'CalibrationGateBreached';
  metric: 'accuracy' | 'ece';
  value: number;
  threshold: number;
  message: string;
}

export interface GateCheckResult {
  modelVersionId: string;
  windowDays: number;
  served: number;
  accuracy: number | null;
  ece: number | null;
  status: 'PASS' | 'BREACHED' | 'INSUFFICIENT_DATA';
  alerts: GateAlert[];
}

export interface CalibrationSummary {
  modelVersionId: string;
  hours: number;
  count: number;
  accuracy: number | null;
  brier: number | null;
  logLoss: number | null;
  ece: number | null;
  bins: ReliabilityBin[];
}

export interface DriftStatus {
  isDrifting: boolean;
  severity: 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';
  message: string;
  currentAccuracy: number;
  previousAccuracy: number;
  dropPercentage: number;
}

export const CALIBRATION_GATE_BREACHED = 'calibration_gate_breached_total';

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class CalibrationTrackerService {
  private readonly logger = new Logger(CalibrationTrackerService.name);
  private readonly windowDays: number;
  private readonly accuracyFloor: number;
  private readonly eceCeil: number;
  private readonly minSamples: number;
  private readonly bins: number;
  private readonly driftThreshold: number;

  constructor(
    @InjectRepository(CalibrationEvent)
    private eventRepository: Repository<CalibrationEvent>,
    @InjectRepository(ModelMetricsDaily)
    private dailyRepository: Repository<ModelMetricsDaily>,
    @InjectRepository(MarketProbability)
    private marketProbabilityRepository: Repository<MarketProbability>,
    private modelRegistryService: ModelRegistryService,
    private queueService: QueueService,
    private metricsService: MetricsService,
    private configService: ConfigService,
  ) {
    this.windowDays = this.configService.get<number>('calibration.windowDays') ?? 7;
    this.accuracyFloor = this.configService.get<number>('calibration.accuracyFloor') ?? 0.45;
    this.eceCeil = this.configService.get<number>('calibration.eceCeil') ?? 0.08;
    this.minSamples = this.configService.get<number>('calibration.minSamples') ?? 30;
    this.bins = this.configService.get<number>('calibration.bins') ?? 10;
    this.driftThreshold = this.configService.get<number>('calibration.driftThreshold') ?? 0.05;
  }

  /**
   * Record one settled prediction. A second event for the same fixture and version is ignored.
   */
  async recordEvent(input: RecordEventInput): Promise<RecordEventResult> {
    const probabilities = normaliseProbabilities(input);
    await this.modelRegistryService.findById(input.modelVersionId);

    const inserted = await this.insertEvent(input.fixtureId, input.modelVersionId, probabilities, input.outcome);
    if (inserted) {
      await this.requestRecompute(inserted.modelVersionId, utcDay(new Date(inserted.createdAt)));
      return { created: true, event: inserted };
    }

    const event = await this.eventRepository.findOne({
      where: { fixtureId: input.fixtureId, modelVersionId: input.modelVersionId },
    });
    return { created: false, event };
  }

  /**
   * Turn a final score into calibration events for every version that priced the fixture
   */
  async settleFixture(
    fixtureId: string,
    homeGoals: number,
    awayGoals: number,
  ): Promise<SettlementResult> {
    for (const [field, goals] of [['homeGoals', homeGoals], ['awayGoals', awayGoals]] as const) {
      if (!Number.isInteger(goals) || goals < 0) {
        throw new InvalidSignalError(field, goals);
      }
    }

    const outcome = outcomeFromScore(homeGoals, awayGoals);
    const result: SettlementResult = { fixtureId, outcome, recorded: [], alreadyRecorded: [], skipped: [] };

    const surfaces = await this.marketProbabilityRepository.find({
      where: { fixtureId },
      order: { computedAt: 'DESC' },
    });

    // Latest surface per version
    const latest = new Map<string, MarketProbability>();
    for (const surface of surfaces) {
      if (!latest.has(surface.modelVersionId)) latest.set(surface.modelVersionId, surface);
    }

    if (latest.size === 0) {
      this.logger.warn(`Fixture ${fixtureId} settled ${homeGoals}-${awayGoals} but no model priced it`);
      return result;
    }

    // Rebuilt for the day each event was stored on
    const recomputes: Array<{ modelVersionId: string; day: string }> = [];

    for (const [modelVersionId, surface] of latest) {
      const { HOME, DRAW, AWAY } = surface.probabilities;
      if (HOME === undefined || DRAW === undefined || AWAY === undefined) {
        result.skipped.push(modelVersionId);
        continue;
      }

      let probabilities: OutcomeProbabilities;
      try {
        probabilities = normaliseProbabilities({ pHome: HOME, pDraw: DRAW, pAway: AWAY });
      } catch (error) {
        this.logger.warn(`Skipping ${modelVersionId} for fixture ${fixtureId}: ${errorMessage(error)}`);
        result.skipped.push(modelVersionId);
        continue;
      }

      const inserted = await this.insertEvent(fixtureId, modelVersionId, probabilities, outcome);
      if (!inserted) {
        result.alreadyRecorded.push(modelVersionId);
        continue;
      }

      result.recorded.push(modelVersionId);
      recomputes.push({ modelVersionId, day: utcDay(new Date(inserted.createdAt)) });
    }

    for (const { modelVersionId, day } of recomputes) {
      await this.requestRecompute(modelVersionId, day);
    }

    this.logger.log(
      `Settled fixture ${fixtureId} as ${outcome}: ${result.recorded.length} recorded, ${result.alreadyRecorded.length} already present`,
    );

    return result;
  }

  /**
   * Rebuild one version's daily row from that day's events
   */
  async recomputeDay(modelVersionId: string, day: string): Promise<DailyCalibration | null> {
    const [start, end] = dayBounds(day);
    const events = await this.eventsSince(modelVersionId, start, end);

    if (events.length === 0) {
      await this.dailyRepository.delete({ modelVersionId, day });
      return null;
    }

    const totals = summarise(events, this.bins);
    await this.dailyRepository.upsert({ modelVersionId, day, ...totals }, ['modelVersionId', 'day']);

    return toDailyCalibration({ modelVersionId, day, ...totals });
  }

  async getDailyCalibration(modelVersionId: string, from: string, to: string): Promise<DailyCalibration[]> {
    dayBounds(from);
    dayBounds(to);
    if (from > to) {
      throw new BadRequestException(`from (${from}) is after to (${to})`);
    }

    const rows = await this.dailyRepository.find({
      where: { modelVersionId, day: Between(from, to) },
      order: { day: 'ASC' },
    });

    return rows.map(row => toDailyCalibration(row));
  }

  /**
   * Rolling-window gate check. Breaches are logged, counted and returned, never thrown.
   */
  async checkGates(modelVersionId: string, now: Date = new Date()): Promise<GateCheckResult> {
    const events = await this.eventsSince(modelVersionId, new Date(now.getTime() - this.windowDays * DAY_MS));
    const totals = summarise(events, this.bins);

    const result: GateCheckResult = {
      modelVersionId,
      windowDays: this.windowDays,
      served: totals.served,
      accuracy: totals.served > 0 ? totals.correct / totals.served : null,
      ece: totals.ece,
      status: 'PASS',
      alerts: [],
    };

    if (totals.served < this.minSamples) {
      result.status = 'INSUFFICIENT_DATA';
      return result;
    }

    if (result.accuracy !== null && result.accuracy < this.accuracyFloor) {
      result.alerts.push({
        code: 'CalibrationGateBreached',
        metric: 'accuracy',
        value: result.accuracy,
        threshold: this.accuracyFloor,
        message: `Accuracy ${(result.accuracy * 100).toFixed(2)}% is below the ${(this.accuracyFloor * 100).toFixed(2)}% floor`,
      });
    }

    if (result.ece !== null && result.ece > this.eceCeil) {
      result.alerts.push({
        code: 'CalibrationGateBreached',
        metric: 'ece',
        value: result.ece,
        threshold: this.eceCeil,
        message: `ECE ${result.ece.toFixed(4)} is above the ${this.eceCeil} ceiling`,
      });
    }

    for (const alert of result.alerts) {
      this.metricsService.increment(CALIBRATION_GATE_BREACHED, { modelVersionId, metric: alert.metric });
      this.logger.warn(`[ALERT] Model version ${modelVersionId}: ${alert.message} (${this.windowDays}d window)`);
    }

    if (result.alerts.length > 0) result.status = 'BREACHED';
    return result;
  }

  /**
   * Reliability table and mean losses over the last `hours`
   */
  async getCalibrationSummary(
    modelVersionId: string,
    hours: number = 720,
    bins: number = this.bins,
    now: Date = new Date(),
  ): Promise<CalibrationSummary> {
    const events = await this.eventsSince(modelVersionId, new Date(now.getTime() - hours * 3600 * 1000));
    const n = events.length;

    if (n === 0) {
      return { modelVersionId, hours, count: 0, accuracy: null, brier: null, logLoss: null, ece: null, bins: [] };
    }

    const totals = summarise(events, bins);

    return {
      modelVersionId,
      hours,
      count: n,
      accuracy: totals.correct / n,
      brier: totals.brierSum / n,
      logLoss: totals.logLossSum / n,
      ece: totals.ece,
      bins: reliabilityBins(events, bins),
    };
  }

  /**
   * Check for model drift: last 7 days against the last 30
   */
  async checkModelDrift(modelVersionId: string, now: Date = new Date()): Promise<DriftStatus> {
    const last30Days = await this.getPeriodAccuracy(modelVersionId, 30, now);
    const last7Days = await this.getPeriodAccuracy(modelVersionId, 7, now);

    if (last30Days === 0) {
      return {
        isDrifting: false,
        severity: 'LOW',
        message: 'Insufficient data for drift detection',
        currentAccuracy: last7Days,
        previousAccuracy: 0,
        dropPercentage: 0,
      };
    }

    const dropPercentage = last30Days - last7Days;

    if (dropPercentage > this.driftThreshold) {
      const severity = dropPercentage > 0.1 ? 'CRITICAL' : dropPercentage > 0.075 ? 'HIGH' : 'MEDIUM';

      this.logger.warn(`Model drift detected for ${modelVersionId}: ${(dropPercentage * 100).toFixed(2)}% accuracy drop`);

      return {
        isDrifting: true,
        severity,
        message: `Accuracy dropped by ${(dropPercentage * 100).toFixed(2)}% in the last 7 days`,
        currentAccuracy: last7Days,
        previousAccuracy: last30Days,
        dropPercentage,
      };
    }

    return {
      isDrifting: false,
      severity: 'LOW',
      message: 'No significant drift detected',
      currentAccuracy: last7Days,
      previousAccuracy: last30Days,
      dropPercentage,
    };
  }

  /**
   * Hourly rollup of the previous and current UTC day, with gate checks, for every version
   * with events in that span. The previous day covers events recorded after its last tick.
   */
  @Cron(CronExpression.EVERY_HOUR)
  async rollupRecentDays(now: Date = new Date()): Promise<number> {
    const today = utcDay(now);
    const [todayStart] = dayBounds(today);
    const yesterday = utcDay(new Date(todayStart.getTime() - DAY_MS));
    const [start] = dayBounds(yesterday);

    const versions = await this.eventRepository
      .createQueryBuilder('e')
      .select('DISTINCT e.modelVersionId', 'modelVersionId')
      .where('e.createdAt >= :start', { start })
      .getRawMany<{ modelVersionId: string }>();

    let rolledUp = 0;
    for (const { modelVersionId } of versions) {
      try {
        await this.recomputeDay(modelVersionId, yesterday);
        await this.recomputeDay(modelVersionId, today);
        await this.checkGates(modelVersionId, now);
        rolledUp++;
      } catch (error) {
        this.logger.error(`Calibration rollup failed for ${modelVersionId}: ${errorMessage(error)}`);
      }
    }

    if (rolledUp > 0) {
      this.logger.log(`Calibration rollup for ${yesterday} and ${today}: ${rolledUp} model versions`);
    }
    return rolledUp;
  }

  private async insertEvent(
    fixtureId: string,
    modelVersionId: string,
    probabilities: OutcomeProbabilities,
    outcome: MatchOutcome,
  ): Promise<CalibrationEvent | null> {
    const existing = await this.eventRepository.findOne({ where: { fixtureId, modelVersionId } });
    if (existing) return null;

    // A concurrent insert of the same pair loses to the unique constraint
    const result = await this.eventRepository
      .createQueryBuilder()
      .insert()
      .into(CalibrationEvent)
      .values({ fixtureId, modelVersionId, ...probabilities, outcome })
      .orIgnore()
      .returning(['id'])
      .execute();

    // RETURNING yields no row when the conflict was ignored
    const insertedRows: unknown[] = Array.isArray(result.raw) ? result.raw : [];
    if (insertedRows.length === 0) return null;

    return this.eventRepository.findOne({ where: { fixtureId, modelVersionId } });
  }

  // A failed enqueue is picked up by the hourly rollup of the previous and current day
  private async requestRecompute(modelVersionId: string, day: string): Promise<void> {
    try {
      await this.queueService.scheduleCalibrationRecompute(modelVersionId, day);
    } catch (error) {
      this.logger.warn(`Could not schedule recompute of ${modelVersionId} for ${day}: ${errorMessage(error)}`);
    }
  }

  private async eventsSince(modelVersionId: string, start: Date, end?: Date): Promise<SettledPrediction[]> {
    const rows = await this.eventRepository.find({
      where: {
        modelVersionId,
        createdAt: end ? And(MoreThanOrEqual(start), LessThan(end)) : MoreThanOrEqual(start),
      },
    });

    // Decimal columns come back from Postgres as strings
    return rows.map(row => ({
      pHome: Number(row.pHome),
      pDraw: Number(row.pDraw),
      pAway: Number(row.pAway),
      outcome: row.outcome,
    }));
  }

  private async getPeriodAccuracy(modelVersionId: string, days: number, now: Date): Promise<number> {
    const events = await this.eventsSince(modelVersionId, new Date(now.getTime() - days * DAY_MS));
    if (events.length === 0) return 0;

    return summarise(events, this.bins).correct / events.length;
  }
}

function toDailyCalibration(row: Omit<ModelMetricsDaily, 'id' | 'updatedAt'>): DailyCalibration {
  const served = Number(row.served);
  const brierSum = Number(row.brierSum);

  return {
    modelVersionId: row.modelVersionId,
    day: row.day,
    served,
    correct: Number(row.correct),
    accuracy: served > 0 ? Number(row.correct) / served : null,
    brierSum,
    brierMean: served > 0 ? brierSum / served : null,
    logLossSum: Number(row.logLossSum),
    ece: row.ece === null ? null : Number(row.ece),
  };
}
