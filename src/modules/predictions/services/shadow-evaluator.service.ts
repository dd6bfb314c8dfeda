import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MoreThanOrEqual, Repository } from 'typeorm';
import { ShadowLogEntry } from '../entities/shadow-log.entity';
import { ShadowLogQueueService } from './shadow-log-queue.service';
import { MarketProbabilitySurface } from '../../markets/services/probability-model.service';
import { ModelVersion } from '../../model-registry/entities/model-version.entity';
import { Bucket } from '../../traffic/entities/ab-assignment.entity';
import { MetricsService } from '../../../common/services/metrics.service';
import { errorMessage } from '../../../common/utils/retry';

export const SHADOW_CANARY_ERRORS = 'shadow_canary_errors_total';

export interface ShadowRequest {
  bucket: Bucket;
  production: ModelVersion;
  canary: ModelVersion | null;
  resolve: (version: ModelVersion) => Promise<MarketProbabilitySurface>;
}

export interface ShadowEvaluation {
  served: MarketProbabilitySurface;
  servedBucket: Bucket;
  production: MarketProbabilitySurface;
  canary: MarketProbabilitySurface | null;
}

export interface DivergenceSummary {
  canaryVersionId: string;
  since: string;
  comparisons: number;
  meanL1Distance: number | null;
  maxL1Distance: number | null;
  meanKlDivergence: number | null;
  undefinedKlCount: number;
}

const SUMMARY_ROW_LIMIT = 5000;

@Injectable()
export class ShadowEvaluatorService {
  private readonly logger = new Logger(ShadowEvaluatorService.name);

  constructor(
    @InjectRepository(ShadowLogEntry)
    private shadowLogRepository: Repository<ShadowLogEntry>,
    private shadowLogQueue: ShadowLogQueueService,
    private metricsService: MetricsService,
  ) {}

  /**
   * Resolve production and canary concurrently and serve the bucket's surface.
   *
   * The comparison is handed to the shadow log queue; the caller never waits on it.
   * Bucket B falls back to production when no canary is configured or the canary fails;
   * a canary failure never fails the request.
   */
  async evaluate(request: ShadowRequest): Promise<ShadowEvaluation> {
    const { bucket, production, canary, resolve } = request;

    const [productionSurface, canarySurface] = await Promise.all([
      resolve(production),
      canary ? this.resolveCanary(canary, resolve) : Promise.resolve(null),
    ]);

    if (canarySurface) {
      this.shadowLogQueue.enqueue({
        production: productionSurface,
        canary: canarySurface,
        servedBucket: bucket,
      });
    }

    const servesCanary = bucket === Bucket.B && canarySurface !== null;

    return {
      served: servesCanary ? canarySurface : productionSurface,
      servedBucket: servesCanary ? Bucket.B : Bucket.A,
      production: productionSurface,
      canary: canarySurface,
    };
  }

  private async resolveCanary(
    canary: ModelVersion,
    resolve: ShadowRequest['resolve'],
  ): Promise<MarketProbabilitySurface | null> {
    try {
      return await resolve(canary);
    } catch (error) {
      this.metricsService.increment(SHADOW_CANARY_ERRORS, { canaryVersionId: canary.id });
      this.logger.warn(`Canary ${canary.id} failed, serving production: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Get recent shadow comparisons, newest first
   */
  async recentShadowLog(fixtureId?: string, limit: number = 50): Promise<ShadowLogEntry[]> {
    return this.shadowLogRepository.find({
      where: fixtureId ? { fixtureId } : {},
      order: { createdAt: 'DESC' },
      take: Math.min(Math.max(1, limit), 500),
    });
  }

  /**
   * Aggregate divergence of one canary against production over the last `hours`
   */
  async divergenceSummary(canaryVersionId: string, hours: number = 24, now: Date = new Date()): Promise<DivergenceSummary> {
    const since = new Date(now.getTime() - hours * 3600 * 1000);

    const rows = await this.shadowLogRepository.find({
      where: { canaryVersionId, createdAt: MoreThanOrEqual(since) },
      order: { createdAt: 'DESC' },
      take: SUMMARY_ROW_LIMIT,
    });

    if (rows.length === SUMMARY_ROW_LIMIT) {
      this.logger.debug(`Divergence summary for ${canaryVersionId} capped at ${SUMMARY_ROW_LIMIT} comparisons`);
    }

    const l1 = rows.map(row => Number(row.l1Distance));
    const kl: number[] = [];
    for (const row of rows) {
      if (row.klDivergence !== null) kl.push(Number(row.klDivergence));
    }

    return {
      canaryVersionId,
      since: since.toISOString(),
      comparisons: rows.length,
      meanL1Distance: mean(l1),
      maxL1Distance: l1.length > 0 ? Math.max(...l1) : null,
      meanKlDivergence: mean(kl),
      undefinedKlCount: rows.length - kl.length,
    };
  }
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
