import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ShadowLogEntry } from '../entities/shadow-log.entity';
import { MarketProbabilitySurface } from '../../markets/services/probability-model.service';
import { MetricsService } from '../../../common/services/metrics.service';
import { errorMessage, withRetry } from '../../../common/utils/retry';
import { computeDivergence } from '../divergence';
import { Bucket } from '../../traffic/entities/ab-assignment.entity';

export interface ShadowComparison {
  production: MarketProbabilitySurface;
  canary: MarketProbabilitySurface;
  servedBucket: Bucket;
}

export const SHADOW_LOG_DROPPED = 'shadow_log_dropped_total';
export const SHADOW_LOG_WRITE_ERRORS = 'shadow_log_write_errors_total';
export const SHADOW_LOG_ABANDONED = 'shadow_log_abandoned_total';
export const SHADOW_LOG_WRITTEN = 'shadow_log_written_total';
export const SHADOW_KL_UNDEFINED = 'shadow_kl_undefined_total';

/**
 * Bounded buffer between the request path and the shadow log table.
 *
 * `enqueue` never waits on storage. When the buffer is full the oldest comparison is
 * dropped and counted. A single drain loop writes entries one by one with bounded retry.
 */
@Injectable()
export class ShadowLogQueueService implements OnModuleDestroy {
  private readonly logger = new Logger(ShadowLogQueueService.name);
  private readonly buffer: ShadowComparison[] = [];
  private draining: Promise<void> | null = null;

  private readonly capacity: number;
  private readonly writeAttempts: number;
  private readonly retryDelayMs: number;

  constructor(
    @InjectRepository(ShadowLogEntry)
    private shadowLogRepository: Repository<ShadowLogEntry>,
    private metricsService: MetricsService,
    private configService: ConfigService,
  ) {
    this.capacity = Math.max(1, this.configService.get<number>('shadow.queueCapacity') ?? 1000);
    this.writeAttempts = this.configService.get<number>('shadow.writeAttempts') ?? 3;
    this.retryDelayMs = this.configService.get<number>('shadow.retryDelayMs') ?? 200;
  }

  enqueue(comparison: ShadowComparison): void {
    if (this.buffer.length >= this.capacity) {
      const dropped = this.buffer.shift();
      this.metricsService.increment(SHADOW_LOG_DROPPED);
      this.logger.warn(
        `Shadow log buffer full (${this.capacity}), dropped comparison for fixture ${dropped?.production.fixtureId}`,
      );
    }

    this.buffer.push(comparison);
    this.scheduleDrain();
  }

  get pending(): number {
    return this.buffer.length;
  }

  /** Resolves once every buffered comparison has been written or abandoned. */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  async onModuleDestroy() {
    await this.flush();
  }

  private scheduleDrain(): void {
    if (this.draining) return;

    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.buffer.length > 0) this.scheduleDrain();
    });
  }

  private async drain(): Promise<void> {
    let comparison = this.buffer.shift();

    while (comparison) {
      await this.write(comparison);
      comparison = this.buffer.shift();
    }
  }

  private async write(comparison: ShadowComparison): Promise<void> {
    const { production, canary, servedBucket } = comparison;
    const divergence = computeDivergence(production.probabilities, canary.probabilities);

    if (divergence.klDivergence === null) {
      this.metricsService.increment(SHADOW_KL_UNDEFINED, { canaryVersionId: canary.modelVersionId });
      this.logger.warn(
        `KL divergence undefined for fixture ${production.fixtureId}: canary ${canary.modelVersion} assigns zero probability where production does not`,
      );
    }

    const entry: Omit<ShadowLogEntry, 'id' | 'createdAt'> = {
      fixtureId: production.fixtureId,
      productionVersionId: production.modelVersionId,
      canaryVersionId: canary.modelVersionId,
      productionProbabilities: production.probabilities,
      canaryProbabilities: canary.probabilities,
      l1Distance: divergence.l1Distance,
      klDivergence: divergence.klDivergence,
      servedBucket,
    };

    try {
      await withRetry(() => this.shadowLogRepository.insert(entry), {
        attempts: this.writeAttempts,
        delayMs: this.retryDelayMs,
        onAttemptFailed: (error, attempt) => {
          this.metricsService.increment(SHADOW_LOG_WRITE_ERRORS);
          this.logger.warn(`Shadow log write attempt ${attempt}/${this.writeAttempts} failed: ${errorMessage(error)}`);
        },
      });
      this.metricsService.increment(SHADOW_LOG_WRITTEN);
    } catch (error) {
      this.metricsService.increment(SHADOW_LOG_ABANDONED);
      this.logger.error(
        `Abandoned shadow log entry for fixture ${production.fixtureId} after ${this.writeAttempts} attempts: ${errorMessage(error)}`,
      );
    }
  }
}
