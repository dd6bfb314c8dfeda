import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { CacheService } from '../../../common/services/cache.service';
import { MetricsService } from '../../../common/services/metrics.service';
import { errorMessage, withRetry } from '../../../common/utils/retry';
import { MarketProbabilitySurface } from '../../markets/services/probability-model.service';

export type CacheLookup =
  | { status: 'hit'; surface: MarketProbabilitySurface }
  | { status: 'miss' };

export const CACHE_WRITE_ERRORS = 'prediction_cache_write_errors_total';
export const CACHE_READ_ERRORS = 'prediction_cache_read_errors_total';

const KEY_PREFIX = 'prediction:';

/**
 * Surfaces keyed by fixture and model version. An entry is served only while
 * now < expiresAt; Redis expiry is a backstop, the timestamp check is authoritative.
 */
@Injectable()
export class PredictionCacheService {
  private readonly logger = new Logger(PredictionCacheService.name);
  private readonly ttlSeconds: number;
  private readonly writeAttempts: number;
  private readonly retryDelayMs: number;

  constructor(
    private cacheService: CacheService,
    private metricsService: MetricsService,
    private configService: ConfigService,
  ) {
    this.ttlSeconds = this.configService.get<number>('cache.predictionTtlSeconds') ?? 60;
    this.writeAttempts = this.configService.get<number>('cache.writeAttempts') ?? 3;
    this.retryDelayMs = this.configService.get<number>('cache.retryDelayMs') ?? 50;
  }

  getTtlSeconds(): number {
    return this.ttlSeconds;
  }

  async get(fixtureId: string, modelVersionId: string): Promise<CacheLookup> {
    const key = cacheKey(fixtureId, modelVersionId);

    let surface: MarketProbabilitySurface | null;
    try {
      surface = await this.cacheService.get<MarketProbabilitySurface>(key);
    } catch (error) {
      this.metricsService.increment(CACHE_READ_ERRORS);
      this.logger.warn(`Cache read failed for ${key}: ${errorMessage(error)}`);
      return { status: 'miss' };
    }

    if (!surface) {
      return { status: 'miss' };
    }

    if (isExpired(surface, Date.now())) {
      await this.evict(key);
      return { status: 'miss' };
    }

    return { status: 'hit', surface };
  }

  /**
   * Store a surface until its expiresAt. Failures are retried, then counted; the
   * caller's response never depends on the write.
   */
  async put(surface: MarketProbabilitySurface): Promise<boolean> {
    const key = cacheKey(surface.fixtureId, surface.modelVersionId);
    const remainingSeconds = Math.ceil((Date.parse(surface.expiresAt) - Date.now()) / 1000);

    if (remainingSeconds <= 0) {
      return false;
    }

    try {
      await withRetry(() => this.cacheService.set(key, surface, remainingSeconds), {
        attempts: this.writeAttempts,
        delayMs: this.retryDelayMs,
        onAttemptFailed: (error, attempt) =>
          this.logger.warn(`Cache write attempt ${attempt}/${this.writeAttempts} for ${key} failed: ${errorMessage(error)}`),
      });
      return true;
    } catch (error) {
      this.metricsService.increment(CACHE_WRITE_ERRORS);
      this.logger.error(`Giving up on cache write for ${key}: ${errorMessage(error)}`);
      return false;
    }
  }

  async invalidateFixture(fixtureId: string): Promise<number> {
    return this.cacheService.deletePattern(`${KEY_PREFIX}${fixtureId}:*`);
  }

  /**
   * Remove entries whose expiresAt has passed
   */
  @Cron(CronExpression.EVERY_MINUTE)
  async sweepExpired(): Promise<number> {
    const now = Date.now();
    let removed = 0;

    try {
      const keys = await this.cacheService.keys(`${KEY_PREFIX}*`);

      for (const key of keys) {
        const surface = await this.cacheService.get<MarketProbabilitySurface>(key);
        if (surface && isExpired(surface, now)) {
          await this.cacheService.delete(key);
          removed++;
        }
      }
    } catch (error) {
      this.logger.warn(`Cache sweep stopped early: ${errorMessage(error)}`);
    }

    if (removed > 0) {
      this.logger.debug(`Swept ${removed} expired prediction entries`);
    }
    return removed;
  }

  private async evict(key: string): Promise<void> {
    try {
      await this.cacheService.delete(key);
    } catch (error) {
      this.logger.warn(`Failed to evict ${key}: ${errorMessage(error)}`);
    }
  }
}

export function cacheKey(fixtureId: string, modelVersionId: string): string {
  return `${KEY_PREFIX}${fixtureId}:${modelVersionId}`;
}

function isExpired(surface: MarketProbabilitySurface, nowMs: number): boolean {
  const expiresAt = Date.parse(surface.expiresAt);
  return !Number.isFinite(expiresAt) || nowMs >= expiresAt;
}
