import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { CACHE_READ_ERRORS, CACHE_WRITE_ERRORS, PredictionCacheService, cacheKey } from './prediction-cache.service';
import { CacheService } from '../../../common/services/cache.service';
import { MetricsService } from '../../../common/services/metrics.service';
import { MarketProbabilitySurface } from '../../markets/services/probability-model.service';

/** Redis stand-in: a map of serialised values, with trailing-wildcard patterns. */
class InMemoryCache {
  readonly entries = new Map<string, string>();

  get = jest.fn(async (key: string) => {
    const value = this.entries.get(key);
    return value === undefined ? null : JSON.parse(value);
  });

  set = jest.fn(async (key: string, value: unknown) => {
    this.entries.set(key, JSON.stringify(value));
  });

  delete = jest.fn(async (key: string) => {
    this.entries.delete(key);
  });

  keys = jest.fn(async (pattern: string) => {
    const prefix = pattern.replace(/\*$/, '');
    return Array.from(this.entries.keys()).filter(key => key.startsWith(prefix));
  });

  deletePattern = jest.fn(async (pattern: string) => {
    const matching = await this.keys(pattern);
    matching.forEach(key => this.entries.delete(key));
    return matching.length;
  });
}

describe('PredictionCacheService', () => {
  let service: PredictionCacheService;
  let cache: InMemoryCache;
  let metrics: MetricsService;

  const t0 = Date.parse('2024-05-01T12:00:00.000Z');

  function surface(fixtureId: string, modelVersionId: string, ttlSeconds: number = 60): MarketProbabilitySurface {
    return {
      fixtureId,
      modelVersionId,
      modelName: 'match_outcome',
      modelVersion: 'dc-1',
      probabilities: { HOME: 0.5, DRAW: 0.3, AWAY: 0.2 },
      expectedGoals: { home: 1.5, away: 1.1 },
      confidence: 0.15,
      computedAt: new Date(t0).toISOString(),
      expiresAt: new Date(t0 + ttlSeconds * 1000).toISOString(),
    };
  }

  const settings: Record<string, number> = { 'cache.predictionTtlSeconds': 60, 'cache.retryDelayMs': 0 };

  beforeEach(async () => {
    cache = new InMemoryCache();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PredictionCacheService,
        MetricsService,
        { provide: CacheService, useValue: cache },
        { provide: ConfigService, useValue: { get: jest.fn((key: string) => settings[key]) } },
      ],
    }).compile();

    service = module.get<PredictionCacheService>(PredictionCacheService);
    metrics = module.get<MetricsService>(MetricsService);

    jest.useFakeTimers({ now: t0 });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should key entries by fixture and model version', () => {
    expect(cacheKey('fx-1', 'v-1')).toBe('prediction:fx-1:v-1');
    expect(service.getTtlSeconds()).toBe(60);
  });

  it('should serve an entry until its expiry and evict it afterwards', async () => {
    await expect(service.put(surface('fx-1', 'v-1'))).resolves.toBe(true);
    expect(cache.set).toHaveBeenCalledWith('prediction:fx-1:v-1', surface('fx-1', 'v-1'), 60);

    jest.setSystemTime(t0 + 59_000);
    await expect(service.get('fx-1', 'v-1')).resolves.toEqual({ status: 'hit', surface: surface('fx-1', 'v-1') });

    jest.setSystemTime(t0 + 61_000);
    await expect(service.get('fx-1', 'v-1')).resolves.toEqual({ status: 'miss' });
    expect(cache.delete).toHaveBeenCalledWith('prediction:fx-1:v-1');
    expect(cache.entries.has('prediction:fx-1:v-1')).toBe(false);
  });

  it('should miss on the boundary instant', async () => {
    await service.put(surface('fx-1', 'v-1'));

    jest.setSystemTime(t0 + 60_000);
    await expect(service.get('fx-1', 'v-1')).resolves.toEqual({ status: 'miss' });
  });

  it('should not share entries between model versions', async () => {
    await service.put(surface('fx-1', 'v-1'));

    await expect(service.get('fx-1', 'v-2')).resolves.toEqual({ status: 'miss' });
  });

  it('should count a write that fails every attempt', async () => {
    cache.set.mockRejectedValue(new Error('redis unavailable'));

    await expect(service.put(surface('fx-1', 'v-1'))).resolves.toBe(false);
    expect(cache.set).toHaveBeenCalledTimes(3);
    expect(metrics.get(CACHE_WRITE_ERRORS)).toBe(1);
  });

  it('should skip writing a surface that has already expired', async () => {
    jest.setSystemTime(t0 + 120_000);

    await expect(service.put(surface('fx-1', 'v-1'))).resolves.toBe(false);
    expect(cache.set).not.toHaveBeenCalled();
  });

  it('should treat a read failure as a miss', async () => {
    cache.get.mockRejectedValueOnce(new Error('redis unavailable'));

    await expect(service.get('fx-1', 'v-1')).resolves.toEqual({ status: 'miss' });
    expect(metrics.get(CACHE_READ_ERRORS)).toBe(1);
  });

  it('should sweep only expired entries', async () => {
    await service.put(surface('fx-1', 'v-1', 30));
    await service.put(surface('fx-2', 'v-1', 90));

    jest.setSystemTime(t0 + 45_000);

    await expect(service.sweepExpired()).resolves.toBe(1);
    expect(Array.from(cache.entries.keys())).toEqual(['prediction:fx-2:v-1']);
  });

  it('should invalidate every version of a fixture', async () => {
    await service.put(surface('fx-1', 'v-1'));
    await service.put(surface('fx-1', 'v-2'));
    await service.put(surface('fx-2', 'v-1'));

    await expect(service.invalidateFixture('fx-1')).resolves.toBe(2);
    expect(Array.from(cache.entries.keys())).toEqual(['prediction:fx-2:v-1']);
  });
});
