import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { MARKET_PROBABILITY_WRITE_ERRORS, PredictionService } from './prediction.service';
import { PredictionCacheService } from './prediction-cache.service';
import { SHADOW_CANARY_ERRORS, ShadowEvaluatorService } from './shadow-evaluator.service';
import { ShadowLogQueueService } from './shadow-log-queue.service';
import { ShadowLogEntry } from '../entities/shadow-log.entity';
import { MarketProbability } from '../../markets/entities/market-probability.entity';
import { FixtureSignals } from '../../markets/entities/fixture-signals.entity';
import { MarketProbabilitySurface, ProbabilityModelService } from '../../markets/services/probability-model.service';
import { ModelRegistryService } from '../../model-registry/services/model-registry.service';
import { ModelVersion } from '../../model-registry/entities/model-version.entity';
import { TrafficSplitterService } from '../../traffic/services/traffic-splitter.service';
import { Bucket } from '../../traffic/entities/ab-assignment.entity';
import { MetricsService } from '../../../common/services/metrics.service';
import { InsufficientInputError, ModelNotFoundError } from '../../../common/errors/domain.errors';

describe('PredictionService', () => {
  let service: PredictionService;
  let metrics: MetricsService;

  const production = Object.assign(new ModelVersion(), {
    id: 'aaaaaaaa-0000-4000-8000-000000000001',
    name: 'match_outcome',
    version: 'dc-1',
    parameters: {},
    isActive: true,
  });
  const canary = Object.assign(new ModelVersion(), {
    id: 'aaaaaaaa-0000-4000-8000-000000000002',
    name: 'match_outcome',
    version: 'dc-2',
    parameters: { rho: -0.12, homeAdvantage: 1.15 },
    isActive: false,
  });

  const signals = Object.assign(new FixtureSignals(), {
    fixtureId: 'fx-1',
    kickoffAt: new Date('2024-05-01T18:00:00Z'),
    homeXgFor: 1.65,
    homeXgAgainst: 1.05,
    awayXgFor: 1.2,
    awayXgAgainst: 1.4,
    homeElo: 1620,
    awayElo: 1540,
    refereeBias: 0,
    homeForm: 2.1,
    awayForm: null,
    weather: null,
  });

  const noCanary = { key: 'predictions.canary', canaryPercentage: 0, canaryVersionId: null };
  const withCanary = { key: 'predictions.canary', canaryPercentage: 50, canaryVersionId: canary.id };

  const mockSignalsRepository = { findOne: jest.fn() };
  const mockMarketProbabilityRepository = { insert: jest.fn(), find: jest.fn() };
  const mockRegistry = { getActive: jest.fn(), findById: jest.fn() };
  const mockSplitter = { getConfig: jest.fn(), assign: jest.fn() };
  const mockShadowQueue = { enqueue: jest.fn() };

  // Cache stand-in keyed like the real one, without expiry
  const cached = new Map<string, MarketProbabilitySurface>();
  const mockCache = {
    getTtlSeconds: jest.fn(() => 60),
    get: jest.fn(async (fixtureId: string, modelVersionId: string) => {
      const surface = cached.get(`${fixtureId}:${modelVersionId}`);
      return surface ? { status: 'hit', surface } : { status: 'miss' };
    }),
    put: jest.fn(async (surface: MarketProbabilitySurface) => {
      cached.set(`${surface.fixtureId}:${surface.modelVersionId}`, surface);
      return true;
    }),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PredictionService,
        ProbabilityModelService,
        ShadowEvaluatorService,
        MetricsService,
        { provide: getRepositoryToken(MarketProbability), useValue: mockMarketProbabilityRepository },
        { provide: getRepositoryToken(FixtureSignals), useValue: mockSignalsRepository },
        { provide: getRepositoryToken(ShadowLogEntry), useValue: { find: jest.fn() } },
        { provide: ModelRegistryService, useValue: mockRegistry },
        { provide: TrafficSplitterService, useValue: mockSplitter },
        { provide: PredictionCacheService, useValue: mockCache },
        { provide: ShadowLogQueueService, useValue: mockShadowQueue },
        { provide: ConfigService, useValue: { get: jest.fn(() => 'match_outcome') } },
      ],
    }).compile();

    service = module.get<PredictionService>(PredictionService);
    metrics = module.get<MetricsService>(MetricsService);

    jest.clearAllMocks();
    cached.clear();
    mockSignalsRepository.findOne.mockResolvedValue(signals);
    mockMarketProbabilityRepository.insert.mockResolvedValue({});
    mockRegistry.getActive.mockResolvedValue(production);
    mockRegistry.findById.mockResolvedValue(canary);
  });

  describe('getMarketProbabilities', () => {
    it('should serve production to everyone when no canary is configured', async () => {
      mockSplitter.getConfig.mockResolvedValue(noCanary);

      const result = await service.getMarketProbabilities('fx-1', 'device-1');

      expect(mockRegistry.getActive).toHaveBeenCalledWith('match_outcome');
      expect(mockSplitter.assign).not.toHaveBeenCalled();
      expect(result.modelVersionId).toBe(production.id);
      expect(result.routing).toEqual({ bucket: Bucket.A, productionVersionId: production.id, canaryVersionId: null });
      expect(mockMarketProbabilityRepository.insert).toHaveBeenCalledTimes(1);
      expect(mockShadowQueue.enqueue).not.toHaveBeenCalled();
    });

    it('should serve the canary to a bucket B device and shadow-log both surfaces', async () => {
      mockSplitter.getConfig.mockResolvedValue(withCanary);
      mockSplitter.assign.mockResolvedValue(Bucket.B);

      const result = await service.getMarketProbabilities('fx-1', 'device-1');

      expect(mockSplitter.assign).toHaveBeenCalledWith('device-1', withCanary);
      expect(result.modelVersionId).toBe(canary.id);
      expect(result.routing).toEqual({ bucket: Bucket.B, productionVersionId: production.id, canaryVersionId: canary.id });

      // Both versions price from one signals read
      expect(mockSignalsRepository.findOne).toHaveBeenCalledTimes(1);
      expect(mockMarketProbabilityRepository.insert).toHaveBeenCalledTimes(2);

      expect(mockShadowQueue.enqueue).toHaveBeenCalledTimes(1);
      const [comparison] = mockShadowQueue.enqueue.mock.calls[0];
      expect(comparison.production.modelVersionId).toBe(production.id);
      expect(comparison.canary.modelVersionId).toBe(canary.id);
      expect(comparison.servedBucket).toBe(Bucket.B);
    });

    it('should serve production to an anonymous caller without storing an assignment', async () => {
      mockSplitter.getConfig.mockResolvedValue(withCanary);

      const result = await service.getMarketProbabilities('fx-1');

      expect(mockSplitter.assign).not.toHaveBeenCalled();
      expect(result.modelVersionId).toBe(production.id);
      expect(result.routing).toEqual({ bucket: Bucket.A, productionVersionId: production.id, canaryVersionId: canary.id });
      expect(mockShadowQueue.enqueue).toHaveBeenCalledTimes(1);
    });

    it('should ignore a canary that points at the production version', async () => {
      mockSplitter.getConfig.mockResolvedValue({ ...withCanary, canaryVersionId: production.id });

      const result = await service.getMarketProbabilities('fx-1', 'device-1');

      expect(mockRegistry.findById).not.toHaveBeenCalled();
      expect(result.routing.canaryVersionId).toBeNull();
    });

    it('should fall back to production when the canary cannot be loaded', async () => {
      mockSplitter.getConfig.mockResolvedValue(withCanary);
      mockRegistry.findById.mockRejectedValue(new ModelNotFoundError(canary.id));

      const result = await service.getMarketProbabilities('fx-1', 'device-1');

      expect(mockSplitter.assign).not.toHaveBeenCalled();
      expect(result.modelVersionId).toBe(production.id);
      expect(result.routing.canaryVersionId).toBeNull();
    });

    it('should keep serving production when the canary parameters are invalid', async () => {
      mockSplitter.getConfig.mockResolvedValue(withCanary);
      mockSplitter.assign.mockResolvedValue(Bucket.A);
      mockRegistry.findById.mockResolvedValue(Object.assign(new ModelVersion(), { ...canary, parameters: { rho: 0.9 } }));

      const result = await service.getMarketProbabilities('fx-1', 'device-1');

      expect(result.modelVersionId).toBe(production.id);
      expect(result.routing).toEqual({ bucket: Bucket.A, productionVersionId: production.id, canaryVersionId: canary.id });
      expect(mockMarketProbabilityRepository.insert).toHaveBeenCalledTimes(1);
      expect(mockShadowQueue.enqueue).not.toHaveBeenCalled();
      expect(metrics.get(SHADOW_CANARY_ERRORS, { canaryVersionId: canary.id })).toBe(1);
    });

    it('should answer a repeated request from the cache with the same probabilities', async () => {
      mockSplitter.getConfig.mockResolvedValue(noCanary);

      const first = await service.getMarketProbabilities('fx-1', 'device-1');
      const second = await service.getMarketProbabilities('fx-1', 'device-1');

      expect(second).toEqual(first);
      expect(mockSignalsRepository.findOne).toHaveBeenCalledTimes(1);
      expect(mockMarketProbabilityRepository.insert).toHaveBeenCalledTimes(1);
    });

    it('should fail with InsufficientInput when the fixture has no signals', async () => {
      mockSplitter.getConfig.mockResolvedValue(noCanary);
      mockSignalsRepository.findOne.mockResolvedValue(null);

      await expect(service.getMarketProbabilities('fx-unknown')).rejects.toBeInstanceOf(InsufficientInputError);
      expect(mockCache.put).not.toHaveBeenCalled();
    });

    it('should still answer when the surface cannot be stored', async () => {
      mockSplitter.getConfig.mockResolvedValue(noCanary);
      mockMarketProbabilityRepository.insert.mockRejectedValue(new Error('database down'));

      const result = await service.getMarketProbabilities('fx-1');

      expect(result.modelVersionId).toBe(production.id);
      expect(metrics.get(MARKET_PROBABILITY_WRITE_ERRORS)).toBe(1);
    });
  });

  describe('getHistory', () => {
    it('should return stored surfaces newest first', async () => {
      mockMarketProbabilityRepository.find.mockResolvedValue([]);

      await service.getHistory('fx-1', 5);

      expect(mockMarketProbabilityRepository.find).toHaveBeenCalledWith({
        where: { fixtureId: 'fx-1' },
        order: { computedAt: 'DESC' },
        take: 5,
      });
    });
  });
});
