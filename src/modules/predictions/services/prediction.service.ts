import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { MarketProbability } from '../../markets/entities/market-probability.entity';
import { FixtureSignals } from '../../markets/entities/fixture-signals.entity';
import {
  MarketProbabilitySurface,
  ProbabilityModelService,
} from '../../markets/services/probability-model.service';
import { ModelRegistryService } from '../../model-registry/services/model-registry.service';
import { ModelVersion } from '../../model-registry/entities/model-version.entity';
import { RoutingPolicy, TrafficSplitterService } from '../../traffic/services/traffic-splitter.service';
import { Bucket } from '../../traffic/entities/ab-assignment.entity';
import { PredictionCacheService } from './prediction-cache.service';
import { ShadowEvaluatorService } from './shadow-evaluator.service';
import { MetricsService } from '../../../common/services/metrics.service';
import { errorMessage } from '../../../common/utils/retry';

export interface PredictionRouting {
  bucket: Bucket;
  productionVersionId: string;
  canaryVersionId: string | null;
}

export interface PredictionResponse extends MarketProbabilitySurface {
  routing: PredictionRouting;
}

export const MARKET_PROBABILITY_WRITE_ERRORS = 'market_probability_write_errors_total';

@Injectable()
export class PredictionService {
  private readonly logger = new Logger(PredictionService.name);
  private readonly modelName: string;

  constructor(
    @InjectRepository(MarketProbability)
    private marketProbabilityRepository: Repository<MarketProbability>,
    private probabilityModelService: ProbabilityModelService,
    private modelRegistryService: ModelRegistryService,
    private trafficSplitterService: TrafficSplitterService,
    private predictionCacheService: PredictionCacheService,
    private shadowEvaluatorService: ShadowEvaluatorService,
    private metricsService: MetricsService,
    private configService: ConfigService,
  ) {
    this.modelName = this.configService.get<string>('models.defaultName') || 'match_outcome';
  }

  /**
   * Market probabilities for a fixture, routed by the caller's sticky bucket.
   *
   * Without a deviceId the caller is served production and no assignment is stored.
   */
  async getMarketProbabilities(fixtureId: string, deviceId?: string): Promise<PredictionResponse> {
    // 1. Resolve the routing policy and both model versions
    const policy = await this.trafficSplitterService.getConfig();
    const production = await this.modelRegistryService.getActive(this.modelName);
    const canary = await this.resolveCanary(policy, production);

    // 2. Bucket only while a canary is running
    const bucket = canary && deviceId ? await this.trafficSplitterService.assign(deviceId, policy) : Bucket.A;

    // 3. Signals are loaded at most once per request, and only on a cache miss
    let signals: Promise<FixtureSignals> | undefined;
    const loadSignals = () => (signals ??= this.probabilityModelService.loadSignals(fixtureId));

    const evaluation = await this.shadowEvaluatorService.evaluate({
      bucket,
      production,
      canary,
      resolve: (version) => this.resolveSurface(fixtureId, version, loadSignals),
    });

    return {
      ...evaluation.served,
      routing: {
        bucket: evaluation.servedBucket,
        productionVersionId: production.id,
        canaryVersionId: canary?.id ?? null,
      },
    };
  }

  /**
   * Get the most recent stored surfaces for a fixture
   */
  async getHistory(fixtureId: string, limit: number = 20): Promise<MarketProbability[]> {
    return this.marketProbabilityRepository.find({
      where: { fixtureId },
      order: { computedAt: 'DESC' },
      take: Math.min(Math.max(1, limit), 200),
    });
  }

  private async resolveCanary(policy: RoutingPolicy, production: ModelVersion): Promise<ModelVersion | null> {
    if (!policy.canaryVersionId || policy.canaryVersionId === production.id) {
      return null;
    }

    try {
      return await this.modelRegistryService.findById(policy.canaryVersionId);
    } catch (error) {
      this.logger.warn(`Canary ${policy.canaryVersionId} unavailable, serving production only: ${errorMessage(error)}`);
      return null;
    }
  }

  private async resolveSurface(
    fixtureId: string,
    version: ModelVersion,
    loadSignals: () => Promise<FixtureSignals>,
  ): Promise<MarketProbabilitySurface> {
    const cached = await this.predictionCacheService.get(fixtureId, version.id);
    if (cached.status === 'hit') {
      return cached.surface;
    }

    const signals = await loadSignals();
    const surface = this.probabilityModelService.computeSurface(
      fixtureId,
      signals,
      version,
      this.predictionCacheService.getTtlSeconds(),
    );

    await Promise.all([this.predictionCacheService.put(surface), this.persistSurface(surface)]);

    return surface;
  }

  private async persistSurface(surface: MarketProbabilitySurface): Promise<void> {
    try {
      await this.marketProbabilityRepository.insert({
        fixtureId: surface.fixtureId,
        modelVersionId: surface.modelVersionId,
        modelName: surface.modelName,
        modelVersion: surface.modelVersion,
        probabilities: surface.probabilities,
        expectedHomeGoals: surface.expectedGoals.home,
        expectedAwayGoals: surface.expectedGoals.away,
        confidence: surface.confidence,
        computedAt: new Date(surface.computedAt),
        expiresAt: new Date(surface.expiresAt),
      });
    } catch (error) {
      this.metricsService.increment(MARKET_PROBABILITY_WRITE_ERRORS);
      this.logger.error(`Failed to store surface for ${surface.fixtureId}: ${errorMessage(error)}`);
    }
  }
}
