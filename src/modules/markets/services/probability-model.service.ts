import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { FixtureSignals } from '../entities/fixture-signals.entity';
import { ModelVersion } from '../../model-registry/entities/model-version.entity';
import { InsufficientInputError } from '../../../common/errors/domain.errors';
import { MARKET_CATALOG, MarketCatalog } from '../catalog/market-catalog';
import {
  ScorelineInputs,
  buildScorelineGrid,
  expectedGoals,
  outcomeConfidence,
  priceMarkets,
  resolveParameters,
  validateInputs,
} from '../scoreline.model';

/**
 * One prediction surface: every catalog market priced by one model version.
 * Timestamps are ISO strings so the value survives a cache round trip unchanged.
 */
export interface MarketProbabilitySurface {
  fixtureId: string;
  modelVersionId: string;
  modelName: string;
  modelVersion: string;
  probabilities: Record<string, number>;
  expectedGoals: { home: number; away: number };
  confidence: number;
  computedAt: string;
  expiresAt: string;
}

@Injectable()
export class ProbabilityModelService {
  private readonly logger = new Logger(ProbabilityModelService.name);
  private readonly catalog: MarketCatalog = MARKET_CATALOG;

  constructor(
    @InjectRepository(FixtureSignals)
    private signalsRepository: Repository<FixtureSignals>,
  ) {}

  async loadSignals(fixtureId: string): Promise<FixtureSignals> {
    const signals = await this.signalsRepository.findOne({ where: { fixtureId } });
    if (!signals) {
      throw new InsufficientInputError(fixtureId);
    }
    return signals;
  }

  getCatalog(): MarketCatalog {
    return this.catalog;
  }

  /**
   * Price the full market catalog for one fixture with one model version.
   * Pure given its arguments: equal signals and version give identical probabilities.
   */
  computeSurface(
    fixtureId: string,
    signals: FixtureSignals | null,
    version: ModelVersion,
    validForSeconds: number,
    now: Date = new Date(),
  ): MarketProbabilitySurface {
    if (!signals) {
      throw new InsufficientInputError(fixtureId);
    }

    const params = resolveParameters(version.parameters);
    const inputs = this.toInputs(signals);
    validateInputs(inputs);

    const rates = expectedGoals(inputs, params);
    const grid = buildScorelineGrid(rates, params);

    if (grid.truncated) {
      this.logger.debug(
        `Fixture ${fixtureId} (${version.version}): ${((1 - grid.rawMass) * 100).toFixed(3)}% of mass beyond ${grid.maxGoals} goals, renormalised`,
      );
    }

    const probabilities = priceMarkets(grid, this.catalog);

    return {
      fixtureId,
      modelVersionId: version.id,
      modelName: version.name,
      modelVersion: version.version,
      probabilities,
      expectedGoals: { home: rates.home, away: rates.away },
      confidence: outcomeConfidence(probabilities.HOME, probabilities.DRAW, probabilities.AWAY),
      computedAt: now.toISOString(),
      expiresAt: new Date(now.getTime() + validForSeconds * 1000).toISOString(),
    };
  }

  // Decimal columns come back from Postgres as strings
  private toInputs(signals: FixtureSignals): ScorelineInputs {
    return {
      homeXgFor: Number(signals.homeXgFor),
      homeXgAgainst: Number(signals.homeXgAgainst),
      awayXgFor: Number(signals.awayXgFor),
      awayXgAgainst: Number(signals.awayXgAgainst),
      homeElo: Number(signals.homeElo),
      awayElo: Number(signals.awayElo),
      refereeBias: Number(signals.refereeBias ?? 0),
      homeForm: signals.homeForm === null ? null : Number(signals.homeForm),
      awayForm: signals.awayForm === null ? null : Number(signals.awayForm),
    };
  }
}
