import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { FixtureSignals } from './entities/fixture-signals.entity';
import { MarketProbability } from './entities/market-probability.entity';
import { ProbabilityModelService } from './services/probability-model.service';

@Module({
  imports: [TypeOrmModule.forFeature([FixtureSignals, MarketProbability])],
  providers: [ProbabilityModelService],
  exports: [ProbabilityModelService, TypeOrmModule],
})
export class MarketsModule {}
