import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PredictionService } from './services/prediction.service';
import { PredictionCacheService } from './services/prediction-cache.service';
import { ShadowEvaluatorService } from './services/shadow-evaluator.service';
import { ShadowLogQueueService } from './services/shadow-log-queue.service';
import { PredictionController } from './controllers/prediction.controller';
import { ShadowLogEntry } from './entities/shadow-log.entity';
import { MarketsModule } from '../markets/markets.module';
import { ModelRegistryModule } from '../model-registry/model-registry.module';
import { TrafficModule } from '../traffic/traffic.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([ShadowLogEntry]),
    MarketsModule,
    ModelRegistryModule,
    TrafficModule,
  ],
  controllers: [PredictionController],
  providers: [
    PredictionService,
    PredictionCacheService,
    ShadowEvaluatorService,
    ShadowLogQueueService,
  ],
  exports: [PredictionService, PredictionCacheService],
})
export class PredictionsModule {}
