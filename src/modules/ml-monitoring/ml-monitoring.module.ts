import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CalibrationEvent } from './entities/calibration-event.entity';
import { ModelMetricsDaily } from './entities/model-metrics-daily.entity';
import { CalibrationTrackerService } from './services/calibration-tracker.service';
import { CalibrationController } from './controllers/calibration.controller';
import { CalibrationProcessor } from '../queue/processors/calibration.processor';
import { MarketsModule } from '../markets/markets.module';
import { ModelRegistryModule } from '../model-registry/model-registry.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([CalibrationEvent, ModelMetricsDaily]),
    MarketsModule,
    ModelRegistryModule,
  ],
  controllers: [CalibrationController],
  providers: [CalibrationTrackerService, CalibrationProcessor],
  exports: [CalibrationTrackerService],
})
export class MlMonitoringModule {}
