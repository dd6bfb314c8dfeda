import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import configuration from './config/configuration';
import { CommonModule } from './common/common.module';
import { QueueModule } from './modules/queue/queue.module';
import { MarketsModule } from './modules/markets/markets.module';
import { ModelRegistryModule } from './modules/model-registry/model-registry.module';
import { TrafficModule } from './modules/traffic/traffic.module';
import { PredictionsModule } from './modules/predictions/predictions.module';
import { MlMonitoringModule } from './modules/ml-monitoring/ml-monitoring.module';
import { ArbitrageModule } from './modules/arbitrage/arbitrage.module';
import { FixtureSignals } from './modules/markets/entities/fixture-signals.entity';
import { MarketProbability } from './modules/markets/entities/market-probability.entity';
import { ModelVersion } from './modules/model-registry/entities/model-version.entity';
import { AbConfig } from './modules/traffic/entities/ab-config.entity';
import { AbAssignment } from './modules/traffic/entities/ab-assignment.entity';
import { ShadowLogEntry } from './modules/predictions/entities/shadow-log.entity';
import { CalibrationEvent } from './modules/ml-monitoring/entities/calibration-event.entity';
import { ModelMetricsDaily } from './modules/ml-monitoring/entities/model-metrics-daily.entity';
import { BookmakerOddsQuote } from './modules/arbitrage/entities/bookmaker-odds-quote.entity';
import { ArbitrageOpportunity } from './modules/arbitrage/entities/arbitrage-opportunity.entity';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),

    // Scheduling (cache sweep, calibration rollup, arbitrage scan)
    ScheduleModule.forRoot(),

    // Redis cache and counters - Global module
    CommonModule,

    // Bull Queue (Redis-based background jobs) - Global module
    QueueModule,

    // TypeORM PostgreSQL
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('database.host'),
        port: configService.get<number>('database.port'),
        username: configService.get<string>('database.username'),
        password: configService.get<string>('database.password'),
        database: configService.get<string>('database.name'),
        entities: [
          FixtureSignals,
          MarketProbability,
          ModelVersion,
          AbConfig,
          AbAssignment,
          ShadowLogEntry,
          CalibrationEvent,
          ModelMetricsDaily,
          BookmakerOddsQuote,
          ArbitrageOpportunity,
        ],
        synchronize: configService.get<boolean>('database.synchronize'),
        logging: configService.get<boolean>('database.logging'),
      }),
    }),

    // Feature modules
    MarketsModule,
    ModelRegistryModule,
    TrafficModule,
    PredictionsModule,
    MlMonitoringModule,
    ArbitrageModule,
  ],
})
export class AppModule { }
