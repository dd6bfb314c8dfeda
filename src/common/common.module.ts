import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CacheService } from './services/cache.service';
import { MetricsService } from './services/metrics.service';
import { MetricsController } from './controllers/metrics.controller';

@Global()
@Module({
  imports: [ConfigModule],
  controllers: [MetricsController],
  providers: [CacheService, MetricsService],
  exports: [CacheService, MetricsService],
})
export class CommonModule {}
