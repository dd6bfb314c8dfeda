import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AbConfig } from './entities/ab-config.entity';
import { AbAssignment } from './entities/ab-assignment.entity';
import { TrafficSplitterService } from './services/traffic-splitter.service';
import { TrafficController } from './controllers/traffic.controller';
import { ModelRegistryModule } from '../model-registry/model-registry.module';

@Module({
  imports: [TypeOrmModule.forFeature([AbConfig, AbAssignment]), ModelRegistryModule],
  controllers: [TrafficController],
  providers: [TrafficSplitterService],
  exports: [TrafficSplitterService],
})
export class TrafficModule {}
