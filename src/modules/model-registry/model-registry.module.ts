import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ModelVersion } from './entities/model-version.entity';
import { ModelRegistryService } from './services/model-registry.service';
import { ModelRegistryController } from './controllers/model-registry.controller';

@Module({
  imports: [TypeOrmModule.forFeature([ModelVersion])],
  controllers: [ModelRegistryController],
  providers: [ModelRegistryService],
  exports: [ModelRegistryService],
})
export class ModelRegistryModule {}
