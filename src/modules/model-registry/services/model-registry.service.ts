import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { ModelVersion } from '../entities/model-version.entity';
import { AbConfig } from '../../traffic/entities/ab-config.entity';
import { RegisterModelDto } from '../dto/register-model.dto';
import { ModelNotFoundError } from '../../../common/errors/domain.errors';
import { resolveParameters } from '../../markets/scoreline.model';

@Injectable()
export class ModelRegistryService {
  private readonly logger = new Logger(ModelRegistryService.name);

  constructor(
    @InjectRepository(ModelVersion)
    private modelVersionRepository: Repository<ModelVersion>,
    private dataSource: DataSource,
  ) {}

  /**
   * Get the single active version of a model
   */
  async getActive(modelName: string): Promise<ModelVersion> {
    const active = await this.modelVersionRepository.findOne({
      where: { name: modelName, isActive: true },
    });

    if (!active) {
      throw new ModelNotFoundError(`${modelName} (no active version)`);
    }

    return active;
  }

  async findById(versionId: string): Promise<ModelVersion> {
    const version = await this.modelVersionRepository.findOne({
      where: { id: versionId },
    });

    if (!version) {
      throw new ModelNotFoundError(versionId);
    }

    return version;
  }

  async list(modelName: string): Promise<ModelVersion[]> {
    return this.modelVersionRepository.find({
      where: { name: modelName },
      order: { createdAt: 'DESC' },
    });
  }

  /**
   * Register a new, inactive model version
   */
  async register(dto: RegisterModelDto): Promise<ModelVersion> {
    // Rejects out-of-range parameters before anything is stored
    resolveParameters(dto.parameters);

    const existing = await this.modelVersionRepository.findOne({
      where: { name: dto.name, version: dto.version },
    });
    if (existing) {
      throw new ConflictException(`Model ${dto.name} already has version ${dto.version}`);
    }

    const entity = this.modelVersionRepository.create({
      name: dto.name,
      version: dto.version,
      trainedAt: dto.trainedAt,
      accuracy: dto.accuracy ?? null,
      logLoss: dto.logLoss ?? null,
      brierScore: dto.brierScore ?? null,
      parameters: dto.parameters ?? {},
      isActive: false,
      promotedAt: null,
    });

    const saved = await this.modelVersionRepository.save(entity);
    this.logger.log(`Registered ${saved.name}@${saved.version} (${saved.id})`);

    return saved;
  }

  /**
   * Make a version the active one for its model name.
   *
   * The model's rows are locked for the whole swap, so concurrent promotions serialise
   * and the last one to commit wins.
   */
  async promote(versionId: string): Promise<ModelVersion> {
    const promoted = await this.dataSource.transaction(async (manager) => {
      const target = await manager.getRepository(ModelVersion).findOne({
        where: { id: versionId },
      });
      if (!target) {
        throw new ModelNotFoundError(versionId);
      }

      await this.lockModelRows(manager, target.name);
      return this.activate(manager, target);
    });

    this.logger.log(`Promoted ${promoted.name}@${promoted.version}`);
    return promoted;
  }

  /**
   * Reactivate the most recently promoted version other than the current one
   */
  async rollback(modelName: string): Promise<ModelVersion> {
    const restored = await this.dataSource.transaction(async (manager) => {
      const rows = await this.lockModelRows(manager, modelName);

      const previous = rows
        .filter(row => !row.isActive && row.promotedAt !== null)
        .sort((a, b) => promotedAtMs(b) - promotedAtMs(a))[0];

      if (!previous) {
        throw new ModelNotFoundError(`${modelName} (no previously promoted version)`);
      }

      return this.activate(manager, previous);
    });

    this.logger.warn(`Rolled back ${modelName} to ${restored.version}`);
    return restored;
  }

  private async lockModelRows(manager: EntityManager, modelName: string): Promise<ModelVersion[]> {
    return manager
      .getRepository(ModelVersion)
      .createQueryBuilder('mv')
      .setLock('pessimistic_write')
      .where('mv.name = :modelName', { modelName })
      .getMany();
  }

  private async activate(manager: EntityManager, target: ModelVersion): Promise<ModelVersion> {
    const versions = manager.getRepository(ModelVersion);
    const promotedAt = new Date();

    await versions.update({ name: target.name, isActive: true }, { isActive: false });
    await versions.update({ id: target.id }, { isActive: true, promotedAt });

    // A version that becomes production stops being the canary
    await manager.getRepository(AbConfig).update({ canaryVersionId: target.id }, { canaryVersionId: null });

    return { ...target, isActive: true, promotedAt };
  }
}

function promotedAtMs(version: ModelVersion): number {
  return version.promotedAt ? new Date(version.promotedAt).getTime() : 0;
}
