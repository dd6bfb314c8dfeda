import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { AbConfig } from '../entities/ab-config.entity';
import { AbAssignment, Bucket } from '../entities/ab-assignment.entity';
import { bucketFor } from '../bucket-hash';
import { ModelRegistryService } from '../../model-registry/services/model-registry.service';

export interface RoutingPolicy {
  key: string;
  canaryPercentage: number;
  canaryVersionId: string | null;
}

@Injectable()
export class TrafficSplitterService {
  private readonly logger = new Logger(TrafficSplitterService.name);
  private readonly configKey: string;

  constructor(
    @InjectRepository(AbConfig)
    private abConfigRepository: Repository<AbConfig>,
    @InjectRepository(AbAssignment)
    private assignmentRepository: Repository<AbAssignment>,
    private modelRegistryService: ModelRegistryService,
    private configService: ConfigService,
  ) {
    this.configKey = this.configService.get<string>('abTesting.configKey') || 'predictions.canary';
  }

  /**
   * Current canary policy; without a stored row nothing is routed to a canary
   */
  async getConfig(): Promise<RoutingPolicy> {
    const row = await this.abConfigRepository.findOne({ where: { key: this.configKey } });

    return {
      key: this.configKey,
      canaryPercentage: row?.canaryPercentage ?? 0,
      canaryVersionId: row?.canaryVersionId ?? null,
    };
  }

  async setCanary(canaryVersionId: string | null, canaryPercentage: number): Promise<RoutingPolicy> {
    if (!Number.isInteger(canaryPercentage) || canaryPercentage < 0 || canaryPercentage > 100) {
      throw new BadRequestException(`canaryPercentage must be an integer in 0..100, got ${canaryPercentage}`);
    }

    if (canaryVersionId !== null) {
      const version = await this.modelRegistryService.findById(canaryVersionId);
      if (version.isActive) {
        throw new BadRequestException(`${version.name}@${version.version} is already the active version`);
      }
    }

    await this.abConfigRepository.save({
      key: this.configKey,
      canaryPercentage,
      canaryVersionId,
    });

    this.logger.log(
      `Canary policy ${this.configKey}: ${canaryVersionId ?? 'none'} at ${canaryPercentage}%`,
    );

    return { key: this.configKey, canaryPercentage, canaryVersionId };
  }

  /**
   * Sticky bucket for a device.
   *
   * The first computation is stored with insert-if-absent; afterwards the stored bucket
   * is returned even if the percentage has changed since.
   */
  async assign(deviceId: string, config: RoutingPolicy): Promise<Bucket> {
    const id = deviceId.trim();
    if (id.length === 0) {
      throw new BadRequestException('deviceId must not be empty');
    }

    const existing = await this.assignmentRepository.findOne({ where: { deviceId: id } });
    if (existing) {
      return existing.bucket;
    }

    const bucket = bucketFor(id, config.canaryPercentage);

    await this.assignmentRepository
      .createQueryBuilder()
      .insert()
      .into(AbAssignment)
      .values({ deviceId: id, bucket, canaryPercentage: config.canaryPercentage })
      .orIgnore()
      .execute();

    // A concurrent first request may have inserted before us; its row is authoritative
    const stored = await this.assignmentRepository.findOne({ where: { deviceId: id } });
    return stored?.bucket ?? bucket;
  }

  async clearAssignment(deviceId: string): Promise<boolean> {
    const result = await this.assignmentRepository.delete({ deviceId: deviceId.trim() });
    return (result.affected ?? 0) > 0;
  }

  async clearAll(): Promise<number> {
    const result = await this.assignmentRepository.createQueryBuilder().delete().from(AbAssignment).execute();
    this.logger.warn(`Cleared ${result.affected ?? 0} bucket assignments`);
    return result.affected ?? 0;
  }
}
