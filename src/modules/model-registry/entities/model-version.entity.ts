import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
  Unique,
} from 'typeorm';
import type { ScorelineModelParameters } from '../../markets/scoreline.model';

@Entity('model_versions')
@Unique(['name', 'version'])
// At most one active row per model name
@Index('uq_model_versions_active_name', ['name'], { unique: true, where: '"isActive" = true' })
export class ModelVersion {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar' })
  name!: string;

  @Column({ type: 'varchar' })
  version!: string;

  @Column({ type: 'date' })
  trainedAt!: string;

  @Column({ type: 'decimal', precision: 5, scale: 4, nullable: true })
  accuracy!: number | null;

  @Column({ type: 'decimal', precision: 7, scale: 4, nullable: true })
  logLoss!: number | null;

  @Column({ type: 'decimal', precision: 5, scale: 4, nullable: true })
  brierScore!: number | null;

  @Column({ type: 'jsonb', default: {} })
  parameters!: Partial<ScorelineModelParameters>;

  @Column({ type: 'boolean', default: false })
  isActive!: boolean;

  @Column({ type: 'timestamptz', nullable: true })
  promotedAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;
}
