import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

@Entity('shadow_log')
@Index(['fixtureId', 'createdAt'])
@Index(['canaryVersionId', 'createdAt'])
export class ShadowLogEntry {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar' })
  fixtureId!: string;

  @Column({ type: 'uuid' })
  productionVersionId!: string;

  @Column({ type: 'uuid' })
  canaryVersionId!: string;

  @Column({ type: 'jsonb' })
  productionProbabilities!: Record<string, number>;

  @Column({ type: 'jsonb' })
  canaryProbabilities!: Record<string, number>;

  @Column({ type: 'double precision' })
  l1Distance!: number;

  // null when undefined, see computeDivergence
  @Column({ type: 'double precision', nullable: true })
  klDivergence!: number | null;

  @Column({ type: 'varchar', length: 1 })
  servedBucket!: string;

  @CreateDateColumn()
  createdAt!: Date;
}
