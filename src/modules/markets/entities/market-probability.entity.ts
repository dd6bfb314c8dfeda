import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

/**
 * Write-once record of one computed prediction surface.
 */
@Entity('market_probabilities')
@Index(['fixtureId', 'modelVersionId', 'computedAt'])
export class MarketProbability {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar' })
  fixtureId!: string;

  @Column({ type: 'uuid' })
  modelVersionId!: string;

  @Column({ type: 'varchar' })
  modelName!: string;

  @Column({ type: 'varchar' })
  modelVersion!: string;

  @Column({ type: 'jsonb' })
  probabilities!: Record<string, number>;

  @Column({ type: 'decimal', precision: 6, scale: 3 })
  expectedHomeGoals!: number;

  @Column({ type: 'decimal', precision: 6, scale: 3 })
  expectedAwayGoals!: number;

  @Column({ type: 'decimal', precision: 5, scale: 4 })
  confidence!: number;

  @Column({ type: 'timestamptz' })
  computedAt!: Date;

  @Column({ type: 'timestamptz' })
  expiresAt!: Date;
}
