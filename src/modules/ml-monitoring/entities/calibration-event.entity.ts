import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index, Unique } from 'typeorm';

export enum MatchOutcome {
  HOME = 'H',
  DRAW = 'D',
  AWAY = 'A',
}

/**
 * Settled outcome of one fixture against the probabilities one model version served.
 */
@Entity('calibration_events')
@Unique(['fixtureId', 'modelVersionId'])
@Index(['modelVersionId', 'createdAt'])
export class CalibrationEvent {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar' })
  fixtureId!: string;

  @Column({ type: 'uuid' })
  modelVersionId!: string;

  @Column({ type: 'decimal', precision: 7, scale: 6 })
  pHome!: number;

  @Column({ type: 'decimal', precision: 7, scale: 6 })
  pDraw!: number;

  @Column({ type: 'decimal', precision: 7, scale: 6 })
  pAway!: number;

  @Column({ type: 'enum', enum: MatchOutcome })
  outcome!: MatchOutcome;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
