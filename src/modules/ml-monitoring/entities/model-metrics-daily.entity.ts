import { Entity, PrimaryGeneratedColumn, Column, UpdateDateColumn, Unique } from 'typeorm';

/**
 * Daily rollup for one model version, rebuilt from that day's calibration events.
 */
@Entity('model_metrics_daily')
@Unique(['modelVersionId', 'day'])
export class ModelMetricsDaily {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  modelVersionId!: string;

  // UTC day, YYYY-MM-DD
  @Column({ type: 'date' })
  day!: string;

  @Column({ type: 'int', default: 0 })
  served!: number;

  @Column({ type: 'int', default: 0 })
  correct!: number;

  @Column({ type: 'double precision', default: 0 })
  brierSum!: number;

  @Column({ type: 'double precision', default: 0 })
  logLossSum!: number;

  @Column({ type: 'double precision', nullable: true })
  ece!: number | null;

  @UpdateDateColumn()
  updatedAt!: Date;
}
