import { Entity, PrimaryColumn, Column, UpdateDateColumn, VersionColumn } from 'typeorm';

/**
 * Canary routing policy. One row per routed surface; the prediction path reads the
 * `predictions.canary` row.
 */
@Entity('ab_config')
export class AbConfig {
  @PrimaryColumn({ type: 'varchar' })
  key!: string;

  @Column({ type: 'int', default: 0 })
  canaryPercentage!: number;

  // null routes every caller to the active model
  @Column({ type: 'uuid', nullable: true })
  canaryVersionId!: string | null;

  @VersionColumn()
  version!: number;

  @UpdateDateColumn()
  updatedAt!: Date;
}
