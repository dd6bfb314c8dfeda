import { Entity, PrimaryColumn, Column, UpdateDateColumn } from 'typeorm';

export interface WeatherSnapshot {
  temperatureC?: number;
  windKph?: number;
  precipitationMm?: number;
  condition?: string;
}

/**
 * Model inputs for one fixture, written by the ingestion pipeline and read-only here.
 * Rows are frozen once the fixture kicks off.
 */
@Entity('fixture_signals')
export class FixtureSignals {
  @PrimaryColumn({ type: 'varchar' })
  fixtureId!: string;

  @Column({ type: 'timestamp' })
  kickoffAt!: Date;

  @Column({ type: 'decimal', precision: 6, scale: 3 })
  homeXgFor!: number;

  @Column({ type: 'decimal', precision: 6, scale: 3 })
  homeXgAgainst!: number;

  @Column({ type: 'decimal', precision: 6, scale: 3 })
  awayXgFor!: number;

  @Column({ type: 'decimal', precision: 6, scale: 3 })
  awayXgAgainst!: number;

  @Column({ type: 'decimal', precision: 7, scale: 2 })
  homeElo!: number;

  @Column({ type: 'decimal', precision: 7, scale: 2 })
  awayElo!: number;

  // Aggregate home-side bias of the appointed referee, -1..1
  @Column({ type: 'decimal', precision: 5, scale: 4, default: 0 })
  refereeBias!: number;

  // Points per game over recent matches, 0..3
  @Column({ type: 'decimal', precision: 4, scale: 3, nullable: true })
  homeForm!: number | null;

  @Column({ type: 'decimal', precision: 4, scale: 3, nullable: true })
  awayForm!: number | null;

  @Column({ type: 'jsonb', nullable: true })
  weather!: WeatherSnapshot | null;

  @UpdateDateColumn()
  updatedAt!: Date;
}
