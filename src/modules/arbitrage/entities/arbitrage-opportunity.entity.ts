import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index, Unique } from 'typeorm';

export interface ArbitrageLeg {
  outcome: string;
  bookmaker: string;
  odds: number;
  quotedAt: string;
  stake: number;
  payout: number;
}

@Entity('arbitrage_opportunities')
@Index(['fixtureId', 'marketCode', 'detectedAt'])
@Unique(['fixtureId', 'marketCode', 'fingerprint'])
export class ArbitrageOpportunity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar' })
  fixtureId!: string;

  @Column({ type: 'varchar' })
  marketCode!: string;

  @Column({ type: 'jsonb' })
  legs!: ArbitrageLeg[];

  @Column({ type: 'double precision' })
  impliedProbabilitySum!: number;

  @Column({ type: 'double precision' })
  profitPct!: number;

  @Column({ type: 'decimal', precision: 12, scale: 2 })
  totalStake!: number;

  @Column({ type: 'decimal', precision: 12, scale: 2 })
  guaranteedPayout!: number;

  @Column({ type: 'decimal', precision: 12, scale: 2 })
  guaranteedProfit!: number;

  // Contributing quotes; a new row is written only when it changes
  @Column({ type: 'varchar' })
  fingerprint!: string;

  @CreateDateColumn({ type: 'timestamptz' })
  detectedAt!: Date;
}
