import { Entity, PrimaryGeneratedColumn, Column, Index, Unique } from 'typeorm';

/**
 * Latest decimal price one bookmaker offers on one outcome.
 */
@Entity('bookmaker_odds')
@Unique(['fixtureId', 'bookmaker', 'marketCode', 'outcome'])
@Index(['fixtureId', 'marketCode'])
@Index(['quotedAt'])
export class BookmakerOddsQuote {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar' })
  fixtureId!: string;

  @Column({ type: 'varchar' })
  bookmaker!: string;

  @Column({ type: 'varchar' })
  marketCode!: string;

  @Column({ type: 'varchar' })
  outcome!: string;

  @Column({ type: 'decimal', precision: 8, scale: 3 })
  odds!: number;

  @Column({ type: 'timestamptz' })
  quotedAt!: Date;
}
