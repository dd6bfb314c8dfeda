import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { InjectRepository } from '@nestjs/typeorm';
import { MoreThanOrEqual, Repository } from 'typeorm';
import { BookmakerOddsQuote } from '../entities/bookmaker-odds-quote.entity';
import { ArbitrageLeg, ArbitrageOpportunity } from '../entities/arbitrage-opportunity.entity';
import { StoreOddsDto } from '../dto/store-odds.dto';
import { MetricsService } from '../../../common/services/metrics.service';
import { InvalidSignalError } from '../../../common/errors/domain.errors';
import { errorMessage } from '../../../common/utils/retry';
import {
  PricedOutcome,
  allocateStakes,
  bestOddsByOutcome,
  impliedProbabilitySum,
  isValidOdds,
  profitPercent,
  requiredOutcomes,
} from '../arbitrage.math';

export interface ArbitrageView {
  fixtureId: string;
  marketCode: string;
  legs: ArbitrageLeg[];
  impliedProbabilitySum: number;
  profitPct: number;
  totalStake: number;
  guaranteedPayout: number;
  guaranteedProfit: number;
  detectedAt: string;
}

export interface OutcomeComparison {
  outcome: string;
  best: { bookmaker: string; odds: number };
  worst: { bookmaker: string; odds: number };
  average: number;
}

export interface OddsComparison {
  fixtureId: string;
  marketCode: string;
  bookmakerCount: number;
  outcomes: OutcomeComparison[];
  /** Bookmaker margin over average odds, in percent. */
  marginPct: number;
}

interface MarketEvaluation {
  fingerprint: string;
  opportunity: ArbitrageView | null;
}

export const ARBITRAGE_STALE_QUOTES = 'arbitrage_stale_quotes_total';
export const ARBITRAGE_INVALID_QUOTES = 'arbitrage_invalid_quotes_total';
export const ARBITRAGE_WRITE_ERRORS = 'arbitrage_write_errors_total';

@Injectable()
export class ArbitrageScannerService {
  private readonly logger = new Logger(ArbitrageScannerService.name);
  private readonly freshnessSeconds: number;
  private readonly lookbackMinutes: number;
  private readonly minProfitPct: number;
  private readonly defaultStake: number;

  // Last evaluation per fixture and market, reused until a contributing quote changes
  private readonly evaluations = new Map<string, MarketEvaluation>();

  constructor(
    @InjectRepository(BookmakerOddsQuote)
    private quoteRepository: Repository<BookmakerOddsQuote>,
    @InjectRepository(ArbitrageOpportunity)
    private opportunityRepository: Repository<ArbitrageOpportunity>,
    private metricsService: MetricsService,
    private configService: ConfigService,
  ) {
    this.freshnessSeconds = this.configService.get<number>('arbitrage.freshnessSeconds') ?? 300;
    this.lookbackMinutes = this.configService.get<number>('arbitrage.lookbackMinutes') ?? 60;
    this.minProfitPct = this.configService.get<number>('arbitrage.minProfitPct') ?? 0;
    this.defaultStake = this.configService.get<number>('arbitrage.defaultStake') ?? 100;
  }

  /**
   * Store a bookmaker price. An older quote never replaces a newer one.
   */
  async storeQuote(dto: StoreOddsDto, now: Date = new Date()): Promise<BookmakerOddsQuote> {
    if (!isValidOdds(dto.odds)) {
      throw new InvalidSignalError('odds', dto.odds);
    }

    const quotedAt = dto.quotedAt ? new Date(dto.quotedAt) : now;
    const key = {
      fixtureId: dto.fixtureId,
      bookmaker: dto.bookmaker,
      marketCode: dto.marketCode,
      outcome: dto.outcome,
    };

    const existing = await this.quoteRepository.findOne({ where: key });
    if (existing && new Date(existing.quotedAt).getTime() >= quotedAt.getTime()) {
      this.logger.debug(`Ignoring out-of-order quote from ${dto.bookmaker} for ${dto.fixtureId} ${dto.marketCode}`);
      return existing;
    }

    return this.quoteRepository.save({ ...existing, ...key, odds: dto.odds, quotedAt });
  }

  /**
   * Get current opportunities, best profit first
   */
  async getArbitrageOpportunities(fixtureId?: string, now: Date = new Date()): Promise<ArbitrageView[]> {
    return this.scan(fixtureId, now);
  }

  @Cron(CronExpression.EVERY_MINUTE)
  async scheduledScan(): Promise<void> {
    try {
      const opportunities = await this.scan();
      if (opportunities.length > 0) {
        this.logger.log(
          `Arbitrage scan: ${opportunities.length} opportunities, best ${opportunities[0].profitPct.toFixed(2)}%`,
        );
      }
    } catch (error) {
      this.logger.error(`Arbitrage scan failed: ${errorMessage(error)}`);
    }
  }

  async scan(fixtureId?: string, now: Date = new Date()): Promise<ArbitrageView[]> {
    const since = new Date(now.getTime() - this.lookbackMinutes * 60 * 1000);
    const quotes = await this.quoteRepository.find({
      where: fixtureId ? { fixtureId, quotedAt: MoreThanOrEqual(since) } : { quotedAt: MoreThanOrEqual(since) },
    });

    const markets = new Map<string, BookmakerOddsQuote[]>();
    for (const quote of quotes) {
      const key = marketKey(quote.fixtureId, quote.marketCode);
      const group = markets.get(key);
      if (group) group.push(quote);
      else markets.set(key, [quote]);
    }

    const opportunities: ArbitrageView[] = [];
    for (const [key, group] of markets) {
      const opportunity = await this.evaluateMarket(key, group[0].fixtureId, group[0].marketCode, group, now);
      if (opportunity) opportunities.push(opportunity);
    }

    if (!fixtureId) {
      for (const key of this.evaluations.keys()) {
        if (!markets.has(key)) this.evaluations.delete(key);
      }
    }

    return opportunities.sort((a, b) => b.profitPct - a.profitPct);
  }

  /**
   * Best, worst and average fresh odds per outcome, with the bookmaker margin
   */
  async compareOdds(fixtureId: string, marketCode: string, now: Date = new Date()): Promise<OddsComparison> {
    const since = new Date(now.getTime() - this.freshnessSeconds * 1000);
    const rows = await this.quoteRepository.find({
      where: { fixtureId, marketCode, quotedAt: MoreThanOrEqual(since) },
    });

    const quotes = latestPerBookmaker(rows.map(toPriced)).filter(quote => isValidOdds(quote.odds));
    if (quotes.length === 0) {
      throw new NotFoundException(`No fresh odds for ${fixtureId} ${marketCode}`);
    }

    const byOutcome = new Map<string, PricedOutcome[]>();
    for (const quote of quotes) {
      const list = byOutcome.get(quote.outcome);
      if (list) list.push(quote);
      else byOutcome.set(quote.outcome, [quote]);
    }

    const outcomes: OutcomeComparison[] = Array.from(byOutcome.entries())
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([outcome, list]) => {
        const sorted = [...list].sort((a, b) => b.odds - a.odds || a.bookmaker.localeCompare(b.bookmaker));
        const best = sorted[0];
        const worst = sorted[sorted.length - 1];
        return {
          outcome,
          best: { bookmaker: best.bookmaker, odds: best.odds },
          worst: { bookmaker: worst.bookmaker, odds: worst.odds },
          average: list.reduce((sum, q) => sum + q.odds, 0) / list.length,
        };
      });

    return {
      fixtureId,
      marketCode,
      bookmakerCount: new Set(quotes.map(q => q.bookmaker)).size,
      outcomes,
      marginPct: (impliedProbabilitySum(outcomes.map(o => o.average)) - 1) * 100,
    };
  }

  /**
   * Get opportunities detected over the last `days`
   */
  async getHistory(days: number = 7, now: Date = new Date()): Promise<ArbitrageOpportunity[]> {
    return this.opportunityRepository.find({
      where: { detectedAt: MoreThanOrEqual(new Date(now.getTime() - days * 24 * 60 * 60 * 1000)) },
      order: { profitPct: 'DESC' },
      take: 200,
    });
  }

  private async evaluateMarket(
    key: string,
    fixtureId: string,
    marketCode: string,
    rows: BookmakerOddsQuote[],
    now: Date,
  ): Promise<ArbitrageView | null> {
    const freshAfter = now.getTime() - this.freshnessSeconds * 1000;
    const fresh: PricedOutcome[] = [];

    for (const quote of latestPerBookmaker(rows.map(toPriced))) {
      if (!isValidOdds(quote.odds)) {
        this.metricsService.increment(ARBITRAGE_INVALID_QUOTES);
        continue;
      }
      if (quote.quotedAt.getTime() < freshAfter) {
        this.metricsService.increment(ARBITRAGE_STALE_QUOTES);
        continue;
      }
      fresh.push(quote);
    }

    const best = bestOddsByOutcome(fresh);
    const fingerprint = best
      .map(leg => `${leg.outcome}:${leg.bookmaker}:${leg.odds}:${leg.quotedAt.getTime()}`)
      .join('|');

    const previous = this.evaluations.get(key);
    if (previous && previous.fingerprint === fingerprint) {
      return previous.opportunity;
    }

    const opportunity = this.priceOpportunity(fixtureId, marketCode, best, now);
    this.evaluations.set(key, { fingerprint, opportunity });

    if (opportunity) {
      await this.persist(opportunity, fingerprint);
    }
    return opportunity;
  }

  private priceOpportunity(
    fixtureId: string,
    marketCode: string,
    best: PricedOutcome[],
    now: Date,
  ): ArbitrageView | null {
    const required = requiredOutcomes(marketCode);
    if (required) {
      const priced = new Set(best.map(leg => leg.outcome));
      if (!required.every(outcome => priced.has(outcome))) return null;
      best = best.filter(leg => required.includes(leg.outcome));
    } else if (best.length < 2) {
      return null;
    }

    const impliedSum = impliedProbabilitySum(best.map(leg => leg.odds));
    if (impliedSum >= 1) return null;

    const profitPct = profitPercent(impliedSum);
    if (profitPct < this.minProfitPct) return null;

    const plan = allocateStakes(best, this.defaultStake);

    return {
      fixtureId,
      marketCode,
      legs: best.map((leg, i) => ({
        outcome: leg.outcome,
        bookmaker: leg.bookmaker,
        odds: leg.odds,
        quotedAt: leg.quotedAt.toISOString(),
        stake: plan.allocations[i].stake,
        payout: plan.allocations[i].payout,
      })),
      impliedProbabilitySum: impliedSum,
      profitPct,
      totalStake: plan.totalStake,
      guaranteedPayout: plan.guaranteedPayout,
      guaranteedProfit: plan.guaranteedProfit,
      detectedAt: now.toISOString(),
    };
  }

  private async persist(opportunity: ArbitrageView, fingerprint: string): Promise<void> {
    try {
      // A quote set already stored by a concurrent scan is ignored by the unique fingerprint
      const result = await this.opportunityRepository
        .createQueryBuilder()
        .insert()
        .into(ArbitrageOpportunity)
        .values({
          fixtureId: opportunity.fixtureId,
          marketCode: opportunity.marketCode,
          legs: opportunity.legs,
          impliedProbabilitySum: opportunity.impliedProbabilitySum,
          profitPct: opportunity.profitPct,
          totalStake: opportunity.totalStake,
          guaranteedPayout: opportunity.guaranteedPayout,
          guaranteedProfit: opportunity.guaranteedProfit,
          fingerprint,
        })
        .orIgnore()
        .returning(['id'])
        .execute();

      const insertedRows: unknown[] = Array.isArray(result.raw) ? result.raw : [];
      if (insertedRows.length === 0) return;

      this.logger.log(
        `Arbitrage on ${opportunity.fixtureId} ${opportunity.marketCode}: ${opportunity.profitPct.toFixed(2)}% profit`,
      );
    } catch (error) {
      this.metricsService.increment(ARBITRAGE_WRITE_ERRORS);
      this.logger.error(`Failed to store arbitrage for ${opportunity.fixtureId}: ${errorMessage(error)}`);
    }
  }
}

function marketKey(fixtureId: string, marketCode: string): string {
  return `${fixtureId}|${marketCode}`;
}

// Decimal columns come back from Postgres as strings
function toPriced(row: BookmakerOddsQuote): PricedOutcome {
  return {
    outcome: row.outcome,
    bookmaker: row.bookmaker,
    odds: Number(row.odds),
    quotedAt: new Date(row.quotedAt),
  };
}

/** Newest quote per (bookmaker, outcome); older prices are superseded, never averaged in. */
function latestPerBookmaker(quotes: PricedOutcome[]): PricedOutcome[] {
  const latest = new Map<string, PricedOutcome>();
  for (const quote of quotes) {
    const key = `${quote.bookmaker}|${quote.outcome}`;
    const current = latest.get(key);
    if (!current || quote.quotedAt.getTime() > current.quotedAt.getTime()) {
      latest.set(key, quote);
    }
  }
  return Array.from(latest.values());
}
