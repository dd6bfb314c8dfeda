import { Controller, Get, Post, Param, Query, Body, Logger, DefaultValuePipe, ParseIntPipe } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiQuery } from '@nestjs/swagger';
import { ArbitrageScannerService } from '../services/arbitrage-scanner.service';
import { StoreOddsDto } from '../dto/store-odds.dto';

@ApiTags('Arbitrage')
@Controller('arbitrage')
export class ArbitrageController {
  private readonly logger = new Logger(ArbitrageController.name);

  constructor(private readonly arbitrageScannerService: ArbitrageScannerService) {}

  /**
   * Get current arbitrage opportunities
   */
  @Get()
  @ApiOperation({
    summary: 'Get arbitrage opportunities',
    description: 'Cross-bookmaker combinations whose reciprocal best odds sum below 1, best profit first',
  })
  @ApiQuery({ name: 'fixtureId', required: false, type: String })
  @ApiResponse({ status: 200, description: 'List of opportunities' })
  async getOpportunities(@Query('fixtureId') fixtureId?: string) {
    const start = Date.now();
    const opportunities = await this.arbitrageScannerService.getArbitrageOpportunities(fixtureId || undefined);
    const duration = Date.now() - start;

    return {
      success: true,
      data: opportunities,
      meta: {
        count: opportunities.length,
        computeTimeMs: duration,
      },
    };
  }

  @Get('history')
  @ApiOperation({ summary: 'Get stored opportunities of the last N days' })
  @ApiQuery({ name: 'days', required: false, type: Number })
  async getHistory(@Query('days', new DefaultValuePipe(7), ParseIntPipe) days: number) {
    const history = await this.arbitrageScannerService.getHistory(Math.min(Math.max(1, days), 90));
    return { success: true, data: history, meta: { days, count: history.length } };
  }

  @Get('compare/:fixtureId/:market')
  @ApiOperation({ summary: 'Compare fresh odds across bookmakers for one market' })
  @ApiResponse({ status: 404, description: 'No fresh odds' })
  async compareOdds(@Param('fixtureId') fixtureId: string, @Param('market') market: string) {
    const comparison = await this.arbitrageScannerService.compareOdds(fixtureId, market);
    return { success: true, data: comparison };
  }

  /**
   * Store a bookmaker quote
   */
  @Post('quotes')
  @ApiOperation({ summary: 'Store a bookmaker quote' })
  @ApiResponse({ status: 422, description: 'Odds not above 1.0' })
  async storeQuote(@Body() dto: StoreOddsDto) {
    const quote = await this.arbitrageScannerService.storeQuote(dto);
    this.logger.debug(`Quote ${quote.bookmaker} ${quote.fixtureId} ${quote.marketCode}/${quote.outcome} @ ${quote.odds}`);
    return { success: true, data: quote };
  }
}
