import {
  Controller,
  Get,
  Delete,
  Param,
  Query,
  Headers,
  Logger,
  ParseIntPipe,
  DefaultValuePipe,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiQuery, ApiHeader } from '@nestjs/swagger';
import { PredictionService } from '../services/prediction.service';
import { ShadowEvaluatorService } from '../services/shadow-evaluator.service';
import { PredictionCacheService } from '../services/prediction-cache.service';
import { ProbabilityModelService } from '../../markets/services/probability-model.service';

@ApiTags('Predictions')
@Controller('predictions')
export class PredictionController {
  private readonly logger = new Logger(PredictionController.name);

  constructor(
    private readonly predictionService: PredictionService,
    private readonly shadowEvaluatorService: ShadowEvaluatorService,
    private readonly predictionCacheService: PredictionCacheService,
    private readonly probabilityModelService: ProbabilityModelService,
  ) {}

  @Get('markets')
  @ApiOperation({ summary: 'Get the market catalog every surface is priced over' })
  getMarkets() {
    const catalog = this.probabilityModelService.getCatalog();
    return {
      success: true,
      data: {
        version: catalog.version,
        markets: catalog.markets.map(({ code, group }) => ({ code, group })),
        groups: catalog.groups,
      },
      meta: { marketCount: catalog.markets.length, groupCount: catalog.groups.length },
    };
  }

  /**
   * Get market probabilities for a fixture
   */
  @Get('fixture/:id')
  @ApiOperation({
    summary: 'Get market probabilities for a fixture',
    description: 'Prices every catalog market; callers with a device id are routed to their A/B bucket',
  })
  @ApiQuery({ name: 'deviceId', required: false, type: String })
  @ApiHeader({ name: 'x-device-id', required: false })
  @ApiResponse({ status: 200, description: 'Market probability surface' })
  @ApiResponse({ status: 422, description: 'Fixture signals missing or invalid' })
  async getMarketProbabilities(
    @Param('id') id: string,
    @Query('deviceId') deviceId?: string,
    @Headers('x-device-id') deviceHeader?: string,
  ) {
    const start = Date.now();
    const result = await this.predictionService.getMarketProbabilities(id, deviceId || deviceHeader || undefined);
    const duration = Date.now() - start;

    this.logger.log(`Fixture ${id} served by ${result.modelVersion} (bucket ${result.routing.bucket}) in ${duration}ms`);

    return {
      success: true,
      data: result,
      meta: {
        marketCount: Object.keys(result.probabilities).length,
        computeTimeMs: duration,
      },
    };
  }

  /**
   * Get stored surfaces for a fixture
   */
  @Get('fixture/:id/history')
  @ApiOperation({ summary: 'Get computed surfaces for a fixture, newest first' })
  @ApiQuery({ name: 'limit', required: false, type: Number })
  async getHistory(
    @Param('id') id: string,
    @Query('limit', new DefaultValuePipe(20), ParseIntPipe) limit: number,
  ) {
    const history = await this.predictionService.getHistory(id, limit);

    return {
      success: true,
      data: history,
      meta: { count: history.length },
    };
  }

  /**
   * Drop cached surfaces after a fixture's signals change
   */
  @Delete('fixture/:id/cache')
  @ApiOperation({ summary: 'Invalidate cached surfaces of a fixture for every model version' })
  async invalidateCache(@Param('id') id: string) {
    const removed = await this.predictionCacheService.invalidateFixture(id);
    this.logger.log(`Invalidated ${removed} cached surfaces for fixture ${id}`);

    return { success: true, data: { fixtureId: id, removed } };
  }

  /**
   * Get recent shadow comparisons
   */
  @Get('shadow')
  @ApiOperation({ summary: 'Get recent production vs canary comparisons' })
  @ApiQuery({ name: 'fixtureId', required: false, type: String })
  @ApiQuery({ name: 'limit', required: false, type: Number })
  async getShadowLog(
    @Query('fixtureId') fixtureId?: string,
    @Query('limit', new DefaultValuePipe(50), ParseIntPipe) limit: number = 50,
  ) {
    const entries = await this.shadowEvaluatorService.recentShadowLog(fixtureId, limit);

    return {
      success: true,
      data: entries,
      meta: { count: entries.length },
    };
  }

  /**
   * Get aggregate divergence for a canary
   */
  @Get('shadow/summary/:canaryVersionId')
  @ApiOperation({ summary: 'Get mean divergence of a canary against production' })
  @ApiQuery({ name: 'hours', required: false, type: Number })
  async getShadowSummary(
    @Param('canaryVersionId', ParseUUIDPipe) canaryVersionId: string,
    @Query('hours', new DefaultValuePipe(24), ParseIntPipe) hours: number,
  ) {
    const summary = await this.shadowEvaluatorService.divergenceSummary(canaryVersionId, hours);

    return {
      success: true,
      data: summary,
    };
  }
}
