import {
  Controller,
  Get,
  Post,
  Param,
  Query,
  Body,
  ParseUUIDPipe,
  DefaultValuePipe,
  ParseIntPipe,
  NotFoundException,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiQuery } from '@nestjs/swagger';
import { CalibrationTrackerService } from '../services/calibration-tracker.service';
import { RecordCalibrationEventDto } from '../dto/record-calibration-event.dto';
import { SettleFixtureDto } from '../dto/settle-fixture.dto';
import { utcDay } from '../calibration-metrics';
import { QueueService } from '../../queue/services/queue.service';

@ApiTags('Calibration')
@Controller('calibration')
export class CalibrationController {
  constructor(
    private readonly calibrationTrackerService: CalibrationTrackerService,
    private readonly queueService: QueueService,
  ) {}

  /**
   * Record a settled prediction
   */
  @Post('events')
  @ApiOperation({ summary: 'Record one calibration event', description: 'Probabilities are normalised; duplicates are ignored' })
  @ApiResponse({ status: 404, description: 'Unknown model version' })
  async recordEvent(@Body() dto: RecordCalibrationEventDto) {
    const result = await this.calibrationTrackerService.recordEvent(dto);
    return { success: true, data: result.event, meta: { created: result.created } };
  }

  /**
   * Settle a fixture for every version that priced it
   */
  @Post('settle/:fixtureId')
  @ApiOperation({ summary: 'Record the final score of a fixture' })
  async settleFixture(@Param('fixtureId') fixtureId: string, @Body() dto: SettleFixtureDto) {
    const result = await this.calibrationTrackerService.settleFixture(fixtureId, dto.homeGoals, dto.awayGoals);
    return { success: true, data: result };
  }

  @Get('jobs')
  @ApiOperation({ summary: 'List recompute jobs waiting in the queue' })
  async getPendingJobs() {
    const jobs = await this.queueService.getPendingJobs();
    return {
      success: true,
      data: jobs.map(job => ({ id: job.id, ...job.data, queuedAt: new Date(job.timestamp).toISOString() })),
      meta: { count: jobs.length },
    };
  }

  @Get('jobs/:jobId')
  @ApiOperation({ summary: 'Get the state of one recompute job' })
  @ApiResponse({ status: 404, description: 'Unknown job' })
  async getJob(@Param('jobId') jobId: string) {
    const job = await this.queueService.getJobStatus(jobId);
    if (!job) {
      throw new NotFoundException(`Job ${jobId} not found`);
    }

    return {
      success: true,
      data: { id: job.id, ...job.data, state: await job.getState(), attemptsMade: job.attemptsMade },
    };
  }

  @Get(':versionId/daily')
  @ApiOperation({ summary: 'Get daily calibration rows for a model version' })
  @ApiQuery({ name: 'from', required: false, description: 'YYYY-MM-DD, defaults to 30 days ago' })
  @ApiQuery({ name: 'to', required: false, description: 'YYYY-MM-DD, defaults to today' })
  async getDaily(
    @Param('versionId', ParseUUIDPipe) versionId: string,
    @Query('from') from?: string,
    @Query('to') to?: string,
  ) {
    const today = new Date();
    const toDay = to || utcDay(today);
    const fromDay = from || utcDay(new Date(today.getTime() - 30 * 24 * 60 * 60 * 1000));

    const rows = await this.calibrationTrackerService.getDailyCalibration(versionId, fromDay, toDay);
    return { success: true, data: rows, meta: { from: fromDay, to: toDay, count: rows.length } };
  }

  @Get(':versionId/gates')
  @ApiOperation({ summary: 'Check rollout gates over the rolling window' })
  async checkGates(@Param('versionId', ParseUUIDPipe) versionId: string) {
    const result = await this.calibrationTrackerService.checkGates(versionId);
    return { success: true, data: result };
  }

  @Get(':versionId/summary')
  @ApiOperation({ summary: 'Get reliability bins, Brier score and log loss' })
  @ApiQuery({ name: 'hours', required: false, type: Number })
  @ApiQuery({ name: 'bins', required: false, type: Number })
  async getSummary(
    @Param('versionId', ParseUUIDPipe) versionId: string,
    @Query('hours', new DefaultValuePipe(720), ParseIntPipe) hours: number,
    @Query('bins', new DefaultValuePipe(10), ParseIntPipe) bins: number,
  ) {
    const summary = await this.calibrationTrackerService.getCalibrationSummary(
      versionId,
      Math.min(Math.max(1, hours), 720 * 6),
      Math.min(Math.max(2, bins), 30),
    );
    return { success: true, data: summary };
  }

  @Get(':versionId/drift')
  @ApiOperation({ summary: 'Compare 7-day accuracy against 30-day accuracy' })
  async checkDrift(@Param('versionId', ParseUUIDPipe) versionId: string) {
    const drift = await this.calibrationTrackerService.checkModelDrift(versionId);
    return { success: true, data: drift };
  }
}
