import { Controller, Get, Param } from '@nestjs/common';
import { ApiTags, ApiOperation } from '@nestjs/swagger';
import { MetricsService } from '../services/metrics.service';

@ApiTags('Metrics')
@Controller('metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get('counters')
  @ApiOperation({ summary: 'Get process-local counters' })
  getCounters() {
    const counters = this.metricsService.snapshot();

    return {
      success: true,
      data: counters,
      meta: { count: counters.length },
    };
  }

  @Get('counters/:name')
  @ApiOperation({ summary: 'Get one counter summed across its labels' })
  getCounter(@Param('name') name: string) {
    return {
      success: true,
      data: { name, total: this.metricsService.total(name) },
    };
  }
}
