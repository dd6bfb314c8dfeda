import { Controller, Get, Put, Delete, Param, Body, NotFoundException } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { TrafficSplitterService } from '../services/traffic-splitter.service';
import { SetCanaryDto } from '../dto/set-canary.dto';

@ApiTags('A/B Testing')
@Controller('ab')
export class TrafficController {
  constructor(private readonly trafficSplitterService: TrafficSplitterService) {}

  @Get('config')
  @ApiOperation({ summary: 'Get the canary routing policy' })
  async getConfig() {
    const policy = await this.trafficSplitterService.getConfig();
    return { success: true, data: policy };
  }

  /**
   * Set or clear the canary. Existing assignments are kept.
   */
  @Put('config')
  @ApiOperation({ summary: 'Set the canary version and percentage' })
  @ApiResponse({ status: 400, description: 'Bad percentage, or the version is already active' })
  async setConfig(@Body() dto: SetCanaryDto) {
    const policy = await this.trafficSplitterService.setCanary(dto.canaryVersionId ?? null, dto.canaryPercentage);
    return { success: true, data: policy };
  }

  @Delete('assignments/:deviceId')
  @ApiOperation({ summary: 'Clear one device assignment so it is re-bucketed on its next request' })
  async clearAssignment(@Param('deviceId') deviceId: string) {
    const removed = await this.trafficSplitterService.clearAssignment(deviceId);
    if (!removed) {
      throw new NotFoundException(`No assignment for device ${deviceId}`);
    }
    return { success: true, data: { deviceId, removed } };
  }

  @Delete('assignments')
  @ApiOperation({ summary: 'Clear every device assignment' })
  async clearAll() {
    const removed = await this.trafficSplitterService.clearAll();
    return { success: true, data: { removed } };
  }
}
