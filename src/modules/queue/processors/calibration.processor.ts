import { Processor, Process, OnQueueCompleted, OnQueueFailed } from '@nestjs/bull';
import { Logger } from '@nestjs/common';
import type { Job } from 'bull';
import {
  CalibrationTrackerService,
  DailyCalibration,
} from '../../ml-monitoring/services/calibration-tracker.service';
import { CALIBRATION_QUEUE, CalibrationRecomputeJob, RECOMPUTE_DAY_JOB } from '../services/queue.service';

@Processor(CALIBRATION_QUEUE)
export class CalibrationProcessor {
  private readonly logger = new Logger(CalibrationProcessor.name);

  constructor(private readonly calibrationTrackerService: CalibrationTrackerService) {}

  @Process(RECOMPUTE_DAY_JOB)
  async handleRecomputeDay(job: Job<CalibrationRecomputeJob>): Promise<DailyCalibration | null> {
    const { modelVersionId, day } = job.data;
    this.logger.log(`Recomputing ${modelVersionId} for ${day} (job ${job.id})`);

    const metrics = await this.calibrationTrackerService.recomputeDay(modelVersionId, day);
    await this.calibrationTrackerService.checkGates(modelVersionId);

    return metrics;
  }

  @OnQueueCompleted()
  onCompleted(job: Job<CalibrationRecomputeJob>) {
    this.logger.log(`Job ${job.id} completed`);
  }

  @OnQueueFailed()
  onFailed(job: Job<CalibrationRecomputeJob>, error: Error) {
    this.logger.error(`Job ${job.id} failed with error: ${error.message}`);
  }
}
