import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bull';
import { Cron, CronExpression } from '@nestjs/schedule';
import type { Queue, Job } from 'bull';

export const CALIBRATION_QUEUE = 'calibration-queue';
export const RECOMPUTE_DAY_JOB = 'recompute-day';

export interface CalibrationRecomputeJob {
  modelVersionId: string;
  day: string;
}

export interface RecomputeJobOptions {
  priority?: number;
  delay?: number;
  attempts?: number;
}

@Injectable()
export class QueueService {
  private readonly logger = new Logger(QueueService.name);

  constructor(
    @InjectQueue(CALIBRATION_QUEUE)
    private readonly calibrationQueue: Queue<CalibrationRecomputeJob>,
  ) {}

  /**
   * Schedule a rebuild of one version's daily metrics
   */
  async scheduleCalibrationRecompute(
    modelVersionId: string,
    day: string,
    options: RecomputeJobOptions = {},
  ): Promise<Job<CalibrationRecomputeJob>> {
    const job = await this.calibrationQueue.add(
      RECOMPUTE_DAY_JOB,
      { modelVersionId, day },
      {
        priority: options.priority || 0,
        delay: options.delay || 0,
        attempts: options.attempts || 3,
      },
    );

    this.logger.log(`Recompute of ${modelVersionId} for ${day} scheduled with ID: ${job.id}`);
    return job;
  }

  /**
   * Get job status by ID
   */
  async getJobStatus(jobId: string): Promise<Job<CalibrationRecomputeJob> | null> {
    return this.calibrationQueue.getJob(jobId);
  }

  /**
   * Get all pending jobs
   */
  async getPendingJobs(): Promise<Job<CalibrationRecomputeJob>[]> {
    return this.calibrationQueue.getWaiting();
  }

  /**
   * Clean up old jobs
   */
  @Cron(CronExpression.EVERY_DAY_AT_3AM)
  async cleanup(): Promise<void> {
    await this.calibrationQueue.clean(1000, 'completed');
    await this.calibrationQueue.clean(1000, 'failed');
    this.logger.log('Queue cleanup completed');
  }
}
