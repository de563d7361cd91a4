import { Job, UnrecoverableError } from 'bullmq';
import { Identifier, ScheduleRequest, SchedulingRunStatus, Strategy } from '../domain/types';
import { ProductionScheduler } from '../scheduler/production_scheduler';
import { errorMessage, isRetryableError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface SchedulingJobData {
  orderIds?: Identifier[];
  horizonDays: number;
  strategy: Strategy;
}

/** The parts of a BullMQ job the processor touches. */
export type SchedulingJobHandle = Pick<Job<SchedulingJobData>, 'id' | 'data' | 'timestamp' | 'updateProgress'>;

export async function processSchedulingJob(
  job: SchedulingJobHandle,
  scheduler: Pick<ProductionScheduler, 'generateSchedule'>
): Promise<SchedulingRunStatus> {
  const runId = job.id ?? 'unknown';
  const { orderIds, horizonDays, strategy } = job.data;

  await job.updateProgress(10);

  const request: ScheduleRequest = {
    orderIds: orderIds && orderIds.length > 0 ? orderIds : undefined,
    horizonDays,
    strategy,
  };
  await job.updateProgress(30);

  try {
    const result = await scheduler.generateSchedule(request);
    await job.updateProgress(100);

    return {
      runId,
      status: 'COMPLETED',
      progress: 100,
      startedAt: new Date(job.timestamp),
      completedAt: new Date(),
      totalJobs: result.totalJobs,
    };
  } catch (error) {
    // Bad requests and missing data will not fix themselves on retry.
    if (error instanceof Error && !isRetryableError(error)) {
      logger.warn(`Scheduling run ${runId} failed permanently`, { error: error.message });
      throw new UnrecoverableError(error.message);
    }
    logger.warn(`Scheduling run ${runId} failed, will retry`, { error: errorMessage(error) });
    throw error;
  }
}
