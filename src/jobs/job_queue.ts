import { Job, Queue, Worker } from 'bullmq';
import { Redis } from 'ioredis';
import { AppConfig } from '../config/environment';
import { SchedulingRunStatus } from '../domain/types';
import { ProductionScheduler } from '../scheduler/production_scheduler';
import { errorMessage, JobQueueError } from '../utils/errors';
import { logger } from '../utils/logger';
import { processSchedulingJob, SchedulingJobData } from './scheduling_job';

export const SCHEDULING_QUEUE_NAME = 'scheduling';

/** What the API needs from the async run machinery. */
export interface SchedulingRunQueue {
  enqueue(data: SchedulingJobData): Promise<string>;
  getStatus(runId: string): SchedulingRunStatus | undefined;
  getAllStatuses(): SchedulingRunStatus[];
  cancel(runId: string): Promise<boolean>;
  close(): Promise<void>;
}

export interface SchedulingQueueOptions {
  redis: AppConfig['redis'];
  concurrency: number;
}

interface Connected {
  redis: Redis;
  queue: Queue<SchedulingJobData, SchedulingRunStatus>;
  worker: Worker<SchedulingJobData, SchedulingRunStatus>;
}

function progressOf(job: Job<SchedulingJobData, SchedulingRunStatus>): number {
  return typeof job.progress === 'number' ? job.progress : 0;
}

/**
 * BullMQ-backed scheduling runs. Redis is contacted on first use; when it is not
 * reachable, enqueueing fails and callers should use the synchronous mutation.
 */
export class SchedulingQueue implements SchedulingRunQueue {
  private connected: Connected | undefined;
  private readonly statuses = new Map<string, SchedulingRunStatus>();

  constructor(
    private readonly options: SchedulingQueueOptions,
    private readonly scheduler: Pick<ProductionScheduler, 'generateSchedule'>
  ) {}

  async enqueue(data: SchedulingJobData): Promise<string> {
    const { queue } = await this.connect();

    try {
      logger.info('Adding scheduling run', { strategy: data.strategy, horizonDays: data.horizonDays });
      const job = await queue.add('schedule', data, {
        attempts: 3,
        backoff: { type: 'exponential', delay: 2000 },
        removeOnComplete: 10,
        removeOnFail: 5,
      });
      if (!job.id) {
        throw new JobQueueError('Queue returned a job without an id');
      }

      this.statuses.set(job.id, { runId: job.id, status: 'QUEUED', progress: 0 });
      logger.info(`Scheduling run ${job.id} queued`);
      return job.id;
    } catch (error) {
      if (error instanceof JobQueueError) throw error;
      const message = errorMessage(error);
      logger.error('Failed to queue scheduling run', { error: message });
      throw new JobQueueError(
        `Failed to queue scheduling run: ${message}`,
        undefined,
        error instanceof Error ? error : undefined
      );
    }
  }

  getStatus(runId: string): SchedulingRunStatus | undefined {
    return this.statuses.get(runId);
  }

  getAllStatuses(): SchedulingRunStatus[] {
    return Array.from(this.statuses.values());
  }

  async cancel(runId: string): Promise<boolean> {
    if (!this.connected) {
      logger.warn('Redis not connected, cannot cancel run', { runId });
      return false;
    }
    const job = await this.connected.queue.getJob(runId);
    if (!job) return false;

    await job.remove();
    this.statuses.delete(runId);
    return true;
  }

  async close(): Promise<void> {
    if (!this.connected) return;
    const { worker, queue, redis } = this.connected;
    this.connected = undefined;
    await worker.close();
    await queue.close();
    await redis.quit();
  }

  private async connect(): Promise<Connected> {
    if (this.connected) return this.connected;

    const redis = new Redis({
      host: this.options.redis.host,
      port: this.options.redis.port,
      maxRetriesPerRequest: null, // required by BullMQ
      enableReadyCheck: false,
      lazyConnect: true,
    });

    try {
      await redis.ping();
    } catch (error) {
      redis.disconnect();
      logger.warn('Redis not available for async scheduling', { error: errorMessage(error) });
      throw new JobQueueError(
        'Redis not available for async job processing. Use generateSchedule instead of generateScheduleAsync.',
        undefined,
        error instanceof Error ? error : undefined
      );
    }
    logger.info('Redis connection established');

    const queue = new Queue<SchedulingJobData, SchedulingRunStatus>(SCHEDULING_QUEUE_NAME, { connection: redis });
    const worker = new Worker<SchedulingJobData, SchedulingRunStatus>(
      SCHEDULING_QUEUE_NAME,
      job => processSchedulingJob(job, this.scheduler),
      { connection: redis, concurrency: this.options.concurrency }
    );
    this.listen(worker);

    this.connected = { redis, queue, worker };
    return this.connected;
  }

  private listen(worker: Worker<SchedulingJobData, SchedulingRunStatus>): void {
    worker.on('active', job => {
      if (!job.id) return;
      logger.info(`Scheduling run ${job.id} started processing`);
      this.statuses.set(job.id, {
        runId: job.id,
        status: 'PROCESSING',
        progress: progressOf(job),
        startedAt: new Date(job.timestamp),
      });
    });

    worker.on('completed', (job, result) => {
      if (!job.id) return;
      logger.info(`Scheduling run ${job.id} completed`, { totalJobs: result.totalJobs });
      this.statuses.set(job.id, result);
    });

    worker.on('failed', (job, err) => {
      if (!job?.id) return;
      logger.error(`Scheduling run ${job.id} failed`, { error: err.message, attemptsMade: job.attemptsMade });
      this.statuses.set(job.id, {
        runId: job.id,
        status: 'FAILED',
        progress: progressOf(job),
        startedAt: new Date(job.timestamp),
        error: err.message,
      });
    });

    worker.on('error', err => {
      logger.error('Scheduling worker error', { error: err.message });
    });
  }
}
