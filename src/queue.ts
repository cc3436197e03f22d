import { Queue, Worker, Job, QueueEvents } from 'bullmq';
import type IORedis from 'ioredis';
import { createLogger } from './logger';
import { handleTranscodeJob, type TranscodeJobDeps } from './transcodeJob';
import type { JobRecord, TranscodeJobData, TranscodeJobResult } from './types';

const logger = createLogger('queue');

export type QueueSettings = {
  queueName: string;
  maxAttempts: number;
  retryBackoffMs: number;
  workerConcurrency: number;
  leaseTimeoutMs: number;
};

// Entrega jobs para execução; o status continua no JobStore
export interface JobDispatcher {
  dispatch(job: JobRecord): Promise<void>;
  // Reenvia um job que a varredura de recuperação devolveu para queued
  redispatch(job: JobRecord): Promise<void>;
  // Remove um job ainda não iniciado; false se o backend já o pegou
  withdraw(jobId: string): Promise<boolean>;
}

function toJobData(job: JobRecord): TranscodeJobData {
  return { jobId: job.id, videoId: job.videoId, profile: job.profile };
}

export class BullJobDispatcher implements JobDispatcher {
  constructor(
    private readonly queue: Queue<TranscodeJobData, TranscodeJobResult>,
    private readonly settings: Pick<QueueSettings, 'maxAttempts' | 'retryBackoffMs'>,
  ) {}

  async dispatch(job: JobRecord): Promise<void> {
    await this.queue.add('transcode', toJobData(job), {
      jobId: job.id,
      attempts: this.settings.maxAttempts,
      backoff: { type: 'exponential', delay: this.settings.retryBackoffMs },
      removeOnComplete: { age: 24 * 3600, count: 1000 },
      removeOnFail: { age: 7 * 24 * 3600 },
    });
    logger.info({ jobId: job.id, videoId: job.videoId, profile: job.profile }, 'Job added to queue');
  }

  async redispatch(job: JobRecord): Promise<void> {
    const existing = await this.queue.getJob(job.id);
    if (existing) {
      const state = await existing.getState();
      if (state === 'failed') {
        await existing.retry('failed');
        logger.info({ jobId: job.id }, 'Retrying failed BullMQ job');
        return;
      }
      if (state !== 'completed' && state !== 'unknown') {
        // waiting/delayed/active: o próprio BullMQ vai entregar (active travado volta pelo stalled check)
        logger.info({ jobId: job.id, state }, 'BullMQ job still pending, leaving it in place');
        return;
      }
      await existing.remove();
    }
    await this.dispatch(job);
  }

  async withdraw(jobId: string): Promise<boolean> {
    const removed = await this.queue.remove(jobId);
    return removed === 1;
  }
}

// Criar a fila
export function createTranscodeQueue(connection: IORedis, queueName: string): Queue<TranscodeJobData, TranscodeJobResult> {
  return new Queue<TranscodeJobData, TranscodeJobResult>(queueName, { connection });
}

// Criar o worker
export function startWorker(connection: IORedis, settings: QueueSettings, deps: TranscodeJobDeps) {
  const concurrency = settings.workerConcurrency;
  logger.info({ concurrency, pid: process.pid }, 'Initializing BullMQ worker');

  const worker = new Worker<TranscodeJobData, TranscodeJobResult>(
    settings.queueName,
    async (job: Job<TranscodeJobData, TranscodeJobResult>) => {
      logger.info({ jobId: job.id, data: job.data }, 'Worker received job');
      return handleTranscodeJob(job, deps);
    },
    // O lock do BullMQ é o lease: se o worker morrer, o job volta após lockDuration
    { connection, concurrency, lockDuration: settings.leaseTimeoutMs, maxStalledCount: 1 },
  );
  worker.on('completed', (job, result) => {
    logger.info({ jobId: job.id, result }, 'Job completed');
  });
  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err }, 'Job failed');
  });
  worker.on('error', (err) => {
    logger.error({ err }, 'Worker error');
  });

  const queueEvents = new QueueEvents(settings.queueName, { connection: connection.duplicate() });
  queueEvents.on('waiting', ({ jobId }) => logger.debug({ jobId }, 'Job waiting'));
  queueEvents.on('active', ({ jobId }) => logger.debug({ jobId }, 'Job active'));
  queueEvents.on('failed', ({ jobId, failedReason }) => logger.warn({ jobId, failedReason }, 'Job failed event'));

  return {
    worker,
    async close(): Promise<void> {
      await worker.close();
      await queueEvents.close();
    },
  };
}
