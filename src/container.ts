import type { Queue } from 'bullmq';
import IORedis from 'ioredis';
import { createAccessPolicy, type AccessPolicy } from './auth';
import { RenditionCatalog } from './catalog';
import type { AppConfig, StorageConfig } from './config';
import { StreamingDeliveryService } from './delivery';
import { FfmpegEncoder } from './ffmpeg';
import { TranscodeJobQueue } from './jobQueue';
import { RedisJobStore } from './jobStore';
import { LocalStorage } from './localStorage';
import { createLogger } from './logger';
import { BullJobDispatcher, createTranscodeQueue, type QueueSettings } from './queue';
import { R2Storage } from './r2';
import { RedisRenditionStore } from './renditionStore';
import type { StorageAdapter } from './storage';
import { TranscodeEngine } from './transcodeEngine';
import type { TranscodeJobDeps } from './transcodeJob';
import type { TranscodeJobData, TranscodeJobResult } from './types';

const log = createLogger('container');

export function createStorage(config: StorageConfig): StorageAdapter {
  if (config.driver === 'r2') {
    return new R2Storage(config);
  }
  return new LocalStorage(config.root);
}

export type Services = {
  config: AppConfig;
  redis: IORedis;
  queue: Queue<TranscodeJobData, TranscodeJobResult>;
  storage: StorageAdapter;
  catalog: RenditionCatalog;
  jobQueue: TranscodeJobQueue;
  delivery: StreamingDeliveryService;
  access: AccessPolicy;
  queueSettings: QueueSettings;
  jobDeps: TranscodeJobDeps;
  close(): Promise<void>;
};

// Liga stores no Redis, BullMQ, storage e encoder a partir de um AppConfig.
// HTTP, worker e CLI usam o mesmo grafo.
export function createServices(config: AppConfig): Services {
  // BullMQ exige maxRetriesPerRequest: null na conexão
  const redis = new IORedis(config.redisUrl, { maxRetriesPerRequest: null });
  redis.on('error', (err) => log.error({ err }, 'Redis connection error'));

  const namespace = config.queueName;
  const storage = createStorage(config.storage);
  const jobStore = new RedisJobStore(redis, namespace);
  const catalog = new RenditionCatalog(new RedisRenditionStore(redis, namespace), storage, config.profiles, config.hlsPrefix);

  const queueSettings: QueueSettings = {
    queueName: config.queueName,
    maxAttempts: config.maxAttempts,
    retryBackoffMs: config.retryBackoffMs,
    workerConcurrency: config.workerConcurrency,
    leaseTimeoutMs: config.leaseTimeoutMs,
  };
  const queue = createTranscodeQueue(redis, config.queueName);
  const dispatcher = new BullJobDispatcher(queue, queueSettings);

  const jobQueue = new TranscodeJobQueue(jobStore, catalog, dispatcher, config.profiles, {
    sourceKeyTemplate: config.sourceKeyTemplate,
    maxAttempts: config.maxAttempts,
    leaseTimeoutMs: config.leaseTimeoutMs,
  });

  const jobDeps: TranscodeJobDeps = {
    store: jobStore,
    catalog,
    engine: new TranscodeEngine(storage, new FfmpegEncoder(), {
      segmentSeconds: config.segmentSeconds,
      preset: config.ffmpegPreset,
    }),
    profiles: config.profiles,
    hlsPrefix: config.hlsPrefix,
    maxAttempts: config.maxAttempts,
    jobTimeoutMs: config.jobTimeoutMs,
  };

  return {
    config,
    redis,
    queue,
    storage,
    catalog,
    jobQueue,
    delivery: new StreamingDeliveryService(catalog, storage, config.profiles),
    access: createAccessPolicy(config.auth),
    queueSettings,
    jobDeps,
    async close(): Promise<void> {
      await queue.close();
      await redis.quit();
    },
  };
}
