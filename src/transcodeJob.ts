import { UnrecoverableError, type Job } from 'bullmq';
import type { RenditionCatalog } from './catalog';
import { TimeoutError, toJobFailure } from './errors';
import type { JobStore } from './jobStore';
import { createLogger } from './logger';
import { renditionPrefix } from './paths';
import type { ProfileSet } from './profiles';
import type { TranscodeEngine } from './transcodeEngine';
import type { TranscodeJobData, TranscodeJobResult } from './types';

const baseLogger = createLogger('transcode-job');

export type TranscodeJobDeps = {
  store: JobStore;
  catalog: RenditionCatalog;
  engine: TranscodeEngine;
  profiles: ProfileSet;
  hlsPrefix: string;
  maxAttempts: number;
  jobTimeoutMs: number;
  now?: () => Date;
};

// Só o que o processador lê do job do BullMQ
export type TranscodeJobHandle = Pick<Job<TranscodeJobData, TranscodeJobResult>, 'id' | 'data'>;

// Aborta fn quando estoura o tempo
export async function runWithTimeout<T>(timeoutMs: number, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(`Job exceeded its ${timeoutMs}ms time limit`));
    }, timeoutMs);
  });
  const work = fn(controller.signal);
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
    if (controller.signal.aborted) {
      // O trabalho abortado ainda vai rejeitar; registra em vez de deixar sem handler
      work.catch((err: unknown) => baseLogger.debug({ err }, 'Work settled after timeout'));
    }
  }
}

// Função que trata o job de transcodificação:
// 1) marca o job como running (attempts + 1)
// 2) transcode + upload com limite de tempo; a rendition atual só sai do ar quando o upload começa
// 3) registra a rendition e marca succeeded
// Falhas transitórias voltam para queued e o BullMQ refaz com backoff; as demais terminam em failed.
export async function handleTranscodeJob(job: TranscodeJobHandle, deps: TranscodeJobDeps): Promise<TranscodeJobResult> {
  const { jobId } = job.data;
  const now = deps.now ?? (() => new Date());

  const current = await deps.store.get(jobId);
  if (!current) {
    throw new UnrecoverableError(`Job record ${jobId} not found`);
  }
  const claim = await deps.store.transition(jobId, ['queued', 'running'], {
    status: 'running',
    attempts: current.attempts + 1,
    startedAt: now().toISOString(),
  });
  if (!claim.applied) {
    const status = claim.job?.status ?? 'failed';
    baseLogger.info({ jobId, status }, 'Job is no longer runnable, skipping');
    return { jobId, status };
  }

  const running = claim.job;
  const attempt = running.attempts;
  const log = baseLogger.child({ jobId, videoId: running.videoId, profile: running.profile, attempt });
  const startTime = Date.now();

  try {
    const profile = deps.profiles.get(running.profile);

    const outcome = await runWithTimeout(deps.jobTimeoutMs, (signal) =>
      deps.engine.transcode({
        videoId: running.videoId,
        sourceKey: running.sourceKey,
        profile,
        outputPrefix: renditionPrefix(deps.hlsPrefix, running.videoId, running.profile),
        overwrite: running.overwrite,
        signal,
        onPublishStart: () => deps.catalog.markPending(running.videoId, running.profile),
      }),
    );
    const rendition = await deps.catalog.register(outcome.rendition);

    await deps.store.transition(jobId, ['running'], {
      status: 'succeeded',
      lastError: null,
      finishedAt: now().toISOString(),
    });
    log.info({ duration: Date.now() - startTime, cacheHit: outcome.cacheHit, segments: rendition.segmentKeys.length }, 'Transcode job succeeded');

    return {
      jobId,
      status: 'succeeded',
      playlistKey: rendition.playlistKey,
      segmentCount: rendition.segmentKeys.length,
      cacheHit: outcome.cacheHit,
    };
  } catch (err) {
    const failure = toJobFailure(err);

    if (failure.transient && attempt < deps.maxAttempts) {
      await deps.store.transition(jobId, ['running'], { status: 'queued', lastError: failure });
      log.warn({ err, maxAttempts: deps.maxAttempts }, `Transient failure, retrying (${attempt}/${deps.maxAttempts})`);
      throw err;
    }

    await deps.store.transition(jobId, ['running'], {
      status: 'failed',
      lastError: failure,
      finishedAt: now().toISOString(),
    });
    log.error({ err, failure, maxAttempts: deps.maxAttempts }, 'Transcode job failed');
    // Impede novas tentativas do BullMQ: o registro já está terminal
    throw new UnrecoverableError(failure.message);
  }
}
