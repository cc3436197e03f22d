import { v4 as uuidv4 } from 'uuid';
import type { RenditionCatalog } from './catalog';
import { ConflictError, NotFoundError } from './errors';
import type { JobStore } from './jobStore';
import { createLogger } from './logger';
import { assertVideoId, sourceKeyFor } from './paths';
import type { ProfileSet } from './profiles';
import type { JobDispatcher } from './queue';
import type { JobRecord } from './types';

const log = createLogger('job-queue');

export type JobQueueSettings = {
  sourceKeyTemplate: string;
  maxAttempts: number;
  leaseTimeoutMs: number;
};

export type EnqueueResult = {
  job: JobRecord;
  // true quando o pedido foi juntado a um job já em andamento para o mesmo (video, profile)
  coalesced: boolean;
};

export type EnqueueAllEntry =
  | ({ profile: string; ok: true } & EnqueueResult)
  | { profile: string; ok: false; error: ConflictError };

export type RecoveryReport = {
  // running com lease vencido, devolvidos para queued
  requeued: string[];
  // queued há mais que o lease: reenviados ao BullMQ caso o dispatch original tenha se perdido
  redispatched: string[];
  failed: string[];
};

export type RemoveVideoResult = {
  renditions: number;
  objects: number;
  cancelledJobs: string[];
};

// Entrada do trabalho de transcode, usada pelas rotas HTTP e pela CLI.
// Enqueue retorna assim que o job está gravado e entregue ao dispatcher.
export class TranscodeJobQueue {
  constructor(
    private readonly store: JobStore,
    private readonly catalog: RenditionCatalog,
    private readonly dispatcher: JobDispatcher,
    private readonly profiles: ProfileSet,
    private readonly settings: JobQueueSettings,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async enqueue(videoId: string, profileName: string, overwrite = false): Promise<EnqueueResult> {
    assertVideoId(videoId);
    const profile = this.profiles.get(profileName);

    if (!overwrite && (await this.catalog.isReady(videoId, profile.name))) {
      throw new ConflictError(`Video ${videoId} already has a ready ${profile.name} rendition; use overwrite to rebuild it`);
    }

    const record: JobRecord = {
      id: uuidv4(),
      videoId,
      profile: profile.name,
      sourceKey: sourceKeyFor(this.settings.sourceKeyTemplate, videoId),
      overwrite,
      status: 'queued',
      attempts: 0,
      lastError: null,
      createdAt: this.now().toISOString(),
      startedAt: null,
      finishedAt: null,
    };

    const { created, job } = await this.store.create(record);
    if (!created) {
      return this.coalesce(job, overwrite);
    }

    try {
      await this.dispatcher.dispatch(job);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      await this.store.transition(job.id, ['queued'], {
        status: 'failed',
        lastError: { code: 'dispatch_failed', message, transient: false },
        finishedAt: this.now().toISOString(),
      });
      throw err;
    }
    log.info({ jobId: job.id, videoId, profile: profile.name, overwrite }, 'Transcode job enqueued');
    return { job, coalesced: false };
  }

  // Junta o pedido ao job em andamento. Um pedido com overwrite promove um job ainda queued;
  // um job já running sem overwrite publicaria do cache, então o pedido é recusado
  private async coalesce(job: JobRecord, overwrite: boolean): Promise<EnqueueResult> {
    if (overwrite && !job.overwrite) {
      const upgraded = await this.store.transition(job.id, ['queued'], { overwrite: true });
      if (!upgraded.applied) {
        throw new ConflictError(
          `Job ${job.id} for video ${job.videoId} ${job.profile} already started without overwrite; retry once it finishes`,
        );
      }
      log.info({ jobId: job.id, videoId: job.videoId, profile: job.profile }, 'Coalesced job upgraded to overwrite');
      return { job: upgraded.job, coalesced: true };
    }
    log.info({ jobId: job.id, videoId: job.videoId, profile: job.profile, status: job.status }, 'Coalesced into in-flight job');
    return { job, coalesced: true };
  }

  // Um job por perfil, na ordem configurada; conflito num perfil não para os outros
  async enqueueAll(videoId: string, overwrite = false): Promise<EnqueueAllEntry[]> {
    assertVideoId(videoId);
    const out: EnqueueAllEntry[] = [];
    for (const profile of this.profiles.names) {
      try {
        out.push({ profile, ok: true, ...(await this.enqueue(videoId, profile, overwrite)) });
      } catch (err) {
        if (!(err instanceof ConflictError)) throw err;
        out.push({ profile, ok: false, error: err });
      }
    }
    return out;
  }

  async status(jobId: string): Promise<JobRecord> {
    const job = await this.store.get(jobId);
    if (!job) throw new NotFoundError(`Job ${jobId} not found`);
    return job;
  }

  // Só cancela job que ainda não começou
  async cancel(jobId: string): Promise<JobRecord> {
    const result = await this.store.transition(jobId, ['queued'], {
      status: 'failed',
      lastError: { code: 'cancelled', message: 'Cancelled before start', transient: false },
      finishedAt: this.now().toISOString(),
    });
    if (!result.applied) {
      if (!result.job) throw new NotFoundError(`Job ${jobId} not found`);
      throw new ConflictError(`Job ${jobId} is ${result.job.status} and can no longer be cancelled`);
    }
    const withdrawn = await this.dispatcher.withdraw(jobId);
    // Se o worker pegar o job mesmo assim, ele encontra o registro terminal e ignora
    log.info({ jobId, withdrawn }, 'Transcode job cancelled');
    return result.job;
  }

  // Varredura de inicialização:
  // - running com lease vencido perdeu o worker: volta para queued, ou failed se não há tentativas
  // - queued há mais que o lease pode ter perdido o dispatch (crash entre create e dispatch): reenvia
  // Uma falha de reenvio não interrompe o resto; o job continua queued e a próxima varredura tenta de novo
  async recover(): Promise<RecoveryReport> {
    const report: RecoveryReport = { requeued: [], redispatched: [], failed: [] };
    const cutoff = this.now().getTime() - this.settings.leaseTimeoutMs;

    for (const job of await this.store.listActive()) {
      try {
        if (job.status === 'queued') {
          if (Date.parse(job.startedAt ?? job.createdAt) > cutoff) continue;
          await this.dispatcher.redispatch(job);
          report.redispatched.push(job.id);
          continue;
        }
        if (!job.startedAt || Date.parse(job.startedAt) > cutoff) continue;

        if (job.attempts >= this.settings.maxAttempts) {
          const res = await this.store.transition(job.id, ['running'], {
            status: 'failed',
            lastError: { code: 'lease_expired', message: 'Worker lost during the last allowed attempt', transient: true },
            finishedAt: this.now().toISOString(),
          });
          if (res.applied) report.failed.push(job.id);
          continue;
        }

        const res = await this.store.transition(job.id, ['running'], {
          status: 'queued',
          lastError: { code: 'lease_expired', message: 'Worker lost mid-job; requeued', transient: true },
        });
        if (!res.applied) continue;
        await this.dispatcher.redispatch(res.job);
        report.requeued.push(job.id);
      } catch (err) {
        log.error({ err, jobId: job.id, status: job.status }, 'Recovery of job failed, continuing sweep');
      }
    }

    if (report.requeued.length > 0 || report.redispatched.length > 0 || report.failed.length > 0) {
      log.warn(report, 'Recovered stale jobs');
    }
    return report;
  }

  // Remove todas as renditions de um vídeo. Jobs queued são cancelados antes; um job running
  // publicaria de novo o que foi apagado, então a remoção é recusada
  async removeVideo(videoId: string): Promise<RemoveVideoResult> {
    assertVideoId(videoId);
    const active = (await this.store.listActive()).filter((j) => j.videoId === videoId);
    const running = active.find((j) => j.status === 'running');
    if (running) {
      throw new ConflictError(`Video ${videoId} has a running ${running.profile} transcode (job ${running.id}); retry once it finishes`);
    }

    const cancelledJobs: string[] = [];
    for (const job of active) {
      try {
        await this.cancel(job.id);
        cancelledJobs.push(job.id);
      } catch (err) {
        if (!(err instanceof ConflictError)) throw err;
        // Mudou de estado entre a listagem e o cancelamento: só um job running impede a remoção
        const current = await this.store.get(job.id);
        if (current?.status === 'running') {
          throw new ConflictError(`Video ${videoId} has a running ${job.profile} transcode (job ${job.id}); retry once it finishes`);
        }
      }
    }

    const removed = await this.catalog.removeVideo(videoId);
    return { ...removed, cancelledJobs };
  }
}
