import { applyTransition, jobKey, releasesSlot, type CreateResult, type JobPatch, type JobStore, type TransitionResult } from '../../jobStore';
import type { RenditionStore } from '../../renditionStore';
import { TERMINAL_STATUSES, type JobRecord, type JobStatus, type Rendition } from '../../types';

// Mesma semântica dos scripts Lua do RedisJobStore, sem Redis; a regra de transição é a mesma função
export class MemoryJobStore implements JobStore {
  readonly records = new Map<string, JobRecord>();
  private readonly slots = new Map<string, string>();

  async create(job: JobRecord): Promise<CreateResult> {
    const slot = jobKey(job.videoId, job.profile);
    const holder = this.slots.get(slot);
    const existing = holder ? this.records.get(holder) : undefined;
    if (existing) return { created: false, job: { ...existing } };

    this.slots.set(slot, job.id);
    this.records.set(job.id, { ...job });
    return { created: true, job: { ...job } };
  }

  async get(id: string): Promise<JobRecord | null> {
    const job = this.records.get(id);
    return job ? { ...job } : null;
  }

  async transition(id: string, from: readonly JobStatus[], patch: JobPatch): Promise<TransitionResult> {
    const job = this.records.get(id);
    if (!job) return { applied: false, job: null };
    const updated = applyTransition(job, from, patch);
    if (!updated) return { applied: false, job: { ...job } };

    this.records.set(id, updated);
    if (releasesSlot(updated)) {
      const slot = jobKey(updated.videoId, updated.profile);
      if (this.slots.get(slot) === id) this.slots.delete(slot);
    }
    return { applied: true, job: { ...updated } };
  }

  async listActive(): Promise<JobRecord[]> {
    return [...this.records.values()].filter((j) => !TERMINAL_STATUSES.includes(j.status)).map((j) => ({ ...j }));
  }
}

export class MemoryRenditionStore implements RenditionStore {
  private readonly byVideo = new Map<string, Map<string, Rendition>>();

  async get(videoId: string, profile: string): Promise<Rendition | null> {
    const rendition = this.byVideo.get(videoId)?.get(profile);
    return rendition ? { ...rendition, segmentKeys: [...rendition.segmentKeys] } : null;
  }

  async getAll(videoId: string): Promise<Rendition[]> {
    return [...(this.byVideo.get(videoId)?.values() ?? [])].map((r) => ({ ...r, segmentKeys: [...r.segmentKeys] }));
  }

  async put(rendition: Rendition): Promise<void> {
    const profiles = this.byVideo.get(rendition.videoId) ?? new Map<string, Rendition>();
    profiles.set(rendition.profile, { ...rendition, segmentKeys: [...rendition.segmentKeys] });
    this.byVideo.set(rendition.videoId, profiles);
  }

  async deleteAll(videoId: string): Promise<number> {
    const count = this.byVideo.get(videoId)?.size ?? 0;
    this.byVideo.delete(videoId);
    return count;
  }
}
