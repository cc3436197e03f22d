import type IORedis from 'ioredis';
import { z } from 'zod';
import { ConflictError } from './errors';
import { TERMINAL_STATUSES, type JobRecord, type JobStatus } from './types';

const jobFailureSchema = z.object({
  code: z.string(),
  message: z.string(),
  transient: z.boolean(),
});

export const jobRecordSchema = z.object({
  id: z.string(),
  videoId: z.string(),
  profile: z.string(),
  sourceKey: z.string(),
  overwrite: z.boolean(),
  status: z.enum(['queued', 'running', 'succeeded', 'failed']),
  attempts: z.number().int().nonnegative(),
  lastError: jobFailureSchema.nullable(),
  createdAt: z.string(),
  startedAt: z.string().nullable(),
  finishedAt: z.string().nullable(),
});

export type JobPatch = Partial<Pick<JobRecord, 'status' | 'attempts' | 'lastError' | 'startedAt' | 'finishedAt' | 'overwrite'>>;

export type CreateResult = {
  // false: já existia um job não terminal para o mesmo (video, profile)
  created: boolean;
  job: JobRecord;
};

export type TransitionResult = { applied: true; job: JobRecord } | { applied: false; job: JobRecord | null };

// Registros de job. No máximo um job não terminal por (vídeo, perfil);
// transições são compare-and-set sobre o status atual.
export interface JobStore {
  create(job: JobRecord): Promise<CreateResult>;
  get(id: string): Promise<JobRecord | null>;
  transition(id: string, from: readonly JobStatus[], patch: JobPatch): Promise<TransitionResult>;
  listActive(): Promise<JobRecord[]>;
}

export function jobKey(videoId: string, profile: string): string {
  return `${videoId}:${profile}`;
}

// Regra de transição compartilhada pelos stores: null quando o status atual não está em `from`
export function applyTransition(job: JobRecord, from: readonly JobStatus[], patch: JobPatch): JobRecord | null {
  if (!from.includes(job.status)) return null;
  return { ...job, ...patch };
}

// Um job terminal libera o slot do seu (video, profile), se ainda for o dono
export function releasesSlot(job: JobRecord): boolean {
  return TERMINAL_STATUSES.includes(job.status);
}

// KEYS: slot, registro novo, set de ativos, registro do dono atual do slot (ou o novo quando livre)
// ARGV: dono esperado do slot ('' = livre), id, json
// {2}: o slot mudou desde a leitura, o chamador tenta de novo
const CREATE_SCRIPT = `
local holder = redis.call('GET', KEYS[1]) or ''
if holder ~= ARGV[1] then return {2} end
if holder ~= '' then
  local existing = redis.call('GET', KEYS[4])
  if existing then return {0, existing} end
end
redis.call('SET', KEYS[1], ARGV[2])
redis.call('SET', KEYS[2], ARGV[3])
redis.call('SADD', KEYS[3], ARGV[2])
return {1, ARGV[3]}
`;

// KEYS: registro do job, set de ativos, slot do (video, profile). ARGV: status permitidos, patch
const TRANSITION_SCRIPT = `
local raw = redis.call('GET', KEYS[1])
if not raw then return {-1} end
local job = cjson.decode(raw)
local allowed = cjson.decode(ARGV[1])
local ok = false
for _, s in ipairs(allowed) do
  if s == job.status then ok = true end
end
if not ok then return {0, raw} end
for k, v in pairs(cjson.decode(ARGV[2])) do job[k] = v end
local updated = cjson.encode(job)
redis.call('SET', KEYS[1], updated)
if job.status == 'succeeded' or job.status == 'failed' then
  if redis.call('GET', KEYS[3]) == job.id then redis.call('DEL', KEYS[3]) end
  redis.call('SREM', KEYS[2], job.id)
end
return {1, updated}
`;

const CREATE_ATTEMPTS = 5;

// {status} ou {status, json}
const scriptReply = z.tuple([z.number()]).rest(z.string());

// Só os comandos que o store usa
export type JobStoreRedis = Pick<IORedis, 'get' | 'eval' | 'smembers' | 'mget'>;

// No Redis: um JSON por job, uma chave de slot por (vídeo, perfil) com o id do job
// não terminal, e um set com os ids não terminais para o recover.
// Todas as chaves levam a hash tag {namespace}, então os scripts ficam num slot só do Cluster.
export class RedisJobStore implements JobStore {
  constructor(
    private readonly redis: JobStoreRedis,
    private readonly namespace: string,
  ) {}

  private recordKey(id: string): string {
    return `{${this.namespace}}:job:${id}`;
  }

  private slotKey(videoId: string, profile: string): string {
    return `{${this.namespace}}:active:${jobKey(videoId, profile)}`;
  }

  private activeSetKey(): string {
    return `{${this.namespace}}:jobs:active`;
  }

  private parse(raw: string): JobRecord {
    return jobRecordSchema.parse(JSON.parse(raw));
  }

  async create(job: JobRecord): Promise<CreateResult> {
    const slot = this.slotKey(job.videoId, job.profile);
    const json = JSON.stringify(job);

    for (let attempt = 1; attempt <= CREATE_ATTEMPTS; attempt++) {
      const holder = (await this.redis.get(slot)) ?? '';
      const reply = scriptReply.parse(
        await this.redis.eval(
          CREATE_SCRIPT,
          4,
          slot,
          this.recordKey(job.id),
          this.activeSetKey(),
          this.recordKey(holder || job.id),
          holder,
          job.id,
          json,
        ),
      );
      const outcome = reply[0];
      if (outcome === 2) continue;
      const raw: string | undefined = reply[1];
      return { created: outcome === 1, job: raw ? this.parse(raw) : job };
    }
    throw new ConflictError(`Could not claim ${jobKey(job.videoId, job.profile)} after ${CREATE_ATTEMPTS} attempts; retry the request`);
  }

  async get(id: string): Promise<JobRecord | null> {
    const raw = await this.redis.get(this.recordKey(id));
    return raw ? this.parse(raw) : null;
  }

  async transition(id: string, from: readonly JobStatus[], patch: JobPatch): Promise<TransitionResult> {
    // videoId e profile nunca mudam: o slot pode ser calculado antes do script
    const current = await this.get(id);
    if (!current) return { applied: false, job: null };

    const reply = scriptReply.parse(
      await this.redis.eval(
        TRANSITION_SCRIPT,
        3,
        this.recordKey(id),
        this.activeSetKey(),
        this.slotKey(current.videoId, current.profile),
        JSON.stringify(from),
        JSON.stringify(patch),
      ),
    );
    const outcome = reply[0];
    const raw: string | undefined = reply[1];
    if (outcome === 1 && raw) return { applied: true, job: this.parse(raw) };
    return { applied: false, job: raw ? this.parse(raw) : null };
  }

  async listActive(): Promise<JobRecord[]> {
    const ids = await this.redis.smembers(this.activeSetKey());
    if (ids.length === 0) return [];
    const raws = await this.redis.mget(ids.map((id) => this.recordKey(id)));
    return raws.filter((raw): raw is string => raw !== null).map((raw) => this.parse(raw));
  }
}
