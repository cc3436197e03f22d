import type IORedis from 'ioredis';
import { z } from 'zod';
import type { Rendition } from './types';

const renditionSchema = z.object({
  videoId: z.string(),
  profile: z.string(),
  playlistKey: z.string(),
  segmentKeys: z.array(z.string()),
  ready: z.boolean(),
  updatedAt: z.string(),
});

// Metadados de rendition por (vídeo, perfil); put troca o registro inteiro
export interface RenditionStore {
  get(videoId: string, profile: string): Promise<Rendition | null>;
  getAll(videoId: string): Promise<Rendition[]>;
  put(rendition: Rendition): Promise<void>;
  deleteAll(videoId: string): Promise<number>;
}

export type RenditionStoreRedis = Pick<IORedis, 'hget' | 'hgetall' | 'hset' | 'hlen' | 'del'>;

// Um hash por vídeo: campo = profile, valor = JSON da rendition
export class RedisRenditionStore implements RenditionStore {
  constructor(
    private readonly redis: RenditionStoreRedis,
    private readonly namespace: string,
  ) {}

  private hashKey(videoId: string): string {
    return `${this.namespace}:renditions:${videoId}`;
  }

  async get(videoId: string, profile: string): Promise<Rendition | null> {
    const raw = await this.redis.hget(this.hashKey(videoId), profile);
    return raw ? renditionSchema.parse(JSON.parse(raw)) : null;
  }

  async getAll(videoId: string): Promise<Rendition[]> {
    const all = await this.redis.hgetall(this.hashKey(videoId));
    return Object.values(all).map((raw) => renditionSchema.parse(JSON.parse(raw)));
  }

  async put(rendition: Rendition): Promise<void> {
    await this.redis.hset(this.hashKey(rendition.videoId), rendition.profile, JSON.stringify(rendition));
  }

  async deleteAll(videoId: string): Promise<number> {
    const count = await this.redis.hlen(this.hashKey(videoId));
    await this.redis.del(this.hashKey(videoId));
    return count;
  }
}
