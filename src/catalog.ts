import { NotFoundError, StorageError } from './errors';
import { KeyedLock } from './keyedLock';
import { createLogger } from './logger';
import { PLAYLIST_NAME, joinKey, renditionPrefix, videoPrefix } from './paths';
import type { ProfileSet } from './profiles';
import type { RenditionStore } from './renditionStore';
import type { StorageAdapter } from './storage';
import type { Rendition } from './types';

const log = createLogger('rendition-catalog');

// Quais renditions de um vídeo podem ser servidas.
// Uma rendition só fica visível via register, depois de playlist e segmentos conferidos no storage.
// Escritas serializadas por (vídeo, perfil); leituras não travam nem voltam ao storage.
export class RenditionCatalog {
  private readonly locks = new KeyedLock();

  constructor(
    private readonly store: RenditionStore,
    private readonly storage: StorageAdapter,
    private readonly profiles: ProfileSet,
    private readonly hlsPrefix: string,
  ) {}

  private lockKey(videoId: string, profile: string): string {
    return `${videoId}:${profile}`;
  }

  // Tira a rendition atual do ar enquanto um job a refaz
  async markPending(videoId: string, profile: string): Promise<void> {
    await this.locks.run(this.lockKey(videoId, profile), async () => {
      const existing = await this.store.get(videoId, profile);
      const prefix = renditionPrefix(this.hlsPrefix, videoId, profile);
      await this.store.put({
        videoId,
        profile,
        playlistKey: existing?.playlistKey ?? joinKey(prefix, PLAYLIST_NAME),
        segmentKeys: existing?.segmentKeys ?? [],
        ready: false,
        updatedAt: new Date().toISOString(),
      });
    });
  }

  async register(rendition: Rendition): Promise<Rendition> {
    this.profiles.get(rendition.profile);
    return this.locks.run(this.lockKey(rendition.videoId, rendition.profile), async () => {
      await this.verifyComplete(rendition);
      const ready: Rendition = { ...rendition, ready: true, updatedAt: new Date().toISOString() };
      await this.store.put(ready);
      log.info({ videoId: ready.videoId, profile: ready.profile, segments: ready.segmentKeys.length }, 'Rendition registered');
      return ready;
    });
  }

  private async verifyComplete(rendition: Rendition): Promise<void> {
    if (rendition.segmentKeys.length === 0) {
      throw new StorageError('incomplete_rendition', `Rendition ${rendition.videoId}/${rendition.profile} has no segments`);
    }
    for (const key of [...rendition.segmentKeys, rendition.playlistKey]) {
      const obj = await this.storage.stat(key);
      if (!obj || obj.size === 0) {
        throw new StorageError('incomplete_rendition', `Rendition ${rendition.videoId}/${rendition.profile} is missing "${key}"`);
      }
    }
  }

  async lookup(videoId: string, profile: string): Promise<Rendition> {
    const rendition = await this.store.get(videoId, profile);
    if (!rendition || !rendition.ready) {
      throw new NotFoundError(`No ready ${profile} rendition for video ${videoId}`);
    }
    return rendition;
  }

  async isReady(videoId: string, profile: string): Promise<boolean> {
    const rendition = await this.store.get(videoId, profile);
    return rendition?.ready === true;
  }

  // Perfis prontos na ordem configurada (o mais baixo primeiro), para fallback no cliente
  async list(videoId: string): Promise<string[]> {
    const all = await this.store.getAll(videoId);
    return this.profiles.sort(all.filter((r) => r.ready).map((r) => r.profile));
  }

  async readyRenditions(videoId: string): Promise<Rendition[]> {
    const names = await this.list(videoId);
    const all = await this.store.getAll(videoId);
    return names.flatMap((name) => all.filter((r) => r.profile === name));
  }

  // Apaga do catálogo primeiro e depois do storage, segurando o lock de todos os profiles do vídeo
  async removeVideo(videoId: string): Promise<{ renditions: number; objects: number }> {
    return this.withVideoLocks(videoId, this.profiles.names, async () => {
      const renditions = await this.store.deleteAll(videoId);
      const objects = await this.storage.removePrefix(videoPrefix(this.hlsPrefix, videoId));
      log.info({ videoId, renditions, objects }, 'Video renditions removed');
      return { renditions, objects };
    });
  }

  // Sempre na ordem configurada dos profiles, para dois chamadores nunca se travarem
  private withVideoLocks<T>(videoId: string, names: readonly string[], fn: () => Promise<T>): Promise<T> {
    const [first, ...rest] = names;
    if (first === undefined) return fn();
    return this.locks.run(this.lockKey(videoId, first), () => this.withVideoLocks(videoId, rest, fn));
  }
}
