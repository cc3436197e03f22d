import type { Readable } from 'node:stream';
import type { RenditionCatalog } from './catalog';
import { DeliveryError, NotFoundError } from './errors';
import { createLogger } from './logger';
import { PLAYLIST_CONTENT_TYPE, PLAYLIST_NAME, SEGMENT_CONTENT_TYPE, assertVideoId } from './paths';
import { buildMasterPlaylist } from './playlist';
import type { ProfileSet } from './profiles';
import type { ByteRange, StorageAdapter } from './storage';

const log = createLogger('delivery');

export type PlaylistBody = {
  body: string;
  contentType: string;
};

export type SegmentHandle = {
  key: string;
  size: number;
  contentType: string;
  read(range?: ByteRange): Promise<Readable>;
};

// Leitura: resolve (vídeo, resolução, segmento) pelo catálogo e faz stream do storage.
// Só serve o que o catálogo marca como pronto.
export class StreamingDeliveryService {
  constructor(
    private readonly catalog: RenditionCatalog,
    private readonly storage: StorageAdapter,
    private readonly profiles: ProfileSet,
  ) {}

  async getPlaylist(videoId: string, resolution: string): Promise<PlaylistBody> {
    assertVideoId(videoId);
    const profile = this.profiles.get(resolution);
    const rendition = await this.catalog.lookup(videoId, profile.name);

    let body: Buffer;
    try {
      body = await this.storage.read(rendition.playlistKey);
    } catch (err) {
      log.error({ err, videoId, profile: profile.name, key: rendition.playlistKey }, 'Registered playlist is unreadable');
      throw new DeliveryError(`Playlist for ${videoId}/${profile.name} could not be read`, { cause: err });
    }
    return { body: body.toString('utf-8'), contentType: PLAYLIST_CONTENT_TYPE };
  }

  async getMasterPlaylist(videoId: string): Promise<PlaylistBody> {
    assertVideoId(videoId);
    const ready = await this.catalog.readyRenditions(videoId);
    if (ready.length === 0) {
      throw new NotFoundError(`No ready renditions for video ${videoId}`);
    }
    const entries = ready.map((r) => ({
      profile: this.profiles.get(r.profile),
      uri: `${r.profile}/${PLAYLIST_NAME}`,
    }));
    return { body: buildMasterPlaylist(entries), contentType: PLAYLIST_CONTENT_TYPE };
  }

  async openSegment(videoId: string, resolution: string, index: number): Promise<SegmentHandle> {
    assertVideoId(videoId);
    const profile = this.profiles.get(resolution);
    const rendition = await this.catalog.lookup(videoId, profile.name);

    if (!Number.isInteger(index) || index < 0 || index >= rendition.segmentKeys.length) {
      throw new NotFoundError(`Segment ${index} does not exist for ${videoId}/${profile.name}`);
    }
    const key = rendition.segmentKeys[index];

    const stored = await this.storage.stat(key).catch((err: unknown) => {
      throw new DeliveryError(`Segment ${key} could not be stat'ed`, { cause: err });
    });
    if (!stored || stored.size === 0) {
      // Registrado como pronto mas sumiu do storage: problema de integridade, não 404
      log.error({ videoId, profile: profile.name, key }, 'Registered segment is missing from storage');
      throw new DeliveryError(`Segment ${key} is registered but missing from storage`);
    }

    return {
      key,
      size: stored.size,
      contentType: SEGMENT_CONTENT_TYPE,
      read: async (range?: ByteRange) => {
        try {
          return await this.storage.createReadStream(key, range);
        } catch (err) {
          log.error({ err, key, range }, 'Failed to open segment stream');
          throw new DeliveryError(`Segment ${key} could not be read`, { cause: err });
        }
      },
    };
  }
}
