import fs from 'node:fs/promises';
import path from 'node:path';
import type { Encoder, ProbeInfo } from './encoder';
import { AppError, EncodeError, StorageError } from './errors';
import { createLogger } from './logger';
import {
  PLAYLIST_CONTENT_TYPE,
  PLAYLIST_NAME,
  SEGMENT_CONTENT_TYPE,
  SEGMENT_PATTERN,
  baseName,
  joinKey,
} from './paths';
import { listSegmentUris, normalizeMediaPlaylist } from './playlist';
import { exceedsSource } from './profiles';
import { isDiskFull, toStorageError, type StorageAdapter } from './storage';
import type { Rendition, TranscodeProfile } from './types';
import { withTempDir } from './workdir';

const log = createLogger('transcode-engine');

export type TranscodeEngineOptions = {
  segmentSeconds: number;
  preset: string;
  tempRoot?: string;
};

export type TranscodeRequest = {
  videoId: string;
  sourceKey: string;
  profile: TranscodeProfile;
  outputPrefix: string;
  overwrite: boolean;
  signal?: AbortSignal;
  // Chamado logo antes de limpar o prefixo: daqui em diante a rendition antiga deixa de existir
  onPublishStart?: () => Promise<void>;
};

export type TranscodeOutcome = {
  rendition: Rendition;
  cacheHit: boolean;
};

// Gera uma rendition HLS para (fonte, perfil) e publica em outputPrefix.
// A playlist é sempre o último objeto gravado: se ela existe, o upload terminou.
export class TranscodeEngine {
  constructor(
    private readonly storage: StorageAdapter,
    private readonly encoder: Encoder,
    private readonly options: TranscodeEngineOptions,
  ) {}

  async transcode(req: TranscodeRequest): Promise<TranscodeOutcome> {
    const playlistKey = joinKey(req.outputPrefix, PLAYLIST_NAME);

    if (!req.overwrite) {
      const existing = await this.storage.stat(playlistKey);
      if (existing) {
        const rendition = await this.loadPublished(req, playlistKey);
        log.info({ videoId: req.videoId, profile: req.profile.name, segments: rendition.segmentKeys.length }, 'Rendition already published, skipping encode');
        return { rendition, cacheHit: true };
      }
    }

    const source = await this.storage.stat(req.sourceKey);
    if (!source || source.size === 0) {
      throw new EncodeError('source_missing', `Source "${req.sourceKey}" for video ${req.videoId} does not exist`);
    }

    const startTime = Date.now();
    try {
      return await withTempDir(async (tmp) => {
        // 1) Download do original
        const inputPath = path.join(tmp, 'input');
        await this.storage.downloadToFile(req.sourceKey, inputPath);

        // 2) Probe + política de upscale
        const info = await this.probeSource(inputPath, req.sourceKey);
        const sourceHeight = info.height ?? 0;
        if (exceedsSource(req.profile, sourceHeight)) {
          throw new EncodeError(
            'exceeds_source',
            `Profile ${req.profile.name} (${req.profile.height}p) exceeds source height ${sourceHeight}p; not upscaling`,
          );
        }

        // 3) Transcode para HLS
        const outDir = path.join(tmp, 'hls');
        const { playlistPath } = await this.encoder.encodeHls(inputPath, outDir, {
          profile: req.profile,
          segmentSeconds: this.options.segmentSeconds,
          preset: this.options.preset,
          playlistName: PLAYLIST_NAME,
          segmentPattern: SEGMENT_PATTERN,
          videoFps: info.fps,
          includeAudio: info.hasAudio === true,
          audioChannels: info.audioChannels,
          signal: req.signal,
        });
        const transcodeDuration = Date.now() - startTime;

        const playlist = normalizeMediaPlaylist(await fs.readFile(playlistPath, 'utf-8'));
        const segmentNames = listSegmentUris(playlist);
        await this.verifyLocalSegments(outDir, segmentNames);

        // 4) Upload: segmentos primeiro, playlist por último
        const rendition = await this.publish(req, outDir, segmentNames, playlist, playlistKey);
        log.info(
          {
            videoId: req.videoId,
            profile: req.profile.name,
            segments: segmentNames.length,
            transcodeDuration,
            totalDuration: Date.now() - startTime,
          },
          'Rendition encoded and published',
        );
        return { rendition, cacheHit: false };
      }, this.options.tempRoot);
    } catch (err) {
      if (err instanceof AppError) throw err;
      // ENOSPC no diretório temporário ou em qualquer escrita local
      if (isDiskFull(err)) throw toStorageError(err, 'write temp files for', req.outputPrefix);
      throw err;
    }
  }

  private async probeSource(inputPath: string, sourceKey: string): Promise<ProbeInfo> {
    let info: ProbeInfo;
    try {
      info = await this.encoder.probe(inputPath);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new EncodeError('source_corrupt', `Source "${sourceKey}" could not be probed: ${detail}`);
    }
    if (!info.height || !info.width) {
      throw new EncodeError('source_corrupt', `Source "${sourceKey}" has no video stream`);
    }
    return info;
  }

  private async verifyLocalSegments(outDir: string, names: string[]): Promise<void> {
    if (names.length === 0) {
      throw new EncodeError('empty_output', 'Encoder produced a playlist without segments');
    }
    for (const name of names) {
      const st = await fs.stat(path.join(outDir, name)).catch(() => null);
      if (!st || st.size === 0) {
        throw new EncodeError('empty_output', `Encoder output is missing segment ${name}`);
      }
    }
  }

  private async publish(
    req: TranscodeRequest,
    outDir: string,
    segmentNames: string[],
    playlist: string,
    playlistKey: string,
  ): Promise<Rendition> {
    const segmentKeys = segmentNames.map((name) => joinKey(req.outputPrefix, name));
    req.signal?.throwIfAborted();
    // Fora do try: se falhar aqui nada foi apagado e não há o que limpar
    await req.onPublishStart?.();
    try {
      // Limpa sobras de uma execução anterior (overwrite ou crash no meio do upload)
      const removed = await this.storage.removePrefix(req.outputPrefix);
      if (removed > 0) {
        log.info({ videoId: req.videoId, profile: req.profile.name, removed }, 'Cleared previous rendition output');
      }
      for (let i = 0; i < segmentNames.length; i++) {
        req.signal?.throwIfAborted();
        await this.storage.putFile(segmentKeys[i], path.join(outDir, segmentNames[i]), SEGMENT_CONTENT_TYPE);
      }
      req.signal?.throwIfAborted();
      await this.storage.put(playlistKey, playlist, PLAYLIST_CONTENT_TYPE);
    } catch (err) {
      // Abortado por timeout: a próxima tentativa limpa o prefixo antes de escrever
      if (req.signal?.aborted) throw err;
      await this.cleanup(req);
      throw err instanceof StorageError ? err : toStorageError(err, 'publish', req.outputPrefix);
    }
    return {
      videoId: req.videoId,
      profile: req.profile.name,
      playlistKey,
      segmentKeys,
      ready: false,
      updatedAt: new Date().toISOString(),
    };
  }

  private async cleanup(req: TranscodeRequest): Promise<void> {
    try {
      await this.storage.removePrefix(req.outputPrefix);
    } catch (cleanupErr) {
      log.error({ err: cleanupErr, outputPrefix: req.outputPrefix }, 'Rollback of partial rendition failed - manual cleanup required');
    }
  }

  private async loadPublished(req: TranscodeRequest, playlistKey: string): Promise<Rendition> {
    const playlist = (await this.storage.read(playlistKey)).toString('utf-8');
    return {
      videoId: req.videoId,
      profile: req.profile.name,
      playlistKey,
      segmentKeys: listSegmentUris(playlist).map((uri) => joinKey(req.outputPrefix, baseName(uri))),
      ready: false,
      updatedAt: new Date().toISOString(),
    };
  }
}
