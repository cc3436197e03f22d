import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import ffprobeInstaller from '@ffprobe-installer/ffprobe';
import ffmpeg, { type FfprobeData } from 'fluent-ffmpeg';
import fs from 'node:fs/promises';
import path from 'node:path';
import { classifyEncoderFailure, segmentAtTimemark, type Encoder, type HlsRenditionOptions, type ProbeInfo } from './encoder';
import { EncodeError } from './errors';
import { createLogger } from './logger';

const log = createLogger('ffmpeg');

function parseFrameRate(rate: string | undefined): number | undefined {
  if (!rate || !rate.includes('/')) return undefined;
  const [num, den] = rate.split('/').map(Number);
  return den ? num / den : undefined;
}

// "ffmpeg exited with code 1: ..." / "ffmpeg was killed with signal SIGKILL"
function exitFromError(err: Error): { exitCode?: number; signal?: string } {
  const code = /exited with code (\d+)/.exec(err.message);
  if (code) return { exitCode: Number(code[1]) };
  const signal = /killed with signal (\w+)/.exec(err.message);
  if (signal) return { signal: signal[1] };
  return {};
}

export class FfmpegEncoder implements Encoder {
  constructor() {
    ffmpeg.setFfmpegPath(process.env.FFMPEG_PATH ?? ffmpegInstaller.path);
    ffmpeg.setFfprobePath(process.env.FFPROBE_PATH ?? ffprobeInstaller.path);
  }

  probe(filePath: string): Promise<ProbeInfo> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (err: Error | null, data: FfprobeData) => {
        if (err) return reject(err);
        // Obter os streams de vídeo e áudio
        const vStream = data.streams.find((s) => s.codec_type === 'video');
        const aStream = data.streams.find((s) => s.codec_type === 'audio');
        resolve({
          durationSeconds: Number(data.format.duration ?? 0),
          width: vStream?.width,
          height: vStream?.height,
          fps: parseFrameRate(vStream?.r_frame_rate),
          hasAudio: Boolean(aStream),
          audioChannels: aStream?.channels,
        });
      });
    });
  }

  async encodeHls(inputFile: string, outDir: string, options: HlsRenditionOptions): Promise<{ playlistPath: string }> {
    await fs.mkdir(outDir, { recursive: true });
    const { profile, segmentSeconds } = options;
    const playlistPath = path.join(outDir, options.playlistName);
    const segmentPath = path.join(outDir, options.segmentPattern);
    const fps = Math.max(1, Math.round(options.videoFps || 24));
    // GOP alinhado ao tamanho do segmento para cortes exatos
    const gopSize = Math.max(24, Math.round(fps * segmentSeconds));
    const vBitrate = `${profile.videoBitrateKbps}k`;
    const { width, height } = profile;

    // Opções de vídeo: H.264 com bitrate fixo pelo perfil
    const opts: string[] = [
      `-preset ${options.preset}`,
      `-b:v ${vBitrate}`,
      `-maxrate ${vBitrate}`,
      `-bufsize ${profile.videoBitrateKbps * 2}k`,
      '-profile:v main',
      '-sc_threshold 0',
      `-g ${gopSize}`,
      `-keyint_min ${gopSize}`,
      '-pix_fmt yuv420p',
      '-map 0:v:0',
    ];
    // Áudio só quando a fonte tem; no máximo estéreo
    if (options.includeAudio) {
      opts.push('-map 0:a:0?', `-b:a ${profile.audioBitrateKbps}k`, '-ar 48000');
      opts.push(`-ac ${Math.max(1, Math.min(2, options.audioChannels || 2))}`);
    } else {
      opts.push('-an');
    }
    // Sem legendas, dados e metadados; segmentos MPEG-TS numa playlist VOD
    opts.push(
      '-sn',
      '-dn',
      '-map_metadata -1',
      '-map_chapters -1',
      `-force_key_frames expr:gte(t,n_forced*${segmentSeconds})`,
      `-hls_time ${segmentSeconds}`,
      '-hls_playlist_type vod',
      '-hls_flags independent_segments',
      '-hls_segment_type mpegts',
      '-hls_list_size 0',
      '-hls_segment_filename',
      segmentPath,
    );

    // Escala mantendo o aspecto e completa com barras até o tamanho do perfil
    let command = ffmpeg(inputFile)
      .videoCodec('libx264')
      .videoFilters(`scale=${width}:${height}:force_original_aspect_ratio=decrease,pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`);
    if (options.includeAudio) {
      command = command.audioCodec('aac');
    }

    await new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        log.warn({ profile: profile.name, inputFile }, 'Aborting ffmpeg');
        command.kill('SIGKILL');
      };
      // Timeout do job mata o processo
      if (options.signal?.aborted) {
        reject(new EncodeError('aborted', 'Encode aborted before start', true));
        return;
      }
      options.signal?.addEventListener('abort', onAbort, { once: true });

      let lastLoggedSegment = -1;
      command
        .outputOptions(opts)
        .output(playlistPath)
        .format('hls')
        .on('start', (cmd: string) => log.info({ cmd, profile: profile.name }, `ffmpeg start ${profile.name}`))
        .on('progress', (p: { frames?: number; timemark?: string; currentFps?: number }) => {
          // Loga uma vez por segmento, não a cada evento de progresso
          const segment = segmentAtTimemark(p.timemark, segmentSeconds);
          if (segment !== undefined && segment > lastLoggedSegment) {
            lastLoggedSegment = segment;
            log.debug({ profile: profile.name, segment, timemark: p.timemark, currentFps: p.currentFps }, 'ffmpeg progress');
          }
        })
        .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
          options.signal?.removeEventListener('abort', onAbort);
          const failure = classifyEncoderFailure({ ...exitFromError(err), stderr: stderr ?? err.message });
          log.error({ err, profile: profile.name, inputFile, reason: failure.reason }, `ffmpeg error ${profile.name}`);
          reject(failure);
        })
        .on('end', () => {
          options.signal?.removeEventListener('abort', onAbort);
          log.info({ profile: profile.name, playlistPath }, `ffmpeg finished ${profile.name}`);
          resolve();
        })
        .run();
    });

    return { playlistPath };
  }
}
