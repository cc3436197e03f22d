import { EncodeError, StorageError } from './errors';
import type { TranscodeProfile } from './types';

export type ProbeInfo = {
  durationSeconds: number;
  width?: number;
  height?: number;
  fps?: number;
  hasAudio?: boolean;
  audioChannels?: number;
};

export type HlsRenditionOptions = {
  profile: TranscodeProfile;
  segmentSeconds: number;
  preset: string;
  playlistName: string;
  segmentPattern: string;
  videoFps?: number;
  includeAudio: boolean;
  audioChannels?: number;
  signal?: AbortSignal;
};

// Encoder/segmentador externo: grava uma playlist e os segmentos em outDir
export interface Encoder {
  probe(inputFile: string): Promise<ProbeInfo>;
  encodeHls(inputFile: string, outDir: string, options: HlsRenditionOptions): Promise<{ playlistPath: string }>;
}

const TIMEMARK = /^(\d+):([0-5]\d):(\d+(?:\.\d+)?)$/;

// Índice do segmento que o encoder está gerando, a partir do timemark de progresso (HH:MM:SS.mmm)
export function segmentAtTimemark(timemark: string | undefined, segmentSeconds: number): number | undefined {
  const match = TIMEMARK.exec(timemark ?? '');
  if (!match || segmentSeconds <= 0) return undefined;
  const seconds = Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3]);
  return Math.floor(seconds / segmentSeconds);
}

export type EncoderExit = {
  exitCode?: number;
  signal?: string;
  stderr: string;
};

const DISK_FULL = /No space left on device/i;
const RESOURCE_EXHAUSTION =
  /Cannot allocate memory|Resource temporarily unavailable|out of memory|Connection timed out|I\/O error/i;
// 137 = SIGKILL (OOM killer), 255 = interrompido
const TRANSIENT_EXIT_CODES = new Set([137, 255]);

function lastLines(stderr: string, count = 3): string {
  return stderr.trim().split(/\r?\n/).slice(-count).join(' | ');
}

// Disco cheio é erro de storage, falta de recurso é transiente, o resto é fatal
export function classifyEncoderFailure(exit: EncoderExit): EncodeError | StorageError {
  const detail = lastLines(exit.stderr) || 'no stderr output';
  const how = exit.signal ? `killed by ${exit.signal}` : `exited with code ${exit.exitCode ?? 'unknown'}`;

  if (DISK_FULL.test(exit.stderr)) {
    return new StorageError('disk_full', `Encoder ran out of disk space: ${detail}`);
  }
  if (exit.signal || (exit.exitCode !== undefined && TRANSIENT_EXIT_CODES.has(exit.exitCode)) || RESOURCE_EXHAUSTION.test(exit.stderr)) {
    return new EncodeError('encoder_transient', `Encoder ${how}: ${detail}`, true);
  }
  return new EncodeError('encoder_failed', `Encoder ${how}: ${detail}`, false);
}
