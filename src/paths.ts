import { ValidationError } from './errors';

export const PLAYLIST_NAME = 'index.m3u8';
export const SEGMENT_INDEX_WIDTH = 5;

export const PLAYLIST_CONTENT_TYPE = 'application/vnd.apple.mpegurl';
export const SEGMENT_CONTENT_TYPE = 'video/mp2t';
// Padrão entregue ao ffmpeg (-hls_segment_filename)
export const SEGMENT_PATTERN = `%0${SEGMENT_INDEX_WIDTH}d.ts`;

const VIDEO_ID = /^[A-Za-z0-9_-]{1,64}$/;
const SEGMENT_NAME = new RegExp(`^(\\d{${SEGMENT_INDEX_WIDTH}})\\.ts$`);

export function assertVideoId(videoId: string): string {
  if (!VIDEO_ID.test(videoId)) {
    throw new ValidationError(`Invalid video id "${videoId}"`);
  }
  return videoId;
}

export function sourceKeyFor(template: string, videoId: string): string {
  return template.split('{videoId}').join(assertVideoId(videoId));
}

export function renditionPrefix(hlsPrefix: string, videoId: string, profile: string): string {
  return `${hlsPrefix}/${videoId}/${profile}`;
}

export function videoPrefix(hlsPrefix: string, videoId: string): string {
  return `${hlsPrefix}/${videoId}`;
}

export function segmentFileName(index: number): string {
  return `${String(index).padStart(SEGMENT_INDEX_WIDTH, '0')}.ts`;
}

// 00003.ts -> 3; qualquer outro nome -> null
export function parseSegmentFileName(name: string): number | null {
  const match = SEGMENT_NAME.exec(name);
  return match ? Number(match[1]) : null;
}

export function joinKey(prefix: string, name: string): string {
  return `${prefix.replace(/\/+$/, '')}/${name}`;
}

export function baseName(key: string): string {
  const i = key.lastIndexOf('/');
  return i === -1 ? key : key.slice(i + 1);
}
