import type { TranscodeProfile } from './types';

// Deixa só o nome do segmento (00000.ts) e garante o ENDLIST
export function normalizeMediaPlaylist(content: string): string {
  let out = content.replace(/\r\n/g, '\n').replace(/^(?!#)(?:.*[\\/])?([^\\/\n]+\.ts)[ \t]*$/gm, '$1');
  if (!/#EXT-X-ENDLIST/.test(out)) {
    if (!out.endsWith('\n')) out += '\n';
    out += '#EXT-X-ENDLIST\n';
  }
  return out;
}

export function listSegmentUris(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export type MasterPlaylistEntry = {
  profile: TranscodeProfile;
  uri: string;
};

export function variantBandwidth(profile: TranscodeProfile): number {
  return Math.round((profile.videoBitrateKbps + profile.audioBitrateKbps) * 1100);
}

// Master playlist com as variantes prontas, maior qualidade primeiro
export function buildMasterPlaylist(entries: MasterPlaylistEntry[]): string {
  let content = '#EXTM3U\n#EXT-X-VERSION:3\n#EXT-X-INDEPENDENT-SEGMENTS\n';

  const sorted = [...entries].sort((a, b) => variantBandwidth(b.profile) - variantBandwidth(a.profile));
  for (const { profile, uri } of sorted) {
    content += `#EXT-X-STREAM-INF:BANDWIDTH=${variantBandwidth(profile)},RESOLUTION=${profile.width}x${profile.height}\n`;
    content += `${uri}\n`;
  }
  return content;
}
