import { describe, expect, it } from 'vitest';
import { buildMasterPlaylist, listSegmentUris, normalizeMediaPlaylist, variantBandwidth } from './playlist';
import { testProfiles } from './__tests__/helpers/harness';

describe('normalizeMediaPlaylist', () => {
  it('reduces segment paths to basenames and closes the playlist', () => {
    const raw = '#EXTM3U\n#EXTINF:6.000000,\n/tmp/transcode-x/hls/00000.ts\n#EXTINF:4.5,\n/tmp/transcode-x/hls/00001.ts\n';
    expect(normalizeMediaPlaylist(raw)).toBe('#EXTM3U\n#EXTINF:6.000000,\n00000.ts\n#EXTINF:4.5,\n00001.ts\n#EXT-X-ENDLIST\n');
  });

  it('handles windows separators and CRLF', () => {
    expect(normalizeMediaPlaylist('#EXTM3U\r\nC:\\work\\00000.ts\r\n#EXT-X-ENDLIST\r\n')).toBe('#EXTM3U\n00000.ts\n#EXT-X-ENDLIST\n');
  });

  it('adds a trailing newline before ENDLIST when missing', () => {
    expect(normalizeMediaPlaylist('#EXTM3U\n00000.ts')).toBe('#EXTM3U\n00000.ts\n#EXT-X-ENDLIST\n');
  });
});

describe('listSegmentUris', () => {
  it('returns non-tag lines in order', () => {
    expect(listSegmentUris('#EXTM3U\n#EXTINF:6,\n00000.ts\n\n#EXTINF:6,\n00001.ts\n#EXT-X-ENDLIST\n')).toEqual(['00000.ts', '00001.ts']);
  });
});

describe('buildMasterPlaylist', () => {
  const profiles = testProfiles();

  it('computes variant bandwidth from video and audio bitrates', () => {
    expect(variantBandwidth(profiles.get('480p'))).toBe(1680800);
  });

  it('lists variants highest bandwidth first', () => {
    const content = buildMasterPlaylist([
      { profile: profiles.get('360p'), uri: '360p/index.m3u8' },
      { profile: profiles.get('720p'), uri: '720p/index.m3u8' },
    ]);
    expect(content).toBe(
      '#EXTM3U\n#EXT-X-VERSION:3\n#EXT-X-INDEPENDENT-SEGMENTS\n' +
        '#EXT-X-STREAM-INF:BANDWIDTH=3220800,RESOLUTION=1280x720\n720p/index.m3u8\n' +
        '#EXT-X-STREAM-INF:BANDWIDTH=1020800,RESOLUTION=640x360\n360p/index.m3u8\n',
    );
  });
});
