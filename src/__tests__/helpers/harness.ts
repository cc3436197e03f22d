import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { RenditionCatalog } from '../../catalog';
import { TranscodeJobQueue } from '../../jobQueue';
import { LocalStorage } from '../../localStorage';
import { parseProfiles, ProfileSet } from '../../profiles';
import { renditionPrefix, sourceKeyFor } from '../../paths';
import { TranscodeEngine, type TranscodeOutcome } from '../../transcodeEngine';
import type { TranscodeJobDeps } from '../../transcodeJob';
import { FakeDispatcher } from './fakeDispatcher';
import { FakeEncoder } from './fakeEncoder';
import { MemoryJobStore, MemoryRenditionStore } from './memoryStores';

export const TEST_PROFILES = '360p:640x360:800,480p:854x480:1400,720p:1280x720:2800';
export const HLS_PREFIX = 'hls';
export const SOURCE_TEMPLATE = 'videos/{videoId}/source.mp4';
export const SEGMENT_SECONDS = 6;

export function testProfiles(): ProfileSet {
  return new ProfileSet(parseProfiles(TEST_PROFILES, 128));
}

export type Harness = {
  root: string;
  storage: LocalStorage;
  profiles: ProfileSet;
  jobStore: MemoryJobStore;
  renditionStore: MemoryRenditionStore;
  catalog: RenditionCatalog;
  encoder: FakeEncoder;
  engine: TranscodeEngine;
  dispatcher: FakeDispatcher;
  jobQueue: TranscodeJobQueue;
  jobDeps: TranscodeJobDeps;
  clock: { now: Date };
  addSource(videoId: string, body?: string): Promise<void>;
  // Transcode direto pelo engine, sem passar pela fila
  publish(videoId: string, profile: string, overwrite?: boolean): Promise<TranscodeOutcome>;
  cleanup(): Promise<void>;
};

export async function createHarness(options: { maxAttempts?: number; jobTimeoutMs?: number; leaseTimeoutMs?: number } = {}): Promise<Harness> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'hls-test-'));
  const workDir = path.join(root, 'work');
  await fs.mkdir(workDir);

  const storage = new LocalStorage(path.join(root, 'media'));
  const profiles = testProfiles();
  const jobStore = new MemoryJobStore();
  const renditionStore = new MemoryRenditionStore();
  const catalog = new RenditionCatalog(renditionStore, storage, profiles, HLS_PREFIX);
  const encoder = new FakeEncoder();
  const engine = new TranscodeEngine(storage, encoder, { segmentSeconds: SEGMENT_SECONDS, preset: 'veryfast', tempRoot: workDir });
  const dispatcher = new FakeDispatcher();
  const clock = { now: new Date('2026-03-01T12:00:00.000Z') };
  const now = () => new Date(clock.now.getTime());
  const maxAttempts = options.maxAttempts ?? 3;

  const jobQueue = new TranscodeJobQueue(
    jobStore,
    catalog,
    dispatcher,
    profiles,
    { sourceKeyTemplate: SOURCE_TEMPLATE, maxAttempts, leaseTimeoutMs: options.leaseTimeoutMs ?? 45 * 60 * 1000 },
    now,
  );
  const jobDeps: TranscodeJobDeps = {
    store: jobStore,
    catalog,
    engine,
    profiles,
    hlsPrefix: HLS_PREFIX,
    maxAttempts,
    jobTimeoutMs: options.jobTimeoutMs ?? 30 * 60 * 1000,
    now,
  };

  return {
    root,
    storage,
    profiles,
    jobStore,
    renditionStore,
    catalog,
    encoder,
    engine,
    dispatcher,
    jobQueue,
    jobDeps,
    clock,
    async addSource(videoId: string, body = 'not really an mp4') {
      await storage.put(sourceKeyFor(SOURCE_TEMPLATE, videoId), body);
    },
    publish(videoId: string, profile: string, overwrite = false) {
      return engine.transcode({
        videoId,
        sourceKey: sourceKeyFor(SOURCE_TEMPLATE, videoId),
        profile: profiles.get(profile),
        outputPrefix: renditionPrefix(HLS_PREFIX, videoId, profile),
        overwrite,
      });
    },
    async cleanup() {
      await fs.rm(root, { recursive: true, force: true });
    },
  };
}
