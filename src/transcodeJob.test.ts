import { UnrecoverableError } from 'bullmq';
import { afterEach, describe, expect, it } from 'vitest';
import { EncodeError, TimeoutError } from './errors';
import { handleTranscodeJob, runWithTimeout } from './transcodeJob';
import type { JobRecord } from './types';
import { createHarness, type Harness } from './__tests__/helpers/harness';

describe('handleTranscodeJob', () => {
  let h: Harness;

  afterEach(async () => {
    await h.cleanup();
  });

  function run(job: JobRecord) {
    return handleTranscodeJob({ id: job.id, data: { jobId: job.id, videoId: job.videoId, profile: job.profile } }, h.jobDeps);
  }

  it('transcodes, registers and marks the job succeeded', async () => {
    h = await createHarness();
    await h.addSource('42');
    const { job } = await h.jobQueue.enqueue('42', '480p');

    const result = await run(job);

    expect(result).toEqual({
      jobId: job.id,
      status: 'succeeded',
      playlistKey: 'hls/42/480p/index.m3u8',
      segmentCount: 3,
      cacheHit: false,
    });
    expect(await h.jobQueue.status(job.id)).toMatchObject({
      status: 'succeeded',
      attempts: 1,
      lastError: null,
      startedAt: '2026-03-01T12:00:00.000Z',
      finishedAt: '2026-03-01T12:00:00.000Z',
    });
    expect(await h.catalog.list('42')).toEqual(['480p']);
  });

  it('stops after exactly maxAttempts transient failures', async () => {
    h = await createHarness({ maxAttempts: 3 });
    await h.addSource('42');
    h.encoder.alwaysFail = () => new EncodeError('encoder_transient', 'Encoder killed by SIGKILL: Killed', true);
    const { job } = await h.jobQueue.enqueue('42', '480p');

    await expect(run(job)).rejects.toBeInstanceOf(EncodeError);
    expect(await h.jobQueue.status(job.id)).toMatchObject({ status: 'queued', attempts: 1 });
    await expect(run(job)).rejects.toBeInstanceOf(EncodeError);
    await expect(run(job)).rejects.toBeInstanceOf(UnrecoverableError);

    expect(await h.jobQueue.status(job.id)).toMatchObject({
      status: 'failed',
      attempts: 3,
      lastError: { code: 'encoder_transient', transient: true },
    });
    expect(h.encoder.encodeCalls).toBe(3);

    // Uma entrega extra do backend não roda o job de novo
    expect(await run(job)).toEqual({ jobId: job.id, status: 'failed' });
    expect(h.encoder.encodeCalls).toBe(3);
  });

  it('does not retry fatal failures', async () => {
    h = await createHarness();
    const { job } = await h.jobQueue.enqueue('42', '480p');

    await expect(run(job)).rejects.toBeInstanceOf(UnrecoverableError);
    expect(await h.jobQueue.status(job.id)).toMatchObject({
      status: 'failed',
      attempts: 1,
      lastError: { code: 'source_missing', transient: false },
    });
    expect(h.encoder.encodeCalls).toBe(0);
  });

  it('fails profiles above the source resolution without registering them', async () => {
    h = await createHarness();
    await h.addSource('42');
    h.encoder.probeInfo = { durationSeconds: 30, width: 854, height: 480, hasAudio: true };
    const { job } = await h.jobQueue.enqueue('42', '720p');

    await expect(run(job)).rejects.toThrow('Profile 720p (720p) exceeds source height 480p; not upscaling');
    expect((await h.jobQueue.status(job.id)).lastError?.code).toBe('exceeds_source');
    expect(await h.catalog.isReady('42', '720p')).toBe(false);
  });

  it('retries a job that hit the wall-clock limit', async () => {
    h = await createHarness({ jobTimeoutMs: 50, maxAttempts: 2 });
    await h.addSource('42');
    h.encoder.hang = true;
    const { job } = await h.jobQueue.enqueue('42', '480p');

    await expect(run(job)).rejects.toBeInstanceOf(TimeoutError);
    expect(await h.jobQueue.status(job.id)).toMatchObject({
      status: 'queued',
      lastError: { code: 'timeout', transient: true },
    });
    expect(await h.storage.list('hls/42')).toEqual([]);

    h.encoder.hang = false;
    expect((await run(job)).status).toBe('succeeded');
  });

  it('skips jobs cancelled before they started', async () => {
    h = await createHarness();
    await h.addSource('42');
    const { job } = await h.jobQueue.enqueue('42', '480p');
    await h.jobQueue.cancel(job.id);

    expect(await run(job)).toEqual({ jobId: job.id, status: 'failed' });
    expect(h.encoder.encodeCalls).toBe(0);
  });

  it('rejects deliveries without a job record', async () => {
    h = await createHarness();
    await expect(
      handleTranscodeJob({ id: 'ghost', data: { jobId: 'ghost', videoId: '42', profile: '480p' } }, h.jobDeps),
    ).rejects.toThrow('Job record ghost not found');
  });

  it('keeps serving the old rendition when an overwrite fails before publishing', async () => {
    h = await createHarness();
    await h.addSource('42');
    h.encoder.segmentCount = 4;
    await run((await h.jobQueue.enqueue('42', '480p')).job);

    h.encoder.failures.push(new EncodeError('encoder_failed', 'Encoder exited with code 1: Invalid data'));
    const rebuild = (await h.jobQueue.enqueue('42', '480p', true)).job;
    await expect(run(rebuild)).rejects.toBeInstanceOf(UnrecoverableError);

    expect(await h.catalog.isReady('42', '480p')).toBe(true);
    expect((await h.catalog.lookup('42', '480p')).segmentKeys).toHaveLength(4);
    expect(await h.storage.list('hls/42/480p')).toHaveLength(5);
  });

  it('keeps serving the old rendition when an overwrite times out while encoding', async () => {
    h = await createHarness({ jobTimeoutMs: 50, maxAttempts: 1 });
    await h.addSource('42');
    await run((await h.jobQueue.enqueue('42', '480p')).job);

    h.encoder.hang = true;
    const rebuild = (await h.jobQueue.enqueue('42', '480p', true)).job;
    await expect(run(rebuild)).rejects.toBeInstanceOf(UnrecoverableError);

    expect((await h.jobQueue.status(rebuild.id)).lastError?.code).toBe('timeout');
    expect(await h.catalog.list('42')).toEqual(['480p']);
  });

  it('hides the rendition while an overwrite publishes and shows the new one after', async () => {
    h = await createHarness();
    await h.addSource('42');
    h.encoder.segmentCount = 4;
    await run((await h.jobQueue.enqueue('42', '480p')).job);

    let readyWhenPublishing: boolean | undefined;
    const markPending = h.catalog.markPending.bind(h.catalog);
    h.jobDeps.catalog.markPending = async (videoId: string, profile: string) => {
      await markPending(videoId, profile);
      readyWhenPublishing = await h.catalog.isReady(videoId, profile);
    };

    h.encoder.segmentCount = 2;
    const rebuild = (await h.jobQueue.enqueue('42', '480p', true)).job;
    expect((await run(rebuild)).segmentCount).toBe(2);

    expect(readyWhenPublishing).toBe(false);
    expect((await h.catalog.lookup('42', '480p')).segmentKeys).toEqual(['hls/42/480p/00000.ts', 'hls/42/480p/00001.ts']);
    expect((await h.storage.list('hls/42/480p')).map((o) => o.key)).toEqual([
      'hls/42/480p/00000.ts',
      'hls/42/480p/00001.ts',
      'hls/42/480p/index.m3u8',
    ]);
  });
});

describe('runWithTimeout', () => {
  it('returns the result when work finishes in time', async () => {
    await expect(runWithTimeout(1000, async () => 'done')).resolves.toBe('done');
  });

  it('aborts the signal and rejects with a timeout', async () => {
    let seen: AbortSignal | undefined;
    const err = await runWithTimeout(10, (signal) => {
      seen = signal;
      return new Promise<string>(() => undefined);
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ message: 'Job exceeded its 10ms time limit' });
    expect(seen?.aborted).toBe(true);
  });
});
