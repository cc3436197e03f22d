import { describe, expect, it, vi } from 'vitest';
import { ConflictError } from './errors';
import { applyTransition, RedisJobStore, releasesSlot } from './jobStore';
import type { JobRecord } from './types';

function record(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    id: 'job-1',
    videoId: '42',
    profile: '480p',
    sourceKey: 'videos/42/source.mp4',
    overwrite: false,
    status: 'queued',
    attempts: 0,
    lastError: null,
    createdAt: '2026-03-01T12:00:00.000Z',
    startedAt: null,
    finishedAt: null,
    ...overrides,
  };
}

// Só os comandos que o RedisJobStore usa, com respostas programadas por teste
function createRedisMock() {
  return {
    get: vi.fn(),
    eval: vi.fn(),
    smembers: vi.fn(),
    mget: vi.fn(),
  };
}

describe('applyTransition', () => {
  it('applies the patch when the current status is allowed', () => {
    expect(applyTransition(record(), ['queued', 'running'], { status: 'running', attempts: 1 })).toMatchObject({
      id: 'job-1',
      status: 'running',
      attempts: 1,
    });
  });

  it('refuses a transition from a status outside the allowed set', () => {
    expect(applyTransition(record({ status: 'failed' }), ['queued'], { status: 'running' })).toBeNull();
  });

  it('releases the key slot only for terminal statuses', () => {
    expect(releasesSlot(record({ status: 'queued' }))).toBe(false);
    expect(releasesSlot(record({ status: 'running' }))).toBe(false);
    expect(releasesSlot(record({ status: 'succeeded' }))).toBe(true);
    expect(releasesSlot(record({ status: 'failed' }))).toBe(true);
  });
});

describe('RedisJobStore', () => {
  describe('create', () => {
    it('claims a free slot with every key passed through KEYS', async () => {
      const redis = createRedisMock();
      const job = record();
      redis.get.mockResolvedValueOnce(null);
      redis.eval.mockResolvedValueOnce([1, JSON.stringify(job)]);

      const result = await new RedisJobStore(redis, 'video-transcode').create(job);

      expect(result).toEqual({ created: true, job });
      expect(redis.get).toHaveBeenCalledWith('{video-transcode}:active:42:480p');
      expect(redis.eval.mock.calls[0].slice(1)).toEqual([
        4,
        '{video-transcode}:active:42:480p',
        '{video-transcode}:job:job-1',
        '{video-transcode}:jobs:active',
        '{video-transcode}:job:job-1',
        '',
        'job-1',
        JSON.stringify(job),
      ]);
    });

    it('returns the job that already holds the slot', async () => {
      const redis = createRedisMock();
      const holder = record({ id: 'job-0', status: 'running', attempts: 1 });
      redis.get.mockResolvedValueOnce('job-0');
      redis.eval.mockResolvedValueOnce([0, JSON.stringify(holder)]);

      const result = await new RedisJobStore(redis, 'video-transcode').create(record());

      expect(result).toEqual({ created: false, job: holder });
      expect(redis.eval.mock.calls[0].slice(4, 7)).toEqual(['{video-transcode}:job:job-0', 'job-0', 'job-1']);
    });

    it('reads the slot again when it changed before the script ran', async () => {
      const redis = createRedisMock();
      const job = record();
      redis.get.mockResolvedValueOnce(null).mockResolvedValueOnce('job-0');
      redis.eval.mockResolvedValueOnce([2]).mockResolvedValueOnce([0, JSON.stringify(record({ id: 'job-0' }))]);

      const result = await new RedisJobStore(redis, 'video-transcode').create(job);

      expect(result.created).toBe(false);
      expect(result.job.id).toBe('job-0');
      expect(redis.get).toHaveBeenCalledTimes(2);
    });

    it('gives up with a conflict when the slot keeps changing', async () => {
      const redis = createRedisMock();
      redis.get.mockResolvedValue(null);
      redis.eval.mockResolvedValue([2]);

      await expect(new RedisJobStore(redis, 'video-transcode').create(record())).rejects.toBeInstanceOf(ConflictError);
      expect(redis.eval).toHaveBeenCalledTimes(5);
    });
  });

  describe('transition', () => {
    it('passes the record, active set and slot keys to the script', async () => {
      const redis = createRedisMock();
      const running = record({ status: 'running', attempts: 1 });
      redis.get.mockResolvedValueOnce(JSON.stringify(record()));
      redis.eval.mockResolvedValueOnce([1, JSON.stringify(running)]);

      const result = await new RedisJobStore(redis, 'video-transcode').transition('job-1', ['queued'], {
        status: 'running',
        attempts: 1,
      });

      expect(result).toEqual({ applied: true, job: running });
      expect(redis.eval.mock.calls[0].slice(1)).toEqual([
        3,
        '{video-transcode}:job:job-1',
        '{video-transcode}:jobs:active',
        '{video-transcode}:active:42:480p',
        '["queued"]',
        '{"status":"running","attempts":1}',
      ]);
    });

    it('reports a refused transition with the current record', async () => {
      const redis = createRedisMock();
      const failed = record({ status: 'failed' });
      redis.get.mockResolvedValueOnce(JSON.stringify(failed));
      redis.eval.mockResolvedValueOnce([0, JSON.stringify(failed)]);

      const result = await new RedisJobStore(redis, 'video-transcode').transition('job-1', ['queued'], { status: 'running' });
      expect(result).toEqual({ applied: false, job: failed });
    });

    it('does not run the script for an unknown job', async () => {
      const redis = createRedisMock();
      redis.get.mockResolvedValueOnce(null);

      const result = await new RedisJobStore(redis, 'video-transcode').transition('ghost', ['queued'], { status: 'running' });
      expect(result).toEqual({ applied: false, job: null });
      expect(redis.eval).not.toHaveBeenCalled();
    });

    it('rejects records that do not match the job schema', async () => {
      const redis = createRedisMock();
      redis.get.mockResolvedValueOnce(JSON.stringify({ id: 'job-1', status: 'lost' }));

      await expect(new RedisJobStore(redis, 'video-transcode').get('job-1')).rejects.toThrow();
    });
  });

  it('lists the non-terminal jobs from the active set', async () => {
    const redis = createRedisMock();
    const a = record({ id: 'a' });
    const b = record({ id: 'b', status: 'running' });
    redis.smembers.mockResolvedValueOnce(['a', 'gone', 'b']);
    redis.mget.mockResolvedValueOnce([JSON.stringify(a), null, JSON.stringify(b)]);

    expect(await new RedisJobStore(redis, 'video-transcode').listActive()).toEqual([a, b]);
    expect(redis.mget).toHaveBeenCalledWith(['{video-transcode}:job:a', '{video-transcode}:job:gone', '{video-transcode}:job:b']);
  });
});
