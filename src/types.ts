import type { JobFailure } from './errors';

export type TranscodeProfile = {
  name: string; // e.g. 480p
  width: number;
  height: number;
  videoBitrateKbps: number;
  audioBitrateKbps: number;
};

export type JobStatus = 'queued' | 'running' | 'succeeded' | 'failed';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['succeeded', 'failed'];

export type JobRecord = {
  id: string;
  videoId: string;
  profile: string;
  sourceKey: string; // fixado no enqueue, nunca muda para este job
  overwrite: boolean;
  status: JobStatus;
  attempts: number;
  lastError: JobFailure | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
};

// Payload que vai para o BullMQ. O estado real fica no JobStore.
export type TranscodeJobData = {
  jobId: string;
  videoId: string;
  profile: string;
};

export type TranscodeJobResult = {
  jobId: string;
  status: JobStatus;
  playlistKey?: string;
  segmentCount?: number;
  cacheHit?: boolean;
};

export type Rendition = {
  videoId: string;
  profile: string;
  playlistKey: string;
  segmentKeys: string[]; // em ordem de apresentação
  ready: boolean;
  updatedAt: string;
};
