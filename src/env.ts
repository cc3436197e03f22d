import 'dotenv/config';
import os from 'node:os';
import { z } from 'zod';

const schema = z
  .object({
    REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
    QUEUE_NAME: z.string().min(1).default('video-transcode'),

    APP_ROLE: z.enum(['api', 'worker', 'all']).default('all'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),

    STORAGE_DRIVER: z.enum(['local', 'r2']).default('local'),
    MEDIA_ROOT: z.string().min(1).default('./media'),

    // Só obrigatórios quando STORAGE_DRIVER=r2 (ver superRefine)
    R2_ACCESS_KEY_ID: z.string().min(1).optional(),
    R2_SECRET_ACCESS_KEY: z.string().min(1).optional(),
    R2_ACCOUNT_ID: z.string().min(1).optional(),
    R2_BUCKET: z.string().min(1).optional(),
    R2_ENDPOINT: z.string().url().optional(),

    HLS_PREFIX: z.string().min(1).default('hls'),
    SOURCE_KEY_TEMPLATE: z
      .string()
      .includes('{videoId}', { message: 'must contain the {videoId} placeholder' })
      .default('videos/{videoId}/source.mp4'),
    TRANSCODE_PROFILES: z
      .string()
      .min(1)
      .default('480p:854x480:1500,720p:1280x720:3000,1080p:1920x1080:6000'),
    AUDIO_BITRATE_KBPS: z.coerce.number().int().positive().default(128),
    SEGMENT_SECONDS: z.coerce.number().int().min(2).max(10).default(6),
    FFMPEG_PRESET: z.string().min(1).default('veryfast'),

    // Encoding é CPU-bound: por padrão um worker por core
    WORKER_CONCURRENCY: z.coerce.number().int().positive().default(Math.max(1, os.cpus().length)),
    MAX_JOB_ATTEMPTS: z.coerce.number().int().positive().default(3),
    RETRY_BACKOFF_MS: z.coerce.number().int().nonnegative().default(5000),
    JOB_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
    LEASE_TIMEOUT_MS: z.coerce.number().int().positive().default(45 * 60 * 1000),

    AUTH_MODE: z.enum(['remote', 'static']).default('static'),
    AUTH_URL: z.string().url().optional(),
    API_TOKENS: z.string().default(''),

    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  })
  .superRefine((value, ctx) => {
    if (value.LEASE_TIMEOUT_MS <= value.JOB_TIMEOUT_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['LEASE_TIMEOUT_MS'],
        message: 'must be greater than JOB_TIMEOUT_MS',
      });
    }
    if (value.STORAGE_DRIVER === 'r2') {
      const required = ['R2_ACCESS_KEY_ID', 'R2_SECRET_ACCESS_KEY', 'R2_BUCKET'] as const;
      for (const key of required) {
        if (!value[key]) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'required when STORAGE_DRIVER=r2' });
        }
      }
      if (!value.R2_ENDPOINT && !value.R2_ACCOUNT_ID) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['R2_ENDPOINT'], message: 'R2_ENDPOINT or R2_ACCOUNT_ID is required when STORAGE_DRIVER=r2' });
      }
    }
    if (value.AUTH_MODE === 'remote' && !value.AUTH_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['AUTH_URL'], message: 'required when AUTH_MODE=remote' });
    }
  });

export type Env = z.infer<typeof schema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return schema.parse(source);
}
