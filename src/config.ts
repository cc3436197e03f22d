import { parseEnv, type Env } from './env';
import { parseProfiles, ProfileSet } from './profiles';

export type StorageConfig =
  | { driver: 'local'; root: string }
  | {
      driver: 'r2';
      bucket: string;
      endpoint: string;
      accessKeyId: string;
      secretAccessKey: string;
    };

export type AuthConfig = { mode: 'remote'; url: string } | { mode: 'static'; tokens: string[] };

export type AppConfig = Readonly<{
  role: Env['APP_ROLE'];
  port: number;
  redisUrl: string;
  queueName: string;
  storage: StorageConfig;
  hlsPrefix: string;
  sourceKeyTemplate: string;
  profiles: ProfileSet;
  segmentSeconds: number;
  ffmpegPreset: string;
  workerConcurrency: number;
  maxAttempts: number;
  retryBackoffMs: number;
  jobTimeoutMs: number;
  leaseTimeoutMs: number;
  auth: AuthConfig;
}>;

function storageConfig(env: Env): StorageConfig {
  if (env.STORAGE_DRIVER === 'local') {
    return { driver: 'local', root: env.MEDIA_ROOT };
  }
  // Env já garantiu a presença dessas chaves quando o driver é r2
  return {
    driver: 'r2',
    bucket: env.R2_BUCKET ?? '',
    endpoint: env.R2_ENDPOINT ?? `https://${env.R2_ACCOUNT_ID ?? ''}.r2.cloudflarestorage.com`,
    accessKeyId: env.R2_ACCESS_KEY_ID ?? '',
    secretAccessKey: env.R2_SECRET_ACCESS_KEY ?? '',
  };
}

function authConfig(env: Env): AuthConfig {
  if (env.AUTH_MODE === 'remote') {
    return { mode: 'remote', url: env.AUTH_URL ?? '' };
  }
  const tokens = env.API_TOKENS.split(',')
    .map((t) => t.trim())
    .filter(Boolean);
  return { mode: 'static', tokens };
}

// Monta a config uma vez; o resto recebe por parâmetro
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = parseEnv(source);
  return Object.freeze({
    role: env.APP_ROLE,
    port: env.PORT,
    redisUrl: env.REDIS_URL,
    queueName: env.QUEUE_NAME,
    storage: storageConfig(env),
    hlsPrefix: env.HLS_PREFIX.replace(/^\/+|\/+$/g, ''),
    sourceKeyTemplate: env.SOURCE_KEY_TEMPLATE,
    profiles: new ProfileSet(parseProfiles(env.TRANSCODE_PROFILES, env.AUDIO_BITRATE_KBPS)),
    segmentSeconds: env.SEGMENT_SECONDS,
    ffmpegPreset: env.FFMPEG_PRESET,
    workerConcurrency: env.WORKER_CONCURRENCY,
    maxAttempts: env.MAX_JOB_ATTEMPTS,
    retryBackoffMs: env.RETRY_BACKOFF_MS,
    jobTimeoutMs: env.JOB_TIMEOUT_MS,
    leaseTimeoutMs: env.LEASE_TIMEOUT_MS,
    auth: authConfig(env),
  });
}
