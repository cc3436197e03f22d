import axios, { type AxiosInstance } from 'axios';
import type { Request } from 'express';
import { z } from 'zod';
import type { AuthConfig } from './config';
import { AppError } from './errors';
import { createLogger } from './logger';

const log = createLogger('auth');

export type Caller = {
  token?: string;
};

// Só verifica se o chamador pode acessar o vídeo; identidade fica com o backend do site
export interface AccessPolicy {
  isAuthorized(caller: Caller, videoId: string): Promise<boolean>;
}

// Header Authorization tem prioridade; o cookie access_token vem do site
export function callerFromRequest(req: Request): Caller {
  const header = req.get('authorization');
  if (header) {
    const match = /^Bearer\s+(.+)$/i.exec(header.trim());
    if (match) return { token: match[1] };
  }
  const cookies: unknown = req.cookies;
  if (typeof cookies === 'object' && cookies !== null && 'access_token' in cookies) {
    const value = cookies.access_token;
    if (typeof value === 'string' && value.length > 0) return { token: value };
  }
  return {};
}

export class StaticTokenAccessPolicy implements AccessPolicy {
  private readonly tokens: ReadonlySet<string>;

  constructor(tokens: Iterable<string>) {
    this.tokens = new Set(tokens);
  }

  async isAuthorized(caller: Caller): Promise<boolean> {
    return caller.token !== undefined && this.tokens.has(caller.token);
  }
}

const decisionSchema = z.object({ allowed: z.boolean() });

// Pergunta ao backend do site se o bearer pode acessar o vídeo
export class RemoteAccessPolicy implements AccessPolicy {
  constructor(
    private readonly url: string,
    private readonly http: AxiosInstance = axios.create({ timeout: 5000 }),
  ) {}

  async isAuthorized(caller: Caller, videoId: string): Promise<boolean> {
    if (!caller.token) return false;
    try {
      const res = await this.http.post<unknown>(
        this.url,
        { videoId },
        { headers: { Authorization: `Bearer ${caller.token}` }, validateStatus: (s) => s < 500 },
      );
      if (res.status === 401 || res.status === 403) return false;
      const parsed = decisionSchema.safeParse(res.data);
      if (!parsed.success) {
        log.warn({ videoId, status: res.status }, 'Auth service returned an unexpected body, denying');
        return false;
      }
      return parsed.data.allowed;
    } catch (err) {
      log.error({ err, videoId }, 'Auth service unreachable');
      throw new AppError(503, 'auth_unavailable', 'Authorization service is unavailable');
    }
  }
}

export function createAccessPolicy(config: AuthConfig): AccessPolicy {
  if (config.mode === 'remote') return new RemoteAccessPolicy(config.url);
  return new StaticTokenAccessPolicy(config.tokens);
}
