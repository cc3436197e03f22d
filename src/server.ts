import cookieParser from 'cookie-parser';
import express, { type Request, type Response } from 'express';
import { pipeline } from 'node:stream/promises';
import { z } from 'zod';
import { callerFromRequest, type AccessPolicy } from './auth';
import type { RenditionCatalog } from './catalog';
import type { StreamingDeliveryService } from './delivery';
import { asyncHandler, errorHandler } from './errorHandler';
import { ConflictError, NotFoundError, UnauthorizedError, ValidationError } from './errors';
import type { TranscodeJobQueue } from './jobQueue';
import { createLogger } from './logger';
import { assertVideoId, parseSegmentFileName } from './paths';
import type { ByteRange } from './storage';

const log = createLogger('http');

export type ServerDeps = {
  jobQueue: TranscodeJobQueue;
  catalog: RenditionCatalog;
  delivery: StreamingDeliveryService;
  access: AccessPolicy;
};

const transcodeBodySchema = z.object({
  videoId: z.string().min(1),
  profile: z.string().min(1).optional(),
  overwrite: z.boolean().optional().default(false),
});

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid request body: ${detail}`);
  }
  return parsed.data;
}

function isClientAbort(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ERR_STREAM_PREMATURE_CLOSE';
}

// Um único range de bytes. Header inválido ou com vários ranges serve o corpo inteiro,
// fora do tamanho vira 'unsatisfiable'.
export function resolveRange(req: Request, size: number): ByteRange | 'unsatisfiable' | undefined {
  if (!req.headers.range) return undefined;
  const parsed = req.range(size, { combine: true });
  if (parsed === -1) return 'unsatisfiable';
  if (parsed === undefined || parsed === -2) return undefined;
  if (parsed.type !== 'bytes' || parsed.length !== 1) return undefined;
  return { start: parsed[0].start, end: parsed[0].end };
}

export function createApp(deps: ServerDeps): express.Express {
  const { jobQueue, catalog, delivery, access } = deps;
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '16kb' }));
  app.use(cookieParser());

  const requireAccess = async (req: Request, videoId: string): Promise<void> => {
    assertVideoId(videoId);
    const allowed = await access.isAuthorized(callerFromRequest(req), videoId);
    if (!allowed) {
      throw new UnauthorizedError(`Not authorized for video ${videoId}`);
    }
  };

  // Sem credencial responde 401 antes de procurar o job, para não revelar quais ids existem
  const requireJobAccess = async (req: Request, jobId: string) => {
    const caller = callerFromRequest(req);
    const denied = () => new UnauthorizedError(`Not authorized for job ${jobId}`);
    if (!caller.token) throw denied();
    const job = await jobQueue.status(jobId);
    if (!(await access.isAuthorized(caller, job.videoId))) throw denied();
    return job;
  };

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  const api = express.Router();

  // POST /api/transcode: um job por perfil (todos quando profile não vem)
  api.post(
    '/transcode',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseBody(transcodeBodySchema, req.body);
      await requireAccess(req, body.videoId);

      if (body.profile) {
        const { job, coalesced } = await jobQueue.enqueue(body.videoId, body.profile, body.overwrite);
        res.status(202).json({ jobs: [{ ...job, coalesced }] });
        return;
      }

      const entries = await jobQueue.enqueueAll(body.videoId, body.overwrite);
      // Perfis recusados vão em skipped; só é erro se nenhum entrou na fila
      const jobs = entries.flatMap((e) => (e.ok ? [{ ...e.job, coalesced: e.coalesced }] : []));
      if (jobs.length === 0) {
        throw new ConflictError(`Every profile of video ${body.videoId} is already ready; use overwrite to rebuild`);
      }
      res.status(202).json({
        jobs,
        skipped: entries.flatMap((e) => (e.ok ? [] : [{ profile: e.profile, error: { code: e.error.code, message: e.error.message } }])),
      });
    }),
  );

  api.get(
    '/jobs/:jobId',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await requireJobAccess(req, req.params.jobId));
    }),
  );

  api.delete(
    '/jobs/:jobId',
    asyncHandler(async (req: Request, res: Response) => {
      const job = await requireJobAccess(req, req.params.jobId);
      res.json(await jobQueue.cancel(job.id));
    }),
  );

  api.get(
    '/video/:videoId/renditions',
    asyncHandler(async (req: Request, res: Response) => {
      const { videoId } = req.params;
      await requireAccess(req, videoId);
      res.json({ videoId, profiles: await catalog.list(videoId) });
    }),
  );

  api.delete(
    '/video/:videoId/renditions',
    asyncHandler(async (req: Request, res: Response) => {
      const { videoId } = req.params;
      await requireAccess(req, videoId);
      // Cancela jobs na fila antes; recusa se algum já está rodando
      const removed = await jobQueue.removeVideo(videoId);
      res.json({ videoId, ...removed });
    }),
  );

  api.get(
    '/video/:videoId/master.m3u8',
    asyncHandler(async (req: Request, res: Response) => {
      const { videoId } = req.params;
      await requireAccess(req, videoId);
      const playlist = await delivery.getMasterPlaylist(videoId);
      res.set('Content-Type', playlist.contentType).send(playlist.body);
    }),
  );

  api.get(
    '/video/:videoId/:resolution/index.m3u8',
    asyncHandler(async (req: Request, res: Response) => {
      const { videoId, resolution } = req.params;
      await requireAccess(req, videoId);
      const playlist = await delivery.getPlaylist(videoId, resolution);
      res.set('Content-Type', playlist.contentType).send(playlist.body);
    }),
  );

  api.get(
    '/video/:videoId/:resolution/:segment',
    asyncHandler(async (req: Request, res: Response) => {
      const { videoId, resolution, segment } = req.params;
      await requireAccess(req, videoId);

      const index = parseSegmentFileName(segment);
      if (index === null) {
        throw new NotFoundError(`Unknown segment "${segment}"`);
      }
      const handle = await delivery.openSegment(videoId, resolution, index);

      res.set('Accept-Ranges', 'bytes');
      res.set('Content-Type', handle.contentType);

      // Range de bytes para seek do player
      const range = resolveRange(req, handle.size);
      if (range === 'unsatisfiable') {
        res.status(416).set('Content-Range', `bytes */${handle.size}`).end();
        return;
      }

      const stream = await handle.read(range);
      if (range) {
        res.status(206);
        res.set('Content-Range', `bytes ${range.start}-${range.end}/${handle.size}`);
        res.set('Content-Length', String(range.end - range.start + 1));
      } else {
        res.status(200);
        res.set('Content-Length', String(handle.size));
      }

      // pipeline destrói os dois lados quando um deles falha: o arquivo fecha se o player abortar
      // e a conexão cai se a leitura falhar no meio, sem entregar um segmento truncado como completo
      try {
        await pipeline(stream, res);
      } catch (err) {
        if (isClientAbort(err)) {
          log.debug({ key: handle.key }, 'Client aborted segment download');
          return;
        }
        log.error({ err, key: handle.key }, 'Segment stream failed mid-response');
      }
    }),
  );

  app.use('/api', api);

  app.use((req: Request, _res: Response, next: express.NextFunction) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  });
  app.use(errorHandler);

  return app;
}
