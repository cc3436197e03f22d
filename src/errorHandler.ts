import type { NextFunction, Request, Response } from 'express';
import { AppError } from './errors';
import { createLogger } from './logger';

const log = createLogger('http');

interface ErrorResponse {
  error: {
    message: string;
    code: string;
  };
}

// Erros do body-parser (JSON inválido, corpo grande demais) mantêm o status 4xx
function bodyParserStatus(err: Error): number | undefined {
  if (!('type' in err) || typeof err.type !== 'string' || !err.type.startsWith('entity.')) return undefined;
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

// Middleware global de erros
export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction): void {
  if (err instanceof AppError && err.statusCode < 500) {
    log.warn({ code: err.code, method: req.method, path: req.path }, err.message);
  } else if (bodyParserStatus(err) !== undefined) {
    log.warn({ method: req.method, path: req.path }, err.message);
  } else {
    log.error({ err, method: req.method, path: req.path }, 'Request failed');
  }

  // Corpo já começou a ser enviado (ex.: stream de segmento): só resta derrubar a conexão
  if (res.headersSent) {
    next(err);
    return;
  }

  // Erros do body-parser (JSON inválido, corpo grande demais) já trazem o status 4xx
  const clientStatus = bodyParserStatus(err);
  if (clientStatus !== undefined) {
    const response: ErrorResponse = { error: { message: err.message, code: 'bad_request' } };
    res.status(clientStatus).json(response);
    return;
  }

  if (err instanceof AppError) {
    const response: ErrorResponse = { error: { message: err.message, code: err.code } };
    res.status(err.statusCode).json(response);
    return;
  }

  const response: ErrorResponse = {
    error: {
      message: process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
      code: 'INTERNAL_ERROR',
    },
  };
  res.status(500).json(response);
}

// Repassa rejeições de handlers async para o next
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
