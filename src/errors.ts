// Erro da aplicação com status HTTP e código estável
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Invalid request') {
    super(400, 'validation_error', message);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication credentials were not provided or are invalid.') {
    super(401, 'unauthorized', message);
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super(404, 'not_found', message);
    this.name = 'NotFoundError';
  }
}

// Trabalho duplicado para (vídeo, perfil) ou transição que o job não aceita mais
export class ConflictError extends AppError {
  constructor(message = 'Conflict') {
    super(409, 'conflict', message);
    this.name = 'ConflictError';
  }
}

// Falha do pipeline de transcode; as transientes voltam para a fila
export class EncodeError extends AppError {
  constructor(
    public readonly reason: string,
    message: string,
    public readonly transient = false,
  ) {
    super(422, reason, message);
    this.name = 'EncodeError';
  }
}

// Falha de I/O em artefatos; sempre fatal para o job
export class StorageError extends AppError {
  constructor(
    public readonly reason: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(500, reason, message);
    this.name = 'StorageError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

// Estourou o tempo máximo do job; tratado como transiente
export class TimeoutError extends AppError {
  readonly transient = true;

  constructor(message = 'Job exceeded its time limit') {
    super(504, 'timeout', message);
    this.name = 'TimeoutError';
  }
}

// Artefato marcado como pronto não pôde ser lido: problema no storage, não do cliente
export class DeliveryError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, 'delivery_failed', message);
    this.name = 'DeliveryError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export type JobFailure = {
  code: string;
  message: string;
  transient: boolean;
};

// Converte qualquer erro em algo persistível no registro do job
export function toJobFailure(err: unknown): JobFailure {
  if (err instanceof EncodeError) {
    return { code: err.reason, message: err.message, transient: err.transient };
  }
  if (err instanceof TimeoutError) {
    return { code: err.code, message: err.message, transient: true };
  }
  if (err instanceof AppError) {
    return { code: err.code, message: err.message, transient: false };
  }
  if (err instanceof Error) {
    return { code: 'internal_error', message: err.message, transient: false };
  }
  return { code: 'internal_error', message: String(err), transient: false };
}
