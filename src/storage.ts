import type { Readable } from 'node:stream';
import { StorageError } from './errors';

export type StoredObject = {
  key: string;
  size: number;
};

// Intervalo inclusivo, como no header Range
export type ByteRange = {
  start: number;
  end: number;
};

// Onde ficam fontes e renditions. Chaves relativas separadas por /
export interface StorageAdapter {
  stat(key: string): Promise<StoredObject | null>;
  read(key: string): Promise<Buffer>;
  createReadStream(key: string, range?: ByteRange): Promise<Readable>;
  downloadToFile(key: string, filePath: string): Promise<void>;
  put(key: string, body: Buffer | string, contentType?: string): Promise<void>;
  putFile(key: string, filePath: string, contentType?: string): Promise<void>;
  list(prefix: string): Promise<StoredObject[]>;
  removePrefix(prefix: string): Promise<number>;
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function isDiskFull(err: unknown): boolean {
  return errnoCode(err) === 'ENOSPC';
}

export function isMissing(err: unknown): boolean {
  return errnoCode(err) === 'ENOENT';
}

// ENOSPC vira disk_full; o resto vira storage_io
export function toStorageError(err: unknown, action: string, key: string): StorageError {
  if (err instanceof StorageError) return err;
  const reason = isDiskFull(err) ? 'disk_full' : 'storage_io';
  const detail = err instanceof Error ? err.message : String(err);
  return new StorageError(reason, `Failed to ${action} "${key}": ${detail}`, { cause: err });
}
