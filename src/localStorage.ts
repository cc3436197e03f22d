import fs from 'node:fs/promises';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { v4 as uuidv4 } from 'uuid';
import { StorageError } from './errors';
import { isMissing, toStorageError, type ByteRange, type StorageAdapter, type StoredObject } from './storage';

// Storage no disco local sob MEDIA_ROOT.
// Escreve num temp ao lado e renomeia, então ninguém lê arquivo pela metade.
export class LocalStorage implements StorageAdapter {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private resolve(key: string): string {
    const full = path.resolve(this.root, key);
    if (full !== this.root && !full.startsWith(this.root + path.sep)) {
      throw new StorageError('invalid_key', `Key escapes the storage root: "${key}"`);
    }
    return full;
  }

  // Único por escrita: duas gravações simultâneas da mesma chave não compartilham o arquivo temporário
  private tempPath(target: string): string {
    return `${target}.part-${uuidv4()}`;
  }

  async stat(key: string): Promise<StoredObject | null> {
    try {
      const st = await fs.stat(this.resolve(key));
      return st.isFile() ? { key, size: st.size } : null;
    } catch (err) {
      if (isMissing(err)) return null;
      throw toStorageError(err, 'stat', key);
    }
  }

  async read(key: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.resolve(key));
    } catch (err) {
      throw toStorageError(err, 'read', key);
    }
  }

  async createReadStream(key: string, range?: ByteRange): Promise<Readable> {
    const file = this.resolve(key);
    // Abre antes de devolver o stream para que ENOENT apareça aqui e não no meio da resposta
    const handle = await fs.open(file, 'r').catch((err: unknown) => {
      throw toStorageError(err, 'open', key);
    });
    return handle.createReadStream({ start: range?.start, end: range?.end });
  }

  async downloadToFile(key: string, filePath: string): Promise<void> {
    try {
      await fs.copyFile(this.resolve(key), filePath);
    } catch (err) {
      throw toStorageError(err, 'download', key);
    }
  }

  async put(key: string, body: Buffer | string): Promise<void> {
    const target = this.resolve(key);
    const tmp = this.tempPath(target);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(tmp, body);
      await fs.rename(tmp, target);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw toStorageError(err, 'write', key);
    }
  }

  async putFile(key: string, filePath: string, _contentType?: string): Promise<void> {
    const target = this.resolve(key);
    const tmp = this.tempPath(target);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.copyFile(filePath, tmp);
      await fs.rename(tmp, target);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw toStorageError(err, 'write', key);
    }
  }

  async list(prefix: string): Promise<StoredObject[]> {
    const dir = this.resolve(prefix);
    const out: StoredObject[] = [];
    const walk = async (current: string): Promise<void> => {
      let entries;
      try {
        entries = await fs.readdir(current, { withFileTypes: true });
      } catch (err) {
        if (isMissing(err)) return;
        throw toStorageError(err, 'list', prefix);
      }
      for (const e of entries) {
        const full = path.join(current, e.name);
        if (e.isDirectory()) {
          await walk(full);
        } else if (e.isFile()) {
          const st = await fs.stat(full);
          out.push({ key: path.relative(this.root, full).split(path.sep).join('/'), size: st.size });
        }
      }
    };
    await walk(dir);
    return out.sort((a, b) => a.key.localeCompare(b.key));
  }

  async removePrefix(prefix: string): Promise<number> {
    const objects = await this.list(prefix);
    try {
      await fs.rm(this.resolve(prefix), { recursive: true, force: true });
    } catch (err) {
      throw toStorageError(err, 'remove', prefix);
    }
    return objects.length;
  }
}
