import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  DeleteObjectsCommand,
  type ListObjectsV2CommandOutput,
} from '@aws-sdk/client-s3';
import { createWriteStream } from 'node:fs';
import fs from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import mime from 'mime';
import { StorageError } from './errors';
import { toStorageError, type ByteRange, type StorageAdapter, type StoredObject } from './storage';

export type R2Config = {
  bucket: string;
  endpoint: string;
  accessKeyId: string;
  secretAccessKey: string;
};

function isNotFound(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  if ('name' in err && (err.name === 'NotFound' || err.name === 'NoSuchKey')) return true;
  return (
    '$metadata' in err &&
    typeof err.$metadata === 'object' &&
    err.$metadata !== null &&
    'httpStatusCode' in err.$metadata &&
    err.$metadata.httpStatusCode === 404
  );
}

// Bucket R2 (compatível com S3)
export class R2Storage implements StorageAdapter {
  private readonly s3: S3Client;
  private readonly bucket: string;

  constructor(config: R2Config, client?: S3Client) {
    this.bucket = config.bucket;
    // Criar o cliente do S3
    this.s3 =
      client ??
      new S3Client({
        region: 'auto',
        endpoint: config.endpoint,
        credentials: {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey,
        },
        forcePathStyle: true,
      });
  }

  async stat(key: string): Promise<StoredObject | null> {
    try {
      const res = await this.s3.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return { key, size: res.ContentLength ?? 0 };
    } catch (err) {
      if (isNotFound(err)) return null;
      throw toStorageError(err, 'stat', key);
    }
  }

  private async getBody(key: string, range?: ByteRange) {
    try {
      const res = await this.s3.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Range: range ? `bytes=${range.start}-${range.end}` : undefined,
        }),
      );
      if (!res.Body) throw new StorageError('storage_io', `Empty body for "${key}"`);
      return res.Body;
    } catch (err) {
      if (isNotFound(err)) throw new StorageError('not_found', `Object "${key}" does not exist`, { cause: err });
      throw toStorageError(err, 'read', key);
    }
  }

  async read(key: string): Promise<Buffer> {
    const body = await this.getBody(key);
    return Buffer.from(await body.transformToByteArray());
  }

  async createReadStream(key: string, range?: ByteRange): Promise<Readable> {
    const body = await this.getBody(key, range);
    // No Node o SDK devolve um Readable; qualquer outra coisa indica runtime errado
    if (!(body instanceof Readable)) {
      throw new StorageError('storage_io', `Unexpected body type for "${key}"`);
    }
    return body;
  }

  async downloadToFile(key: string, filePath: string): Promise<void> {
    const stream = await this.createReadStream(key);
    try {
      await pipeline(stream, createWriteStream(filePath));
    } catch (err) {
      throw toStorageError(err, 'download', key);
    }
  }

  async put(key: string, body: Buffer | string, contentType?: string): Promise<void> {
    try {
      await this.s3.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType ?? mime.getType(key) ?? undefined,
        }),
      );
    } catch (err) {
      throw toStorageError(err, 'write', key);
    }
  }

  async putFile(key: string, filePath: string, contentType?: string): Promise<void> {
    // Segmentos são pequenos, então ler o arquivo inteiro é aceitável
    const buf = await fs.readFile(filePath).catch((err: unknown) => {
      throw toStorageError(err, 'read local file for', key);
    });
    await this.put(key, buf, contentType);
  }

  async list(prefix: string): Promise<StoredObject[]> {
    const out: StoredObject[] = [];
    const normalized = prefix.endsWith('/') ? prefix : `${prefix}/`;
    let token: string | undefined;
    do {
      let page: ListObjectsV2CommandOutput;
      try {
        page = await this.s3.send(
          new ListObjectsV2Command({ Bucket: this.bucket, Prefix: normalized, ContinuationToken: token }),
        );
      } catch (err) {
        throw toStorageError(err, 'list', prefix);
      }
      for (const obj of page.Contents ?? []) {
        if (obj.Key) out.push({ key: obj.Key, size: obj.Size ?? 0 });
      }
      token = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (token);
    return out.sort((a, b) => a.key.localeCompare(b.key));
  }

  async removePrefix(prefix: string): Promise<number> {
    const objects = await this.list(prefix);
    // DeleteObjects aceita no máximo 1000 chaves por chamada
    for (let i = 0; i < objects.length; i += 1000) {
      const batch = objects.slice(i, i + 1000);
      try {
        await this.s3.send(
          new DeleteObjectsCommand({
            Bucket: this.bucket,
            Delete: { Objects: batch.map((o) => ({ Key: o.key })), Quiet: true },
          }),
        );
      } catch (err) {
        throw toStorageError(err, 'remove', prefix);
      }
    }
    return objects.length;
  }
}
