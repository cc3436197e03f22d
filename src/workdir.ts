import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { logger } from './logger';

// Executa fn num diretório temporário que é removido no final, com sucesso ou erro
export async function withTempDir<T>(fn: (dir: string) => Promise<T>, root: string = os.tmpdir()): Promise<T> {
  const dir = await fs.mkdtemp(path.join(root, 'transcode-'));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true }).catch((err: unknown) => {
      logger.warn({ err, dir }, 'Failed to remove temp dir');
    });
  }
}
