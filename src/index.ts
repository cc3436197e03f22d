import 'dotenv/config';
import type { Server } from 'node:http';
import process from 'node:process';
import { loadConfig } from './config';
import { createServices } from './container';
import { logger } from './logger';
import { startWorker } from './queue';
import { createApp } from './server';

async function main() {
  const config = loadConfig();
  const services = createServices(config);
  const closers: Array<() => Promise<void>> = [];

  if (config.role === 'worker' || config.role === 'all') {
    // Jobs presos em running de uma execução anterior voltam para a fila antes de consumir
    const recovered = await services.jobQueue.recover();
    logger.info(
      { queue: config.queueName, concurrency: config.workerConcurrency, profiles: config.profiles.names, ...recovered },
      'Starting transcode worker',
    );
    const worker = startWorker(services.redis, services.queueSettings, services.jobDeps);
    closers.push(() => worker.close());
  }

  if (config.role === 'api' || config.role === 'all') {
    const app = createApp(services);
    const server: Server = app.listen(config.port, () => {
      logger.info({ port: config.port }, 'HTTP server listening');
    });
    closers.push(
      () =>
        new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
        }),
    );
  }

  const shutdown = async (signal: string) => {
    try {
      logger.info({ signal, pid: process.pid, role: config.role }, 'Shutting down');
      for (const close of closers) await close();
      await services.close();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start');
  process.exit(1);
});
