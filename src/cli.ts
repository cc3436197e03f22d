#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { loadConfig } from './config';
import { createServices, type Services } from './container';
import { AppError } from './errors';
import { logger } from './logger';

type TranscodeOptions = {
  profile?: string;
  overwrite?: boolean;
};

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

// Cada comando abre o grafo de serviços, executa e fecha a conexão com o Redis
async function withServices(fn: (services: Services) => Promise<void>): Promise<void> {
  const services = createServices(loadConfig());
  try {
    await fn(services);
  } finally {
    await services.close();
  }
}

export async function transcodeCommand(videoId: string, options: TranscodeOptions): Promise<void> {
  await withServices(async ({ jobQueue }) => {
    const overwrite = options.overwrite === true;
    if (options.profile) {
      const { job, coalesced } = await jobQueue.enqueue(videoId, options.profile, overwrite);
      print({ jobs: [{ ...job, coalesced }] });
      return;
    }
    const entries = await jobQueue.enqueueAll(videoId, overwrite);
    print({
      jobs: entries.flatMap((e) => (e.ok ? [{ ...e.job, coalesced: e.coalesced }] : [])),
      skipped: entries.flatMap((e) => (e.ok ? [] : [{ profile: e.profile, reason: e.error.message }])),
    });
  });
}

export async function statusCommand(jobId: string): Promise<void> {
  await withServices(async ({ jobQueue }) => {
    print(await jobQueue.status(jobId));
  });
}

export async function cancelCommand(jobId: string): Promise<void> {
  await withServices(async ({ jobQueue }) => {
    print(await jobQueue.cancel(jobId));
  });
}

export async function recoverCommand(): Promise<void> {
  await withServices(async ({ jobQueue }) => {
    print(await jobQueue.recover());
  });
}

function run<A extends unknown[]>(action: (...args: A) => Promise<void>) {
  return async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (err) {
      // Erro esperado vira uma linha no stderr; o resto vai para o log com stack
      if (err instanceof AppError) {
        process.stderr.write(`Error (${err.code}): ${err.message}\n`);
      } else {
        logger.error({ err }, 'Command failed');
      }
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program.name('hls-rendition').description('Enqueue and inspect HLS transcode jobs').version('1.0.0');

program
  .command('transcode <videoId>')
  .description('Enqueue transcode jobs for a video (all configured profiles by default)')
  .option('-p, --profile <name>', 'Only this profile, e.g. 480p')
  .option('--overwrite', 'Rebuild renditions that are already ready')
  .action(run(transcodeCommand));

program.command('status <jobId>').description('Show the persisted state of a job').action(run(statusCommand));

program.command('cancel <jobId>').description('Cancel a job that has not started yet').action(run(cancelCommand));

program
  .command('recover')
  .description('Requeue jobs whose worker lease expired and redispatch queued jobs that never reached the queue')
  .action(run(recoverCommand));

if (require.main === module) {
  program.parseAsync(process.argv).catch((err: unknown) => {
    logger.fatal({ err }, 'CLI failed');
    process.exit(1);
  });
}
