#!/usr/bin/env node
import { Command } from 'commander';
import { DEFAULT_STATE_DIR, doctorReport, readEnv, resolveSettings } from './config.js';
import { loadEnvFiles } from './env.js';
import { createLogger } from './log.js';
import { pruneSessions, startServer } from './server.js';
import { SERVICE_NAME, VERSION } from './version.js';

loadEnvFiles();

const program = new Command();

program.name(SERVICE_NAME).description('Task management API with semantic search and suggestions').version(VERSION);

program
  .command('serve')
  .description('Start the HTTP API')
  .option('--port <port>', 'Port to listen on (default: PORT or 8080)')
  .option('--state-dir <dir>', 'Override state dir (default: .task-assistant or TASK_ASSISTANT_STATE_DIR)')
  .action(async (opts: { port?: string; stateDir?: string }) => {
    const settings = resolveSettings(
      readEnv({
        ...process.env,
        ...(opts.port ? { PORT: opts.port } : {}),
        ...(opts.stateDir ? { TASK_ASSISTANT_STATE_DIR: opts.stateDir } : {}),
      }),
    );
    const logger = createLogger(settings.logLevel);
    const running = await startServer(settings, logger);

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down`);
      running.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error('shutdown failed', err);
          process.exit(1);
        },
      );
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });

program
  .command('doctor')
  .description('Check environment/config and print what is missing')
  .action(() => {
    const report = doctorReport();
    console.log(`${SERVICE_NAME} doctor`);
    console.log('features:', report.features);
    if (report.missing.length) {
      console.log('\nMissing env vars:');
      for (const k of report.missing) console.log(`- ${k}`);
      process.exitCode = 2;
    } else {
      console.log('\nNo missing env vars detected for enabled features.');
    }

    if (report.notes.length) {
      console.log('\nNotes:');
      for (const n of report.notes) console.log(`- ${n}`);
    }
  });

program
  .command('sessions:prune')
  .description('Remove expired sessions from the state file (stop the server first)')
  .option('--state-dir <dir>', 'Override state dir (default: .task-assistant or TASK_ASSISTANT_STATE_DIR)')
  .action(async (opts: { stateDir?: string }) => {
    const env = readEnv();
    const stateDir = opts.stateDir ?? env.TASK_ASSISTANT_STATE_DIR ?? DEFAULT_STATE_DIR;
    // refuses while a server holds the state dir; the error exits 1 below
    const removed = await pruneSessions(stateDir, createLogger(env.TASK_ASSISTANT_LOG_LEVEL ?? 'info'));
    console.log(`removed ${removed} expired session(s)`);
  });

program.parseAsync(process.argv).catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
