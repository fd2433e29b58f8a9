import type { Server } from 'node:http';
import type { Express } from 'express';
import type { AppSettings } from './config.js';
import type { FetchLike } from './http.js';
import { createLogger, type Logger } from './log.js';
import { JsonStore } from './store/jsonStore.js';
import { acquireLock, type LockHandle } from './store/lock.js';
import { UserService } from './auth/users.js';
import { GoogleOAuthClient } from './auth/google.js';
import { HuggingFaceEmbedder } from './memory/embeddings.js';
import { PineconeIndex } from './memory/pinecone.js';
import { KeywordTaskMemory, VectorTaskMemory, type TaskMemory } from './memory/taskMemory.js';
import { TaskService } from './tasks/service.js';
import { createApp } from './web/app.js';

export interface Services {
  store: JsonStore;
  users: UserService;
  tasks: TaskService;
  app: Express;
}

function buildMemory(settings: AppSettings, logger: Logger, fetcher?: FetchLike): TaskMemory {
  const { pinecone, huggingFace } = settings;
  if (!pinecone || !huggingFace) {
    logger.info('semantic search not configured; using keyword search');
    return new KeywordTaskMemory();
  }

  logger.info(`semantic search enabled (model ${huggingFace.model})`);
  return new VectorTaskMemory({
    embedder: new HuggingFaceEmbedder({ ...huggingFace, rps: settings.httpRps, fetcher }),
    index: new PineconeIndex({ ...pinecone, rps: settings.httpRps, fetcher }),
  });
}

/** Wire store, services and the Express app from resolved settings. */
export function buildServices(settings: AppSettings, logger: Logger, fetcher?: FetchLike): Services {
  const store = new JsonStore(settings.stateDir);
  const users = new UserService({ store, logger: logger.child('auth'), sessionTtlDays: settings.sessionTtlDays });
  const tasks = new TaskService({
    store,
    memory: buildMemory(settings, logger.child('memory'), fetcher),
    logger: logger.child('tasks'),
  });

  const google = settings.google
    ? {
        client: new GoogleOAuthClient({
          clientId: settings.google.clientId,
          clientSecret: settings.google.clientSecret,
          fetcher,
        }),
        redirectUri: settings.google.redirectUri,
      }
    : undefined;

  const app = createApp({
    users,
    tasks,
    secretKey: settings.secretKey,
    logger,
    google,
    authRateLimit: settings.authRateLimit,
    trustProxy: settings.trustProxy,
    corsOrigins: settings.corsOrigins,
    production: settings.production,
  });

  return { store, users, tasks, app };
}

export interface RunningServer {
  server: Server;
  close(): Promise<void>;
}

/** Take the state dir lock and listen. `close` stops listening and releases the lock. */
export async function startServer(settings: AppSettings, logger = createLogger(settings.logLevel)): Promise<RunningServer> {
  const lock: LockHandle = await acquireLock(settings.stateDir);

  let server: Server;
  try {
    const { app, users } = buildServices(settings, logger);
    const pruned = await users.cleanupExpiredSessions();
    logger.debug(`startup session prune removed ${pruned}`);

    server = await new Promise<Server>((resolve, reject) => {
      const s = app.listen(settings.port, settings.host, () => resolve(s));
      s.once('error', reject);
    });
  } catch (e) {
    await lock.release();
    throw e;
  }
  logger.info(`listening on http://${settings.host}:${settings.port}`);

  return {
    server,
    close: async () => {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
      await lock.release();
    },
  };
}

/**
 * Remove expired sessions from a state dir no server is using. Throws
 * `LockHeldError` while a server holds the lock: it caches the state and
 * would write the pruned sessions back.
 */
export async function pruneSessions(stateDir: string, logger: Logger, now?: () => Date): Promise<number> {
  const lock = await acquireLock(stateDir);
  try {
    const users = new UserService({ store: new JsonStore(stateDir), logger, now });
    return await users.cleanupExpiredSessions();
  } finally {
    await lock.release();
  }
}
