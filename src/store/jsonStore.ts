import { mkdir, readFile, writeFile, rename, copyFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { PRIORITIES, TASK_STATUSES, type Session, type Task, type User } from '../model.js';

export interface AppState {
  /** State schema version. */
  version: 2;
  users: User[];
  sessions: Session[];
  tasks: Task[];
}

const TaskRecordSchema = z.object({
  id: z.string(),
  ownerId: z.string(),
  title: z.string(),
  description: z.string().default(''),
  priority: z.enum(PRIORITIES).catch('medium'),
  status: z.enum(TASK_STATUSES).optional(),
  completed: z.boolean().default(false),
  tags: z.array(z.string()).default([]),
  dueDate: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().optional(),
});

const UserRecordSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  passwordHash: z.string().optional(),
  googleSubject: z.string().optional(),
  createdAt: z.string(),
  lastLoginAt: z.string().optional(),
  active: z.boolean().default(true),
});

const SessionRecordSchema = z.object({
  token: z.string(),
  userId: z.string(),
  createdAt: z.string(),
  expiresAt: z.string(),
});

const StoredStateSchema = z.object({
  version: z.number().int().optional(),
  users: z.array(UserRecordSchema).default([]),
  sessions: z.array(SessionRecordSchema).default([]),
  tasks: z.array(TaskRecordSchema).default([]),
});

function emptyState(): AppState {
  return { version: 2, users: [], sessions: [], tasks: [] };
}

function isMissingFile(e: unknown) {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Flat-file store for users, sessions and tasks.
 *
 * The state is read once and cached. Every change goes through `mutate`,
 * which runs one at a time against a copy and only swaps the cache once the
 * copy is on disk.
 */
export class JsonStore {
  private cache?: Promise<AppState>;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private dir = path.join(process.cwd(), '.task-assistant')) {}

  getDir() {
    return this.dir;
  }

  statePath() {
    return path.join(this.dir, 'state.json');
  }

  /** Migrate an older or partial state file to the latest schema. */
  private migrate(input: unknown): AppState {
    const parsed = StoredStateSchema.parse(input);
    const version = parsed.version ?? 0;

    const tasks: Task[] = parsed.tasks.map((t) => {
      // v0/v1 records only carried `completed`
      const status = t.status ?? (t.completed ? 'completed' : 'pending');
      return { ...t, status, completed: status === 'completed' };
    });

    return {
      version: 2,
      users: parsed.users,
      // v0/v1 sessions were not persisted with expiry we trust; force re-login
      sessions: version >= 2 ? parsed.sessions : [],
      tasks,
    };
  }

  async load(): Promise<AppState> {
    let raw: string;
    try {
      raw = await readFile(this.statePath(), 'utf8');
    } catch (e) {
      if (isMissingFile(e)) return emptyState();
      throw e;
    }
    return this.migrate(JSON.parse(raw));
  }

  /** Cached state. Treat the result as read-only; change it through `mutate`. */
  read(): Promise<AppState> {
    this.cache ??= this.load().catch((e: unknown) => {
      this.cache = undefined;
      throw e;
    });
    return this.cache;
  }

  mutate<T>(fn: (draft: AppState) => T | Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const draft = structuredClone(await this.read());
      const result = await fn(draft);
      await this.save(draft);
      this.cache = Promise.resolve(draft);
      return result;
    });
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async backupStateFile(): Promise<void> {
    try {
      await stat(this.statePath());
    } catch (e) {
      if (isMissingFile(e)) return;
      throw e;
    }
    await copyFile(this.statePath(), this.statePath() + '.bak');
  }

  async save(state: AppState): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await this.backupStateFile();
    const tmp = this.statePath() + '.tmp';
    await writeFile(tmp, JSON.stringify(state, null, 2) + '\n', 'utf8');
    await rename(tmp, this.statePath());
  }

  findUserById(state: AppState, id: string): User | undefined {
    return state.users.find((u) => u.id === id);
  }

  /** Case-insensitive match on username or email. */
  findUserByLogin(state: AppState, identifier: string): User | undefined {
    const key = identifier.trim().toLowerCase();
    return state.users.find((u) => u.username.toLowerCase() === key || u.email.toLowerCase() === key);
  }

  findSession(state: AppState, token: string): Session | undefined {
    return state.sessions.find((s) => s.token === token);
  }

  tasksOf(state: AppState, ownerId: string): Task[] {
    return state.tasks.filter((t) => t.ownerId === ownerId);
  }

  findTask(state: AppState, ownerId: string, id: string): Task | undefined {
    return state.tasks.find((t) => t.id === id && t.ownerId === ownerId);
  }

  pruneExpiredSessions(state: AppState, now = Date.now()): number {
    const before = state.sessions.length;
    state.sessions = state.sessions.filter((s) => Date.parse(s.expiresAt) > now);
    return before - state.sessions.length;
  }

  removeUser(state: AppState, userId: string): void {
    state.users = state.users.filter((u) => u.id !== userId);
    state.sessions = state.sessions.filter((s) => s.userId !== userId);
    state.tasks = state.tasks.filter((t) => t.ownerId !== userId);
  }
}
