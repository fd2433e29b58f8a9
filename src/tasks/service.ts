import { randomUUID } from 'node:crypto';
import type { Priority, Task, TaskStatus } from '../model.js';
import type { JsonStore } from '../store/jsonStore.js';
import { ApiError } from '../errors.js';
import { daysBetween, dueStatusOf, formatDate } from '../dates.js';
import { createLogger, type Logger } from '../log.js';
import { KeywordTaskMemory, type ScoredTask, type TaskMemory } from '../memory/taskMemory.js';
import { parseQuickAdd, type QuickAddResult } from '../nlp/quickAdd.js';
import {
  CreateTaskSchema,
  TaskFilterSchema,
  TITLE_REQUIRED,
  UpdateTaskSchema,
  type CreateTaskInput,
  type TaskFilter,
  type UpdateTaskInput,
} from './schemas.js';

export interface TaskServiceOptions {
  store: JsonStore;
  /** Defaults to keyword search. */
  memory?: TaskMemory;
  logger?: Logger;
  now?: () => Date;
}

export interface TaskStatistics {
  total_tasks: number;
  by_status: Partial<Record<TaskStatus, number>>;
  by_priority: Partial<Record<Priority, number>>;
}

/** Open tasks by due date; completed tasks are not counted. */
export interface DueSummary {
  overdue: number;
  due_today: number;
  /** 1 to 3 days out */
  due_soon: number;
  /** 4 to 7 days out */
  upcoming: number;
  no_due_date: number;
}

const NOT_FOUND = 'Task not found';

/** Keep `completed`, `status` and `completedAt` in step. */
function applyCompletion(task: Task, status: TaskStatus, nowIso: string) {
  const wasCompleted = task.completed;
  task.status = status;
  task.completed = status === 'completed';
  if (task.completed && !wasCompleted) task.completedAt = nowIso;
  if (!task.completed) delete task.completedAt;
}

export class TaskService {
  private readonly store: JsonStore;
  private readonly memory: TaskMemory;
  private readonly fallback = new KeywordTaskMemory();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(opts: TaskServiceOptions) {
    this.store = opts.store;
    this.memory = opts.memory ?? this.fallback;
    this.logger = opts.logger ?? createLogger('silent');
    this.now = opts.now ?? (() => new Date());
  }

  get memoryKind() {
    return this.memory.kind;
  }

  // The store is authoritative; index failures only degrade search.
  private async indexQuietly(task: Task) {
    try {
      await this.memory.index(task);
    } catch (e) {
      this.logger.warn(`failed to index task ${task.id}`, e);
    }
  }

  private async unindexQuietly(ownerId: string, taskId: string) {
    try {
      await this.memory.remove(ownerId, taskId);
    } catch (e) {
      this.logger.warn(`failed to remove task ${taskId} from the index`, e);
    }
  }

  /** Tasks in creation order. */
  async list(ownerId: string, filters: Partial<TaskFilter> = {}): Promise<Task[]> {
    const f = TaskFilterSchema.parse(filters);
    const state = await this.store.read();
    const now = this.now();
    return this.store
      .tasksOf(state, ownerId)
      .filter((t) => (f.status ? t.status === f.status : true))
      .filter((t) => (f.due ? dueStatusOf(t, now) === f.due : true))
      .filter((t) => (f.priority ? t.priority === f.priority : true))
      .filter((t) => (f.tag ? t.tags.includes(f.tag) : true));
  }

  async get(ownerId: string, id: string): Promise<Task> {
    const state = await this.store.read();
    const task = this.store.findTask(state, ownerId, id);
    if (!task) throw ApiError.notFound(NOT_FOUND);
    return task;
  }

  async create(ownerId: string, input: CreateTaskInput): Promise<Task> {
    const data = CreateTaskSchema.parse(input);

    const task = await this.store.mutate((state) => {
      const now = this.now().toISOString();
      const created: Task = {
        id: randomUUID(),
        ownerId,
        title: data.title,
        description: data.description,
        priority: data.priority,
        status: 'pending',
        completed: false,
        tags: data.tags,
        dueDate: data.due_date ?? undefined,
        createdAt: now,
        updatedAt: now,
      };
      const status = data.status ?? (data.completed ? 'completed' : 'pending');
      applyCompletion(created, status, now);
      state.tasks.push(created);
      return created;
    });

    this.logger.debug(`created task ${task.id}`, { ownerId });
    await this.indexQuietly(task);
    return task;
  }

  /**
   * Partial update. `status` wins over `completed` when both are sent;
   * un-completing a task puts it back to pending.
   */
  async update(ownerId: string, id: string, patch: UpdateTaskInput): Promise<Task> {
    const data = UpdateTaskSchema.parse(patch);

    const task = await this.store.mutate((state) => {
      const t = this.store.findTask(state, ownerId, id);
      if (!t) throw ApiError.notFound(NOT_FOUND);
      const now = this.now().toISOString();

      if (data.title !== undefined) t.title = data.title;
      if (data.description !== undefined) t.description = data.description;
      if (data.priority !== undefined) t.priority = data.priority;
      if (data.tags !== undefined) t.tags = data.tags;
      if (data.due_date !== undefined) {
        if (data.due_date === null) delete t.dueDate;
        else t.dueDate = data.due_date;
      }

      if (data.status !== undefined) {
        applyCompletion(t, data.status, now);
      } else if (data.completed !== undefined && data.completed !== t.completed) {
        applyCompletion(t, data.completed ? 'completed' : 'pending', now);
      }

      t.updatedAt = now;
      return t;
    });

    await this.indexQuietly(task);
    return task;
  }

  async delete(ownerId: string, id: string): Promise<void> {
    await this.store.mutate((state) => {
      if (!this.store.findTask(state, ownerId, id)) throw ApiError.notFound(NOT_FOUND);
      state.tasks = state.tasks.filter((t) => t.id !== id);
    });
    await this.unindexQuietly(ownerId, id);
  }

  async complete(ownerId: string, id: string): Promise<Task> {
    const task = await this.store.mutate((state) => {
      const t = this.store.findTask(state, ownerId, id);
      if (!t || t.completed) throw ApiError.notFound('Task not found or already completed');
      const now = this.now().toISOString();
      applyCompletion(t, 'completed', now);
      t.updatedAt = now;
      return t;
    });

    await this.indexQuietly(task);
    return task;
  }

  async statistics(ownerId: string): Promise<TaskStatistics> {
    const tasks = await this.list(ownerId);
    const stats: TaskStatistics = { total_tasks: tasks.length, by_status: {}, by_priority: {} };
    for (const t of tasks) {
      stats.by_status[t.status] = (stats.by_status[t.status] ?? 0) + 1;
      stats.by_priority[t.priority] = (stats.by_priority[t.priority] ?? 0) + 1;
    }
    return stats;
  }

  async dueSummary(ownerId: string): Promise<DueSummary> {
    const summary: DueSummary = { overdue: 0, due_today: 0, due_soon: 0, upcoming: 0, no_due_date: 0 };
    const today = formatDate(this.now());
    for (const t of await this.list(ownerId)) {
      if (t.completed) continue;
      if (!t.dueDate) {
        summary.no_due_date++;
        continue;
      }
      const days = daysBetween(today, t.dueDate);
      if (days < 0) summary.overdue++;
      else if (days === 0) summary.due_today++;
      else if (days <= 3) summary.due_soon++;
      else if (days <= 7) summary.upcoming++;
    }
    return summary;
  }

  /** Similarity search; falls back to keyword ranking when the vector index fails. */
  async search(ownerId: string, query: string, k = 10): Promise<ScoredTask[]> {
    const q = query.trim();
    if (!q) throw ApiError.badRequest('Search query is required');

    const tasks = await this.list(ownerId);
    if (tasks.length === 0) return [];

    try {
      return await this.memory.search(ownerId, q, k, tasks);
    } catch (e) {
      if (this.memory === this.fallback) throw e;
      this.logger.warn('vector search failed; using keyword search', e);
      return this.fallback.search(ownerId, q, k, tasks);
    }
  }

  /** Create a task from one line of text ("Call Sam tomorrow #work urgent"). */
  async quickAdd(ownerId: string, text: string): Promise<{ task: Task; parsed: QuickAddResult }> {
    if (!text.trim()) throw ApiError.badRequest('Text is required');

    const parsed = parseQuickAdd(text, this.now());
    if (!parsed.title) throw ApiError.badRequest(TITLE_REQUIRED);

    const task = await this.create(ownerId, {
      title: parsed.title,
      priority: parsed.priority,
      tags: parsed.tags,
      due_date: parsed.dueDate,
    });
    return { task, parsed };
  }

  /** Forget an owner's index entries (account deletion). */
  async forgetOwner(ownerId: string): Promise<void> {
    try {
      await this.memory.clear(ownerId);
    } catch (e) {
      this.logger.warn(`failed to clear the index for user ${ownerId}`, e);
    }
  }
}
