import type { Task } from '../model.js';
import type { Embedder } from './embeddings.js';
import type { PineconeIndex, VectorMetadata } from './pinecone.js';

export type MemoryKind = 'pinecone' | 'keyword';

export interface ScoredTask {
  task: Task;
  /** Higher is more similar. */
  score: number;
}

/**
 * Search index behind a user's tasks. The store stays the source of truth:
 * `search` only ranks the tasks it is handed.
 */
export interface TaskMemory {
  readonly kind: MemoryKind;
  index(task: Task): Promise<void>;
  remove(ownerId: string, taskId: string): Promise<void>;
  /** Drop everything indexed for one owner. */
  clear(ownerId: string): Promise<void>;
  search(ownerId: string, query: string, k: number, tasks: Task[]): Promise<ScoredTask[]>;
}

export function taskText(task: Pick<Task, 'title' | 'description' | 'tags'>): string {
  return [task.title, task.description, ...task.tags].filter((s) => s.length > 0).join(' ');
}

function tokenize(text: string): string[] {
  return [...new Set(text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean))];
}

/** Ranks by the share of query words that occur as whole words in the task text. Nothing to index. */
export class KeywordTaskMemory implements TaskMemory {
  readonly kind = 'keyword' as const;

  async index(): Promise<void> {}

  async remove(): Promise<void> {}

  async clear(): Promise<void> {}

  async search(_ownerId: string, query: string, k: number, tasks: Task[]): Promise<ScoredTask[]> {
    const words = tokenize(query);
    if (words.length === 0) return [];

    const scored: ScoredTask[] = [];
    for (const task of tasks) {
      const text = new Set(tokenize(taskText(task)));
      const hits = words.filter((w) => text.has(w)).length;
      if (hits > 0) scored.push({ task, score: hits / words.length });
    }

    // sort is stable: ties keep creation order
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, k);
  }
}

export interface VectorTaskMemoryOptions {
  embedder: Embedder;
  index: PineconeIndex;
}

function metadataOf(task: Task): VectorMetadata {
  const meta: VectorMetadata = {
    task_id: task.id,
    title: task.title,
    description: task.description,
    priority: task.priority,
    status: task.status,
    completed: task.completed,
    tags: task.tags,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
  // Pinecone rejects null metadata values
  if (task.dueDate) meta.due_date = task.dueDate;
  return meta;
}

/** Embeds tasks and keeps them in a Pinecone namespace per owner. */
export class VectorTaskMemory implements TaskMemory {
  readonly kind = 'pinecone' as const;

  constructor(private opts: VectorTaskMemoryOptions) {}

  async index(task: Task): Promise<void> {
    const [values] = await this.opts.embedder.embed([taskText(task)]);
    if (!values) return;
    await this.opts.index.upsert(task.ownerId, [{ id: task.id, values, metadata: metadataOf(task) }]);
  }

  async remove(ownerId: string, taskId: string): Promise<void> {
    await this.opts.index.deleteIds(ownerId, [taskId]);
  }

  async clear(ownerId: string): Promise<void> {
    await this.opts.index.deleteAll(ownerId);
  }

  async search(ownerId: string, query: string, k: number, tasks: Task[]): Promise<ScoredTask[]> {
    const topK = Math.min(k, tasks.length);
    if (topK <= 0) return [];

    const [vector] = await this.opts.embedder.embed([query]);
    if (!vector) return [];

    const byId = new Map(tasks.map((t) => [t.id, t]));
    const matches = await this.opts.index.query(ownerId, vector, topK);

    const out: ScoredTask[] = [];
    for (const m of matches) {
      // vectors can outlive their task if a delete failed
      const task = byId.get(m.id);
      if (task) out.push({ task, score: m.score });
    }
    return out;
  }
}
