import type { Task, TaskView } from '../model.js';
import { dueStatusOf } from '../dates.js';

/** API shape of a task (snake_case, derived `due_status`). */
export function toTaskView(task: Task, now: Date, similarityScore?: number): TaskView {
  const view: TaskView = {
    id: task.id,
    title: task.title,
    description: task.description,
    priority: task.priority,
    status: task.status,
    completed: task.completed,
    tags: [...task.tags],
    due_date: task.dueDate ?? null,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
    completed_at: task.completedAt ?? null,
    due_status: dueStatusOf(task, now),
  };
  if (similarityScore !== undefined) view.similarity_score = similarityScore;
  return view;
}
