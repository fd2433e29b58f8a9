import express, { type RequestHandler, type Router } from 'express';
import { z } from 'zod';
import type { TaskService } from '../../tasks/service.js';
import { CreateTaskSchema, TaskFilterSchema, UpdateTaskSchema } from '../../tasks/schemas.js';
import { toTaskView } from '../../tasks/view.js';
import { parseQuickAdd, type QuickAddResult } from '../../nlp/quickAdd.js';
import { asyncHandler, authOf } from '../middleware.js';

export interface TaskRouteDeps {
  tasks: TaskService;
  now: () => Date;
}

const TextSchema = z.object({
  text: z.string({ required_error: 'Text is required', invalid_type_error: 'Text is required' }),
});

const SearchQuerySchema = z.object({
  q: z.string().default(''),
  k: z.coerce.number().int().min(1, 'k must be between 1 and 50').max(50, 'k must be between 1 and 50').default(10),
});

function parsedView(p: QuickAddResult) {
  return { title: p.title, priority: p.priority ?? null, tags: p.tags, due_date: p.dueDate ?? null };
}

/** Mounted under /api/tasks. */
export function taskRoutes({ tasks, now }: TaskRouteDeps): Router {
  const router = express.Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const list = await tasks.list(authOf(req).user.id, TaskFilterSchema.parse(req.query));
      const at = now();
      res.json({ success: true, tasks: list.map((t) => toTaskView(t, at)), total: list.length });
    }),
  );

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const task = await tasks.create(authOf(req).user.id, CreateTaskSchema.parse(req.body));
      res.status(201).json({ success: true, task: toTaskView(task, now()) });
    }),
  );

  router.post(
    '/quick',
    asyncHandler(async (req, res) => {
      const { text } = TextSchema.parse(req.body);
      const { task, parsed } = await tasks.quickAdd(authOf(req).user.id, text);
      res.status(201).json({ success: true, task: toTaskView(task, now()), parsed: parsedView(parsed) });
    }),
  );

  router.post('/parse', (req, res) => {
    const { text } = TextSchema.parse(req.body);
    res.json({ success: true, parsed: parsedView(parseQuickAdd(text, now())) });
  });

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const task = await tasks.get(authOf(req).user.id, req.params.id ?? '');
      res.json({ success: true, task: toTaskView(task, now()) });
    }),
  );

  const update = asyncHandler(async (req, res) => {
    const task = await tasks.update(authOf(req).user.id, req.params.id ?? '', UpdateTaskSchema.parse(req.body));
    res.json({ success: true, task: toTaskView(task, now()) });
  });
  router.put('/:id', update);
  router.patch('/:id', update);

  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      await tasks.delete(authOf(req).user.id, req.params.id ?? '');
      res.json({ success: true, message: 'Task deleted successfully' });
    }),
  );

  router.post(
    '/:id/complete',
    asyncHandler(async (req, res) => {
      const task = await tasks.complete(authOf(req).user.id, req.params.id ?? '');
      res.json({ success: true, message: 'Task completed successfully', task: toTaskView(task, now()) });
    }),
  );

  return router;
}

/** GET /api/search, GET /api/stats and GET /api/stats/due. */
export function searchRoutes({ tasks, now, auth }: TaskRouteDeps & { auth: RequestHandler }): Router {
  const router = express.Router();

  router.get(
    '/search',
    auth,
    asyncHandler(async (req, res) => {
      const { q, k } = SearchQuerySchema.parse(req.query);
      const results = await tasks.search(authOf(req).user.id, q, k);
      const at = now();
      res.json({
        success: true,
        results: results.map((r) => toTaskView(r.task, at, r.score)),
        query: q.trim(),
        total: results.length,
      });
    }),
  );

  router.get(
    '/stats',
    auth,
    asyncHandler(async (req, res) => {
      res.json({ success: true, stats: await tasks.statistics(authOf(req).user.id) });
    }),
  );

  router.get(
    '/stats/due',
    auth,
    asyncHandler(async (req, res) => {
      res.json({ success: true, due: await tasks.dueSummary(authOf(req).user.id) });
    }),
  );

  return router;
}
