import express, { type Router } from 'express';
import { z } from 'zod';
import type { TaskService } from '../../tasks/service.js';
import { analyzeBehavior, nextActions, productivityScore, smartSuggestions } from '../../insights/suggestions.js';
import { comprehensiveStats, weeklyReport } from '../../insights/analytics.js';
import { asyncHandler, authOf } from '../middleware.js';

export interface InsightRouteDeps {
  tasks: TaskService;
  now: () => Date;
}

function limitSchema(fallback: number) {
  return z.object({
    limit: z.coerce
      .number()
      .int()
      .min(1, 'limit must be between 1 and 20')
      .max(20, 'limit must be between 1 and 20')
      .default(fallback),
  });
}

/** Mounted under /api/suggestions. */
export function suggestionRoutes({ tasks, now }: InsightRouteDeps): Router {
  const router = express.Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const { limit } = limitSchema(5).parse(req.query);
      const list = await tasks.list(authOf(req).user.id);
      res.json({ success: true, suggestions: smartSuggestions(list, now(), limit) });
    }),
  );

  router.get(
    '/insights',
    asyncHandler(async (req, res) => {
      const list = await tasks.list(authOf(req).user.id);
      res.json({ success: true, insights: analyzeBehavior(list, now()) });
    }),
  );

  router.get(
    '/productivity',
    asyncHandler(async (req, res) => {
      const list = await tasks.list(authOf(req).user.id);
      res.json({ success: true, productivity: productivityScore(list, now()) });
    }),
  );

  router.get(
    '/next-actions',
    asyncHandler(async (req, res) => {
      const { limit } = limitSchema(3).parse(req.query);
      const list = await tasks.list(authOf(req).user.id);
      res.json({ success: true, actions: nextActions(list, now(), limit) });
    }),
  );

  return router;
}

/** Mounted under /api/analytics. */
export function analyticsRoutes({ tasks, now }: InsightRouteDeps): Router {
  const router = express.Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const list = await tasks.list(authOf(req).user.id);
      res.json({ success: true, analytics: comprehensiveStats(list, now()) });
    }),
  );

  router.get(
    '/weekly',
    asyncHandler(async (req, res) => {
      const list = await tasks.list(authOf(req).user.id);
      res.json({ success: true, report: weeklyReport(list, now()) });
    }),
  );

  return router;
}
