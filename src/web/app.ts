import express, { type Express } from 'express';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import helmet from 'helmet';
import { rateLimit } from 'express-rate-limit';
import type { UserService } from '../auth/users.js';
import type { GoogleOAuthClient } from '../auth/google.js';
import type { TaskService } from '../tasks/service.js';
import { createLogger, logSecurityEvent, type Logger } from '../log.js';
import { SERVICE_NAME, VERSION } from '../version.js';
import { errorHandler, notFound, requireAuth } from './middleware.js';
import { authRoutes } from './routes/auth.js';
import { googleRoutes } from './routes/google.js';
import { searchRoutes, taskRoutes } from './routes/tasks.js';
import { analyticsRoutes, suggestionRoutes } from './routes/insights.js';

export interface AppDeps {
  users: UserService;
  tasks: TaskService;
  /** Signs the OAuth state cookie. */
  secretKey: string;
  logger?: Logger;
  google?: { client: GoogleOAuthClient; redirectUri?: string };
  /** Login/register attempts per minute per client (default: 5). */
  authRateLimit?: number;
  /** Value for Express `trust proxy` (hops). */
  trustProxy?: number;
  /** Allowed CORS origins; empty allows none cross-origin. */
  corsOrigins?: string[];
  /** Marks cookies `Secure`. */
  production?: boolean;
  now?: () => Date;
}

export function createApp(deps: AppDeps): Express {
  const logger = deps.logger ?? createLogger('silent');
  const httpLog = logger.child('http');
  const now = deps.now ?? (() => new Date());
  const secureCookies = deps.production ?? false;

  const app = express();
  app.set('trust proxy', deps.trustProxy ?? 0);

  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigins ?? [], credentials: true }));
  app.use(express.json({ limit: '100kb' }));
  app.use(cookieParser(deps.secretKey));

  app.use((req, res, next) => {
    const started = Date.now();
    res.on('finish', () => {
      httpLog.debug(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`);
    });
    next();
  });

  const authLimiter = rateLimit({
    windowMs: 60_000,
    limit: deps.authRateLimit ?? 5,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    handler: (req, res) => {
      logSecurityEvent(logger, 'rate_limited', { ip: req.ip, reason: req.path });
      res.status(429).json({ success: false, error: 'Too many attempts, please try again later' });
    },
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      version: VERSION,
      timestamp: now().toISOString(),
      memory: deps.tasks.memoryKind,
    });
  });

  app.use(
    '/api/auth/google',
    googleRoutes({ users: deps.users, google: deps.google, logger: logger.child('google'), secureCookies }),
  );
  app.use('/api/auth', authRoutes({ users: deps.users, tasks: deps.tasks, limiter: authLimiter, secureCookies }));

  const auth = requireAuth(deps.users);
  app.use('/api/tasks', auth, taskRoutes({ tasks: deps.tasks, now }));
  app.use('/api/suggestions', auth, suggestionRoutes({ tasks: deps.tasks, now }));
  app.use('/api/analytics', auth, analyticsRoutes({ tasks: deps.tasks, now }));
  app.use('/api', searchRoutes({ tasks: deps.tasks, now, auth }));

  app.use(notFound());
  app.use(errorHandler(logger));

  return app;
}
