import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import type { Session, User } from '../model.js';
import type { UserService } from '../auth/users.js';
import { ApiError } from '../errors.js';
import type { Logger } from '../log.js';

export interface AuthContext {
  user: User;
  session: Session;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** Set by `requireAuth`. */
      auth?: AuthContext;
    }
  }
}

export const SESSION_COOKIE = 'session_id';

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/** Express 4 does not catch rejected promises; forward them to the error handler. */
export function asyncHandler(fn: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/** Session token from the `session_id` cookie or the Authorization header (raw or Bearer). */
export function sessionToken(req: Request): string | undefined {
  const cookies: unknown = req.cookies;
  if (cookies && typeof cookies === 'object' && SESSION_COOKIE in cookies) {
    const value: unknown = Reflect.get(cookies, SESSION_COOKIE);
    if (typeof value === 'string' && value) return value;
  }

  const header = req.get('authorization')?.trim();
  if (!header) return undefined;
  const token = header.replace(/^Bearer\s+/i, '').trim();
  return token || undefined;
}

export function requireAuth(users: UserService): RequestHandler {
  return asyncHandler(async (req, _res, next) => {
    const token = sessionToken(req);
    if (!token) throw ApiError.unauthorized();

    const auth = await users.getUserFromSession(token);
    if (!auth) throw ApiError.unauthorized('Invalid session');

    req.auth = auth;
    next();
  });
}

/** The authenticated context; only valid behind `requireAuth`. */
export function authOf(req: Request): AuthContext {
  if (!req.auth) throw ApiError.unauthorized();
  return req.auth;
}

function bodyParserErrorType(err: unknown): string | undefined {
  if (!(err instanceof Error) || !('type' in err)) return undefined;
  return typeof err.type === 'string' ? err.type : undefined;
}

export function notFound(): RequestHandler {
  return (_req, res) => {
    res.status(404).json({ success: false, error: 'Not found' });
  };
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof ApiError) {
      res.status(err.status).json({ success: false, error: err.message });
      return;
    }

    if (err instanceof ZodError) {
      res.status(400).json({ success: false, error: err.issues[0]?.message ?? 'Invalid request' });
      return;
    }

    const parserError = bodyParserErrorType(err);
    if (parserError === 'entity.parse.failed') {
      res.status(400).json({ success: false, error: 'Invalid JSON body' });
      return;
    }
    if (parserError === 'entity.too.large') {
      res.status(413).json({ success: false, error: 'Request body too large' });
      return;
    }

    logger.error(`unhandled error on ${req.method} ${req.path}`, err);
    res.status(500).json({ success: false, error: 'Internal server error' });
  };
}
