import express, { type CookieOptions, type RequestHandler, type Response, type Router } from 'express';
import { toUserView, type Session } from '../../model.js';
import type { UserService } from '../../auth/users.js';
import type { TaskService } from '../../tasks/service.js';
import { LoginSchema, RegisterSchema } from '../../auth/schemas.js';
import { ApiError } from '../../errors.js';
import { SESSION_COOKIE, asyncHandler, authOf, requireAuth, sessionToken } from '../middleware.js';

export interface AuthRouteDeps {
  users: UserService;
  tasks: TaskService;
  /** Applied to login and register. */
  limiter: RequestHandler;
  secureCookies: boolean;
}

export function sessionCookieOptions(session: Session, secure: boolean): CookieOptions {
  return {
    // the browser client reads it to send the Authorization header
    httpOnly: false,
    sameSite: 'lax',
    secure,
    path: '/',
    expires: new Date(session.expiresAt),
  };
}

export function setSessionCookie(res: Response, session: Session, secure: boolean) {
  res.cookie(SESSION_COOKIE, session.token, sessionCookieOptions(session, secure));
}

export function authRoutes({ users, tasks, limiter, secureCookies }: AuthRouteDeps): Router {
  const router = express.Router();
  const auth = requireAuth(users);

  router.post(
    '/register',
    limiter,
    asyncHandler(async (req, res) => {
      const input = RegisterSchema.parse(req.body);
      const { user, session } = await users.register(input, req.ip);
      setSessionCookie(res, session, secureCookies);
      res.status(201).json({
        success: true,
        user: toUserView(user),
        session_id: session.token,
        message: 'Registration successful',
      });
    }),
  );

  router.post(
    '/login',
    limiter,
    asyncHandler(async (req, res) => {
      const input = LoginSchema.parse(req.body);
      const { user, session } = await users.login(input, req.ip);
      setSessionCookie(res, session, secureCookies);
      res.json({ success: true, user: toUserView(user), session_id: session.token, message: 'Login successful' });
    }),
  );

  router.post(
    '/logout',
    auth,
    asyncHandler(async (req, res) => {
      await users.logout(authOf(req).session.token);
      res.clearCookie(SESSION_COOKIE, { path: '/' });
      res.json({ success: true, message: 'Logged out successfully' });
    }),
  );

  router.get(
    '/me',
    auth,
    asyncHandler(async (req, res) => {
      const { user } = authOf(req);
      const stats = await users.getUserStats(user.id);
      res.json({
        success: true,
        user: toUserView(user),
        stats: { task_count: stats?.taskCount ?? 0, active_sessions: stats?.activeSessions ?? 0 },
      });
    }),
  );

  router.post(
    '/validate',
    asyncHandler(async (req, res) => {
      const token = sessionToken(req);
      if (!token) throw ApiError.unauthorized('No session found');
      const found = await users.getUserFromSession(token);
      if (!found) throw ApiError.unauthorized('Invalid session');
      res.json({ success: true, user: toUserView(found.user) });
    }),
  );

  router.delete(
    '/delete-account',
    auth,
    asyncHandler(async (req, res) => {
      const { user } = authOf(req);
      const deleted = await users.deleteUser(user.id, req.ip);
      if (!deleted) throw ApiError.notFound('User not found');
      await tasks.forgetOwner(user.id);
      res.clearCookie(SESSION_COOKIE, { path: '/' });
      res.json({ success: true, message: 'Account deleted successfully' });
    }),
  );

  return router;
}
