import { randomBytes } from 'node:crypto';
import express, { type Request, type Response, type Router } from 'express';
import type { UserService } from '../../auth/users.js';
import type { GoogleOAuthClient, GoogleProfile } from '../../auth/google.js';
import { ApiError, errorMessage } from '../../errors.js';
import type { Logger } from '../../log.js';
import { asyncHandler } from '../middleware.js';
import { setSessionCookie } from './auth.js';

export const STATE_COOKIE = 'oauth_state';
const STATE_TTL_MS = 10 * 60 * 1000;

export interface GoogleRouteDeps {
  users: UserService;
  /** Absent when Google sign-in is not configured. */
  google?: { client: GoogleOAuthClient; redirectUri?: string };
  logger: Logger;
  secureCookies: boolean;
}

function callbackUrl(req: Request, configured?: string) {
  return configured ?? `${req.protocol}://${req.get('host') ?? 'localhost'}/api/auth/google/callback`;
}

function failure(res: Response, reason: string) {
  res.redirect(`/?login=error&reason=${encodeURIComponent(`google_${reason}`)}`);
}

function queryString(req: Request, key: string): string | undefined {
  const v: unknown = req.query[key];
  return typeof v === 'string' && v ? v : undefined;
}

function signedState(req: Request): string | undefined {
  const cookies: unknown = req.signedCookies;
  if (!cookies || typeof cookies !== 'object') return undefined;
  const v: unknown = Reflect.get(cookies, STATE_COOKIE);
  return typeof v === 'string' && v ? v : undefined;
}

export function googleRoutes({ users, google, logger, secureCookies }: GoogleRouteDeps): Router {
  const router = express.Router();

  router.get('/login', (req, res) => {
    if (!google) throw ApiError.badRequest('Google sign-in is not configured');

    const state = randomBytes(16).toString('base64url');
    res.cookie(STATE_COOKIE, state, {
      signed: true,
      httpOnly: true,
      sameSite: 'lax',
      secure: secureCookies,
      maxAge: STATE_TTL_MS,
      path: '/api/auth/google',
    });
    res.json({ success: true, auth_url: google.client.authorizationUrl(callbackUrl(req, google.redirectUri), state) });
  });

  router.get(
    '/callback',
    asyncHandler(async (req, res) => {
      if (!google) return failure(res, 'not_configured');

      const expected = signedState(req);
      res.clearCookie(STATE_COOKIE, { path: '/api/auth/google' });

      const error = queryString(req, 'error');
      if (error) return failure(res, error);

      const state = queryString(req, 'state');
      if (!expected || state !== expected) {
        logger.warn('google callback with missing or mismatched state', { ip: req.ip });
        return failure(res, 'state_mismatch');
      }

      const code = queryString(req, 'code');
      if (!code) return failure(res, 'missing_code');

      let profile: GoogleProfile;
      try {
        profile = await google.client.signIn(code, callbackUrl(req, google.redirectUri));
      } catch (e) {
        logger.warn(`google token exchange failed: ${errorMessage(e)}`);
        return failure(res, 'token_exchange');
      }

      try {
        const { session } = await users.loginWithGoogle(profile, req.ip);
        setSessionCookie(res, session, secureCookies);
        res.redirect(`/?login=success&session_id=${encodeURIComponent(session.token)}`);
      } catch (e) {
        if (e instanceof ApiError && e.status === 403) return failure(res, 'email_unverified');
        if (e instanceof ApiError && e.status === 401) return failure(res, 'account_disabled');
        throw e;
      }
    }),
  );

  return router;
}
