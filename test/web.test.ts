import { afterEach, describe, expect, it, vi } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import { once } from 'node:events';
import type { Server } from 'node:http';
import { mkdtemp } from 'node:fs/promises';
import { z } from 'zod';
import { createApp, type AppDeps } from '../src/web/app.js';
import { JsonStore } from '../src/store/jsonStore.js';
import { UserService } from '../src/auth/users.js';
import { GoogleOAuthClient } from '../src/auth/google.js';
import { TaskService } from '../src/tasks/service.js';

// a Wednesday
const NOW = new Date('2026-03-04T09:00:00.000Z');
const now = () => NOW;

const servers: Server[] = [];

afterEach(async () => {
  for (const s of servers.splice(0)) {
    s.closeAllConnections();
    s.close();
    await once(s, 'close');
  }
});

async function start(overrides: Partial<AppDeps> = {}) {
  const store = new JsonStore(await mkdtemp(path.join(os.tmpdir(), 'task-assistant-web-')));
  const users = new UserService({ store, hashRounds: 4, now });
  const tasks = new TaskService({ store, now });
  const app = createApp({ users, tasks, secretKey: 'test-secret', authRateLimit: 100, now, ...overrides });

  const server = app.listen(0, '127.0.0.1');
  servers.push(server);
  await once(server, 'listening');
  const addr = server.address();
  if (!addr || typeof addr === 'string') throw new Error('no port');
  return { base: `http://127.0.0.1:${addr.port}`, store, tasks };
}

interface CallOptions {
  token?: string;
  body?: unknown;
  rawBody?: string;
  cookie?: string;
}

async function call(base: string, method: string, url: string, opts: CallOptions = {}) {
  const headers: Record<string, string> = {};
  if (opts.token) headers.authorization = `Bearer ${opts.token}`;
  if (opts.cookie) headers.cookie = opts.cookie;
  if (opts.body !== undefined || opts.rawBody !== undefined) headers['content-type'] = 'application/json';

  const res = await fetch(base + url, {
    method,
    headers,
    body: opts.rawBody ?? (opts.body !== undefined ? JSON.stringify(opts.body) : undefined),
    redirect: 'manual',
  });
  const text = await res.text();
  const body: unknown = text && res.headers.get('content-type')?.includes('json') ? JSON.parse(text) : text;
  return { status: res.status, body, headers: res.headers };
}

function jsonResponse(obj: unknown) {
  return new Response(JSON.stringify(obj), { headers: { 'content-type': 'application/json' } });
}

const SessionBody = z.object({ session_id: z.string() });
const TaskBody = z.object({ task: z.object({ id: z.string() }) });

async function signUp(base: string, username = 'alice') {
  const res = await call(base, 'POST', '/api/auth/register', {
    body: { username, email: `${username}@example.com`, password: 'correct-horse' },
  });
  expect(res.status).toBe(201);
  return SessionBody.parse(res.body).session_id;
}

describe('web app', () => {
  it('reports health', async () => {
    const { base } = await start();
    const res = await call(base, 'GET', '/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: 'healthy',
      service: 'task-assistant',
      version: '0.1.0',
      timestamp: '2026-03-04T09:00:00.000Z',
      memory: 'keyword',
    });
  });

  it('hides unexpected failures behind a 500', async () => {
    const { base, tasks } = await start();
    const token = await signUp(base);
    vi.spyOn(tasks, 'list').mockRejectedValue(new Error('disk failure'));

    const res = await call(base, 'GET', '/api/tasks', { token });
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ success: false, error: 'Internal server error' });
  });

  it('refuses an oversized body with 413', async () => {
    const { base } = await start();
    const token = await signUp(base);

    const res = await call(base, 'POST', '/api/tasks', { token, body: { title: 'x', description: 'y'.repeat(200_000) } });
    expect(res.status).toBe(413);
    expect(res.body).toEqual({ success: false, error: 'Request body too large' });
  });

  it('answers unknown routes with 404, even under /api', async () => {
    const { base } = await start();
    expect((await call(base, 'GET', '/nope')).body).toEqual({ success: false, error: 'Not found' });
    expect((await call(base, 'GET', '/api/nope')).status).toBe(404);
  });

  describe('auth', () => {
    it('registers and sets the session cookie', async () => {
      const { base } = await start();
      const res = await call(base, 'POST', '/api/auth/register', {
        body: { username: 'alice', email: 'alice@example.com', password: 'correct-horse' },
      });

      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        success: true,
        message: 'Registration successful',
        user: { username: 'alice', email: 'alice@example.com', auth_provider: 'local', last_login_at: NOW.toISOString() },
      });
      const token = SessionBody.parse(res.body).session_id;
      expect(res.headers.get('set-cookie')).toContain(`session_id=${token}`);
      expect(JSON.stringify(res.body)).not.toContain('passwordHash');
    });

    it('validates registration input', async () => {
      const { base } = await start();
      const res = await call(base, 'POST', '/api/auth/register', { body: { username: 'alice' } });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, error: 'Username, email, and password are required' });
    });

    it('rejects a duplicate account', async () => {
      const { base } = await start();
      await signUp(base);
      const res = await call(base, 'POST', '/api/auth/register', {
        body: { username: 'Alice', email: 'new@example.com', password: 'correct-horse' },
      });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, error: 'Username or email already exists' });
    });

    it('logs in, reports the user, and logs out', async () => {
      const { base } = await start();
      await signUp(base);

      const bad = await call(base, 'POST', '/api/auth/login', { body: { username: 'alice', password: 'nope-nope' } });
      expect(bad.status).toBe(401);
      expect(bad.body).toEqual({ success: false, error: 'Invalid credentials' });

      const ok = await call(base, 'POST', '/api/auth/login', {
        body: { username: 'alice@example.com', password: 'correct-horse' },
      });
      expect(ok.status).toBe(200);
      const token = SessionBody.parse(ok.body).session_id;

      const me = await call(base, 'GET', '/api/auth/me', { token });
      expect(me.body).toMatchObject({ success: true, user: { username: 'alice' }, stats: { task_count: 0, active_sessions: 2 } });

      const viaCookie = await call(base, 'POST', '/api/auth/validate', { cookie: `session_id=${token}` });
      expect(viaCookie.body).toMatchObject({ success: true, user: { username: 'alice' } });

      expect((await call(base, 'POST', '/api/auth/logout', { token })).status).toBe(200);
      const after = await call(base, 'POST', '/api/auth/validate', { token });
      expect(after.status).toBe(401);
      expect(after.body).toEqual({ success: false, error: 'Invalid session' });
    });

    it('distinguishes a missing session from an invalid one', async () => {
      const { base } = await start();
      expect((await call(base, 'POST', '/api/auth/validate')).body).toEqual({ success: false, error: 'No session found' });
      expect((await call(base, 'GET', '/api/tasks')).body).toEqual({ success: false, error: 'Authentication required' });
      expect((await call(base, 'GET', '/api/tasks', { token: 'bogus' })).body).toEqual({
        success: false,
        error: 'Invalid session',
      });
    });

    it('rate limits login attempts', async () => {
      const { base } = await start({ authRateLimit: 2 });
      const attempt = () => call(base, 'POST', '/api/auth/login', { body: { username: 'x', password: 'y' } });

      expect((await attempt()).status).toBe(401);
      expect((await attempt()).status).toBe(401);
      const limited = await attempt();
      expect(limited.status).toBe(429);
      expect(limited.body).toEqual({ success: false, error: 'Too many attempts, please try again later' });
    });

    it('deletes the account with its tasks', async () => {
      const { base, store } = await start();
      const token = await signUp(base);
      await call(base, 'POST', '/api/tasks', { token, body: { title: 'Soon gone' } });

      const res = await call(base, 'DELETE', '/api/auth/delete-account', { token });
      expect(res.body).toEqual({ success: true, message: 'Account deleted successfully' });
      expect(await store.read()).toMatchObject({ users: [], sessions: [], tasks: [] });
    });
  });

  describe('tasks', () => {
    it('runs the task lifecycle', async () => {
      const { base } = await start();
      const token = await signUp(base);

      const created = await call(base, 'POST', '/api/tasks', {
        token,
        body: { title: 'Write report', priority: 'high', tags: 'Work', due_date: '2026-03-05' },
      });
      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({
        success: true,
        task: {
          title: 'Write report',
          priority: 'high',
          status: 'pending',
          completed: false,
          tags: ['work'],
          due_date: '2026-03-05',
          due_status: 'soon',
          completed_at: null,
        },
      });
      const id = TaskBody.parse(created.body).task.id;

      const list = await call(base, 'GET', '/api/tasks?priority=high', { token });
      expect(list.body).toMatchObject({ success: true, total: 1 });

      const patched = await call(base, 'PATCH', `/api/tasks/${id}`, { token, body: { status: 'in_progress' } });
      expect(patched.body).toMatchObject({ task: { status: 'in_progress', completed: false } });

      const completed = await call(base, 'POST', `/api/tasks/${id}/complete`, { token });
      expect(completed.body).toMatchObject({
        success: true,
        message: 'Task completed successfully',
        task: { status: 'completed', completed: true, due_status: 'completed', completed_at: NOW.toISOString() },
      });
      expect((await call(base, 'POST', `/api/tasks/${id}/complete`, { token })).body).toEqual({
        success: false,
        error: 'Task not found or already completed',
      });

      const removed = await call(base, 'DELETE', `/api/tasks/${id}`, { token });
      expect(removed.body).toEqual({ success: true, message: 'Task deleted successfully' });
      expect((await call(base, 'GET', `/api/tasks/${id}`, { token })).status).toBe(404);
    });

    it('keeps users apart', async () => {
      const { base } = await start();
      const alice = await signUp(base, 'alice');
      const bob = await signUp(base, 'bob');

      const created = await call(base, 'POST', '/api/tasks', { token: alice, body: { title: 'Private' } });
      const id = TaskBody.parse(created.body).task.id;

      expect((await call(base, 'GET', `/api/tasks/${id}`, { token: bob })).body).toEqual({
        success: false,
        error: 'Task not found',
      });
      expect((await call(base, 'GET', '/api/tasks', { token: bob })).body).toEqual({ success: true, tasks: [], total: 0 });
    });

    it('reports validation errors', async () => {
      const { base } = await start();
      const token = await signUp(base);

      const noTitle = await call(base, 'POST', '/api/tasks', { token, body: { description: 'x' } });
      expect(noTitle.body).toEqual({ success: false, error: 'Task title is required' });

      const badDate = await call(base, 'POST', '/api/tasks', { token, body: { title: 'x', due_date: '2026-02-30' } });
      expect(badDate.body).toEqual({ success: false, error: 'Due date must be a valid date in YYYY-MM-DD format' });

      const badFilter = await call(base, 'GET', '/api/tasks?due=later', { token });
      expect(badFilter.status).toBe(400);
      expect(badFilter.body).toEqual({ success: false, error: 'Due filter must be one of: overdue, today, soon' });

      const badJson = await call(base, 'POST', '/api/tasks', { token, rawBody: '{"title":' });
      expect(badJson.status).toBe(400);
      expect(badJson.body).toEqual({ success: false, error: 'Invalid JSON body' });
    });

    it('quick-adds and previews parsed text', async () => {
      const { base } = await start();
      const token = await signUp(base);

      const preview = await call(base, 'POST', '/api/tasks/parse', { token, body: { text: 'Pay rent by friday low priority' } });
      expect(preview.body).toEqual({
        success: true,
        parsed: { title: 'Pay rent', priority: 'low', tags: [], due_date: '2026-03-06' },
      });

      const res = await call(base, 'POST', '/api/tasks/quick', { token, body: { text: 'Submit report tomorrow #work urgent' } });
      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        task: { title: 'Submit report', priority: 'high', tags: ['work', 'tomorrow'], due_date: '2026-03-05' },
        parsed: { title: 'Submit report', priority: 'high', tags: ['work', 'tomorrow'], due_date: '2026-03-05' },
      });

      expect((await call(base, 'POST', '/api/tasks/quick', { token, body: {} })).body).toEqual({
        success: false,
        error: 'Text is required',
      });
    });

    it('searches and counts tasks', async () => {
      const { base } = await start();
      const token = await signUp(base);
      await call(base, 'POST', '/api/tasks', { token, body: { title: 'Buy milk' } });
      await call(base, 'POST', '/api/tasks', { token, body: { title: 'Buy a gift', priority: 'high' } });

      const found = await call(base, 'GET', '/api/search?q=gift', { token });
      expect(found.body).toMatchObject({
        success: true,
        query: 'gift',
        total: 1,
        results: [{ title: 'Buy a gift', similarity_score: 1 }],
      });

      expect((await call(base, 'GET', '/api/search?q=', { token })).body).toEqual({
        success: false,
        error: 'Search query is required',
      });
      expect((await call(base, 'GET', '/api/search?q=buy&k=0', { token })).body).toEqual({
        success: false,
        error: 'k must be between 1 and 50',
      });
      expect((await call(base, 'GET', '/api/search?q=buy')).status).toBe(401);

      expect((await call(base, 'GET', '/api/stats', { token })).body).toEqual({
        success: true,
        stats: { total_tasks: 2, by_status: { pending: 2 }, by_priority: { medium: 1, high: 1 } },
      });

      expect((await call(base, 'GET', '/api/stats/due', { token })).body).toEqual({
        success: true,
        due: { overdue: 0, due_today: 0, due_soon: 0, upcoming: 0, no_due_date: 2 },
      });
    });
  });

  describe('insights', () => {
    it('serves suggestions and analytics', async () => {
      const { base } = await start();
      const token = await signUp(base);

      const onboarding = await call(base, 'GET', '/api/suggestions?limit=1', { token });
      expect(onboarding.body).toMatchObject({ success: true, suggestions: [{ title: 'Create your first task' }] });

      await call(base, 'POST', '/api/tasks', { token, body: { title: 'Stretch', priority: 'low' } });

      expect((await call(base, 'GET', '/api/suggestions/next-actions', { token })).body).toEqual({
        success: true,
        actions: [
          { action: 'Complete 1 quick task(s)', priority: 'medium', reasoning: 'Quick wins build momentum and motivation' },
        ],
      });
      expect((await call(base, 'GET', '/api/suggestions/insights', { token })).body).toEqual({ success: true, insights: [] });
      expect((await call(base, 'GET', '/api/suggestions/productivity', { token })).body).toMatchObject({
        success: true,
        productivity: { completion_rate: 0, tag_usage: 0, due_date_adherence: 50 },
      });
      expect((await call(base, 'GET', '/api/analytics', { token })).body).toMatchObject({
        success: true,
        analytics: { basic_stats: { total_tasks: 1 } },
      });
      expect((await call(base, 'GET', '/api/analytics/weekly', { token })).body).toMatchObject({
        success: true,
        report: { tasks_created: 1, most_productive_day: 'Wednesday' },
      });
      expect((await call(base, 'GET', '/api/suggestions?limit=21', { token })).status).toBe(400);
    });
  });

  describe('google sign-in', () => {
    it('is off unless configured', async () => {
      const { base } = await start();
      expect((await call(base, 'GET', '/api/auth/google/login')).body).toEqual({
        success: false,
        error: 'Google sign-in is not configured',
      });

      const cb = await call(base, 'GET', '/api/auth/google/callback?code=x&state=y');
      expect(cb.status).toBe(302);
      expect(cb.headers.get('location')).toBe('/?login=error&reason=google_not_configured');
    });

    interface GoogleReplies {
      tokenStatus?: number;
      emailVerified?: boolean;
    }

    async function startWithGoogle({ tokenStatus = 200, emailVerified = true }: GoogleReplies = {}) {
      const fetcher: typeof fetch = async (url) => {
        if (String(url) === 'https://oauth2.googleapis.com/token') {
          if (tokenStatus !== 200) return new Response('{"error":"invalid_grant"}', { status: tokenStatus });
          return jsonResponse({ access_token: 'atok', expires_in: 3600, token_type: 'Bearer' });
        }
        return jsonResponse({ sub: 'g-1', email: 'sam@example.com', email_verified: emailVerified });
      };
      return start({
        google: {
          client: new GoogleOAuthClient({ clientId: 'cid', clientSecret: 'test-secret', fetcher }),
          redirectUri: 'http://localhost/api/auth/google/callback',
        },
      });
    }

    async function beginLogin(base: string) {
      const res = await call(base, 'GET', '/api/auth/google/login');
      const authUrl = new URL(z.object({ auth_url: z.string() }).parse(res.body).auth_url);
      const cookie = /oauth_state=[^;]+/.exec(res.headers.get('set-cookie') ?? '')?.[0] ?? '';
      return { state: authUrl.searchParams.get('state') ?? '', cookie };
    }

    it('completes the OAuth round trip', async () => {
      const { base } = await startWithGoogle();
      const { state, cookie } = await beginLogin(base);
      expect(state).not.toBe('');
      expect(cookie).not.toBe('');

      const cb = await call(base, 'GET', `/api/auth/google/callback?code=abc&state=${encodeURIComponent(state)}`, {
        cookie,
      });
      expect(cb.status).toBe(302);
      const location = cb.headers.get('location') ?? '';
      expect(location.startsWith('/?login=success&session_id=')).toBe(true);

      const token = new URLSearchParams(location.slice(2)).get('session_id') ?? '';
      const me = await call(base, 'GET', '/api/auth/me', { token });
      expect(me.body).toMatchObject({ user: { username: 'sam', email: 'sam@example.com', auth_provider: 'google' } });
    });

    it('refuses a callback whose state does not match', async () => {
      const { base } = await startWithGoogle();
      const { cookie } = await beginLogin(base);

      const cb = await call(base, 'GET', '/api/auth/google/callback?code=abc&state=forged', { cookie });
      expect(cb.headers.get('location')).toBe('/?login=error&reason=google_state_mismatch');

      const denied = await call(base, 'GET', '/api/auth/google/callback?error=access_denied', { cookie });
      expect(denied.headers.get('location')).toBe('/?login=error&reason=google_access_denied');
    });

    async function callback(base: string, query: string) {
      const { state, cookie } = await beginLogin(base);
      const res = await call(base, 'GET', `/api/auth/google/callback?state=${encodeURIComponent(state)}${query}`, {
        cookie,
      });
      return res.headers.get('location');
    }

    it('redirects with a reason when the code is missing', async () => {
      const { base } = await startWithGoogle();
      expect(await callback(base, '')).toBe('/?login=error&reason=google_missing_code');
    });

    it('redirects with a reason when the token exchange fails', async () => {
      const { base } = await startWithGoogle({ tokenStatus: 400 });
      expect(await callback(base, '&code=abc')).toBe('/?login=error&reason=google_token_exchange');
    });

    it('redirects with a reason for an unverified email', async () => {
      const { base } = await startWithGoogle({ emailVerified: false });
      expect(await callback(base, '&code=abc')).toBe('/?login=error&reason=google_email_unverified');
    });

    it('redirects with a reason for a disabled account', async () => {
      const { base, store } = await startWithGoogle();
      expect(await callback(base, '&code=abc')).toMatch(/^\/\?login=success&session_id=/);

      await store.mutate((draft) => {
        for (const u of draft.users) u.active = false;
      });
      expect(await callback(base, '&code=abc')).toBe('/?login=error&reason=google_account_disabled');
    });
  });
});
