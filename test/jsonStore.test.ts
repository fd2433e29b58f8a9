import { describe, expect, it } from 'vitest';
import { JsonStore } from '../src/store/jsonStore.js';
import { acquireLock, LockHeldError } from '../src/store/lock.js';
import path from 'node:path';
import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import os from 'node:os';

const tmpDir = () => mkdtemp(path.join(os.tmpdir(), 'task-assistant-'));

describe('JsonStore', () => {
  it('starts empty and re-loads saved state', async () => {
    const dir = await tmpDir();
    const store = new JsonStore(dir);

    const s1 = await store.load();
    expect(s1).toEqual({ version: 2, users: [], sessions: [], tasks: [] });

    await store.mutate((draft) => {
      draft.users.push({
        id: 'u1',
        username: 'alice',
        email: 'alice@example.com',
        createdAt: '2026-03-01T00:00:00.000Z',
        active: true,
      });
    });

    const s2 = await new JsonStore(dir).load();
    expect(s2.users.map((u) => u.username)).toEqual(['alice']);
  });

  it('keeps a .bak of the previous state on save', async () => {
    const dir = await tmpDir();
    const store = new JsonStore(dir);

    await store.mutate((d) => {
      d.sessions.push({ token: 't1', userId: 'u1', createdAt: 'a', expiresAt: 'b' });
    });
    await store.mutate((d) => {
      d.sessions = [];
    });

    const backup: unknown = JSON.parse(await readFile(store.statePath() + '.bak', 'utf8'));
    expect(backup).toMatchObject({ sessions: [{ token: 't1' }] });
  });

  it('serializes concurrent mutations', async () => {
    const store = new JsonStore(await tmpDir());

    await Promise.all(
      Array.from({ length: 10 }, (_, i) =>
        store.mutate((d) => {
          d.sessions.push({ token: `t${i}`, userId: 'u', createdAt: 'a', expiresAt: 'b' });
        }),
      ),
    );

    const state = await store.read();
    expect(state.sessions).toHaveLength(10);
  });

  it('does not apply a mutation that throws', async () => {
    const store = new JsonStore(await tmpDir());

    await expect(
      store.mutate((d) => {
        d.sessions.push({ token: 'x', userId: 'u', createdAt: 'a', expiresAt: 'b' });
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect((await store.read()).sessions).toEqual([]);
    await store.mutate(() => undefined);
    expect((await store.read()).sessions).toEqual([]);
  });

  it('migrates v1 tasks that only carry `completed` and drops old sessions', async () => {
    const dir = await tmpDir();
    await writeFile(
      path.join(dir, 'state.json'),
      JSON.stringify({
        version: 1,
        users: [],
        sessions: [{ token: 't', userId: 'u', createdAt: 'a', expiresAt: '2999-01-01T00:00:00.000Z' }],
        tasks: [
          {
            id: 't1',
            ownerId: 'u',
            title: 'Done',
            completed: true,
            createdAt: '2026-01-01T00:00:00.000Z',
            updatedAt: '2026-01-01T00:00:00.000Z',
          },
          {
            id: 't2',
            ownerId: 'u',
            title: 'Open',
            priority: 'urgent',
            createdAt: '2026-01-01T00:00:00.000Z',
            updatedAt: '2026-01-01T00:00:00.000Z',
          },
        ],
      }),
    );

    const state = await new JsonStore(dir).load();
    expect(state.sessions).toEqual([]);
    expect(state.tasks.map((t) => [t.status, t.completed, t.priority])).toEqual([
      ['completed', true, 'medium'],
      ['pending', false, 'medium'],
    ]);
  });

  it('prunes expired sessions and removes users with their data', async () => {
    const store = new JsonStore(await tmpDir());
    const state = await store.load();
    state.users.push({ id: 'u1', username: 'a', email: 'a@x.io', createdAt: 'c', active: true });
    state.sessions.push(
      { token: 'old', userId: 'u1', createdAt: 'c', expiresAt: '2026-01-01T00:00:00.000Z' },
      { token: 'new', userId: 'u1', createdAt: 'c', expiresAt: '2026-12-01T00:00:00.000Z' },
    );

    expect(store.pruneExpiredSessions(state, Date.parse('2026-06-01T00:00:00.000Z'))).toBe(1);
    expect(state.sessions.map((s) => s.token)).toEqual(['new']);

    store.removeUser(state, 'u1');
    expect(state.users).toEqual([]);
    expect(state.sessions).toEqual([]);
  });

  it('finds users by username or email, ignoring case', async () => {
    const store = new JsonStore(await tmpDir());
    const state = await store.load();
    state.users.push({ id: 'u1', username: 'Alice', email: 'Alice@Example.com', createdAt: 'c', active: true });

    expect(store.findUserByLogin(state, ' alice ')?.id).toBe('u1');
    expect(store.findUserByLogin(state, 'alice@example.com')?.id).toBe('u1');
    expect(store.findUserByLogin(state, 'bob')).toBeUndefined();
  });
});

describe('acquireLock', () => {
  it('takes over a stale lock and refuses a live one', async () => {
    const dir = await tmpDir();
    await writeFile(path.join(dir, 'server.lock'), JSON.stringify({ pid: 2 ** 22 + 12345 }));

    const lock = await acquireLock(dir);
    const held: unknown = JSON.parse(await readFile(lock.path, 'utf8'));
    expect(held).toMatchObject({ pid: process.pid });

    await writeFile(lock.path, JSON.stringify({ pid: process.ppid }));
    await expect(acquireLock(dir)).rejects.toBeInstanceOf(LockHeldError);

    await lock.release();
  });
});
