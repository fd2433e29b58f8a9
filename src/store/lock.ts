import { mkdir, readFile, writeFile, unlink } from 'node:fs/promises';
import path from 'node:path';

export interface LockHandle {
  path: string;
  release(): Promise<void>;
}

export class LockHeldError extends Error {
  constructor(public readonly pid: number) {
    super(`Another task-assistant server is using this state dir (pid=${pid}).`);
    this.name = 'LockHeldError';
  }
}

function errorCode(e: unknown): unknown {
  return e instanceof Error && 'code' in e ? e.code : undefined;
}

async function readLockPid(lockPath: string): Promise<number | undefined> {
  try {
    const parsed: unknown = JSON.parse(await readFile(lockPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'pid' in parsed && typeof parsed.pid === 'number') {
      return parsed.pid;
    }
  } catch {
    // unreadable or invalid: treated as stale
  }
  return undefined;
}

/**
 * Take the state dir for this process. A lock left behind by a process that
 * is no longer alive is taken over.
 */
export async function acquireLock(dir: string, filename = 'server.lock'): Promise<LockHandle> {
  await mkdir(dir, { recursive: true });
  const lockPath = path.join(dir, filename);

  const payload = JSON.stringify({ pid: process.pid, at: new Date().toISOString() }) + '\n';

  try {
    await writeFile(lockPath, payload, { flag: 'wx' });
  } catch (e) {
    if (errorCode(e) !== 'EEXIST') throw e;
    const otherPid = await readLockPid(lockPath);
    if (otherPid && otherPid !== process.pid && isProcessAlive(otherPid)) {
      throw new LockHeldError(otherPid);
    }
    await writeFile(lockPath, payload, { flag: 'w' });
  }

  return {
    path: lockPath,
    release: async () => {
      await unlink(lockPath).catch((e: unknown) => {
        if (errorCode(e) !== 'ENOENT') throw e;
      });
    },
  };
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: alive, owned by another user
    return errorCode(e) === 'EPERM';
  }
}
