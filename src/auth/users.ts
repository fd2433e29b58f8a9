import { randomBytes, randomUUID } from 'node:crypto';
import type { Session, User } from '../model.js';
import type { AppState, JsonStore } from '../store/jsonStore.js';
import { ApiError } from '../errors.js';
import { createLogger, logSecurityEvent, type Logger } from '../log.js';
import { hashPassword, verifyPassword, DEFAULT_HASH_ROUNDS } from './passwords.js';
import type { LoginInput, RegisterInput } from './schemas.js';
import type { GoogleProfile } from './google.js';

export interface UserServiceOptions {
  store: JsonStore;
  logger?: Logger;
  /** Session lifetime in days (default: 30). */
  sessionTtlDays?: number;
  /** bcrypt cost (default: 12). */
  hashRounds?: number;
  now?: () => Date;
}

export interface AuthResult {
  user: User;
  session: Session;
}

export interface UserStats {
  user: User;
  taskCount: number;
  activeSessions: number;
}

const INVALID_CREDENTIALS = 'Invalid credentials';

function usernameFromEmail(email: string) {
  const local = email.split('@')[0] ?? '';
  const cleaned = local.replace(/[^A-Za-z0-9_.-]/g, '').slice(0, 40);
  return cleaned.length >= 3 ? cleaned : `user${cleaned}`;
}

export class UserService {
  private readonly store: JsonStore;
  private readonly logger: Logger;
  private readonly sessionTtlMs: number;
  private readonly hashRounds: number;
  private readonly now: () => Date;

  constructor(opts: UserServiceOptions) {
    this.store = opts.store;
    this.logger = opts.logger ?? createLogger('silent');
    this.sessionTtlMs = (opts.sessionTtlDays ?? 30) * 24 * 60 * 60 * 1000;
    this.hashRounds = opts.hashRounds ?? DEFAULT_HASH_ROUNDS;
    this.now = opts.now ?? (() => new Date());
  }

  private openSession(state: AppState, userId: string): Session {
    const now = this.now();
    const session: Session = {
      token: randomBytes(32).toString('base64url'),
      userId,
      createdAt: now.toISOString(),
      expiresAt: new Date(now.getTime() + this.sessionTtlMs).toISOString(),
    };
    state.sessions.push(session);
    return session;
  }

  private uniqueUsername(state: AppState, base: string): string {
    const taken = new Set(state.users.map((u) => u.username.toLowerCase()));
    if (!taken.has(base.toLowerCase())) return base;
    let n = 2;
    while (taken.has(`${base}${n}`.toLowerCase())) n++;
    return `${base}${n}`;
  }

  /** Create a local account and sign it in. */
  async register(input: RegisterInput, ip?: string): Promise<AuthResult> {
    const passwordHash = await hashPassword(input.password, this.hashRounds);

    const result = await this.store.mutate((state) => {
      const username = input.username.toLowerCase();
      const email = input.email.toLowerCase();
      const clash = state.users.some(
        (u) => u.username.toLowerCase() === username || u.email.toLowerCase() === email,
      );
      if (clash) throw ApiError.badRequest('Username or email already exists');

      const now = this.now().toISOString();
      const user: User = {
        id: randomUUID(),
        username: input.username,
        email: input.email,
        passwordHash,
        createdAt: now,
        lastLoginAt: now,
        active: true,
      };
      state.users.push(user);
      return { user, session: this.openSession(state, user.id) };
    });

    logSecurityEvent(this.logger, 'registration', { username: result.user.username, userId: result.user.id, ip });
    return result;
  }

  /** Sign in with username or email plus password. */
  async login(input: LoginInput, ip?: string): Promise<AuthResult> {
    const state = await this.store.read();
    const candidate = this.store.findUserByLogin(state, input.username);

    const ok =
      candidate !== undefined &&
      candidate.active &&
      candidate.passwordHash !== undefined &&
      (await verifyPassword(input.password, candidate.passwordHash));

    if (!candidate || !ok) {
      logSecurityEvent(this.logger, 'failed_login', { username: input.username, ip });
      throw ApiError.unauthorized(INVALID_CREDENTIALS);
    }

    const result = await this.store.mutate((draft) => {
      const user = this.store.findUserById(draft, candidate.id);
      if (!user?.active) throw ApiError.unauthorized(INVALID_CREDENTIALS);
      user.lastLoginAt = this.now().toISOString();
      return { user, session: this.openSession(draft, user.id) };
    });

    logSecurityEvent(this.logger, 'successful_login', { username: result.user.username, userId: result.user.id, ip });
    return result;
  }

  /**
   * Sign in through Google. Looks the account up by Google subject, then by
   * email (linking the subject); otherwise creates one. An account already
   * linked to a different subject is refused with 401.
   */
  async loginWithGoogle(profile: GoogleProfile, ip?: string): Promise<AuthResult & { created: boolean }> {
    if (!profile.emailVerified) {
      throw new ApiError(403, 'Google account email is not verified');
    }

    const result = await this.store.mutate((state) => {
      const email = profile.email.toLowerCase();
      let user =
        state.users.find((u) => u.googleSubject === profile.sub) ??
        state.users.find((u) => u.email.toLowerCase() === email);
      let created = false;

      const now = this.now().toISOString();
      if (!user) {
        user = {
          id: randomUUID(),
          username: this.uniqueUsername(state, usernameFromEmail(profile.email)),
          email: profile.email,
          googleSubject: profile.sub,
          createdAt: now,
          active: true,
        };
        state.users.push(user);
        created = true;
      }

      if (!user.active) throw ApiError.unauthorized(INVALID_CREDENTIALS);
      // an account links to one Google identity
      if (user.googleSubject && user.googleSubject !== profile.sub) {
        logSecurityEvent(this.logger, 'oauth_link_refused', {
          username: user.username,
          userId: user.id,
          ip,
          reason: 'email already linked to another Google account',
        });
        throw ApiError.unauthorized(INVALID_CREDENTIALS);
      }
      user.googleSubject = profile.sub;
      user.lastLoginAt = now;
      return { user, created, session: this.openSession(state, user.id) };
    });

    logSecurityEvent(this.logger, 'oauth_login', {
      username: result.user.username,
      userId: result.user.id,
      ip,
      reason: result.created ? 'account created' : undefined,
    });
    return result;
  }

  /** Returns false when the token was not a live session. */
  async logout(token: string): Promise<boolean> {
    return this.store.mutate((state) => {
      const before = state.sessions.length;
      state.sessions = state.sessions.filter((s) => s.token !== token);
      return state.sessions.length !== before;
    });
  }

  /** Resolve a session token. Expired sessions are removed on sight. */
  async getUserFromSession(token: string): Promise<AuthResult | undefined> {
    const state = await this.store.read();
    const session = this.store.findSession(state, token);
    if (!session) return undefined;

    if (Date.parse(session.expiresAt) <= this.now().getTime()) {
      await this.logout(token);
      return undefined;
    }

    const user = this.store.findUserById(state, session.userId);
    if (!user?.active) return undefined;
    return { user, session };
  }

  /** Removes the user with their sessions and tasks. */
  async deleteUser(userId: string, ip?: string): Promise<boolean> {
    const removed = await this.store.mutate((state) => {
      const user = this.store.findUserById(state, userId);
      if (!user) return undefined;
      this.store.removeUser(state, userId);
      return user;
    });
    if (!removed) return false;

    logSecurityEvent(this.logger, 'account_deleted', { username: removed.username, userId, ip });
    return true;
  }

  async cleanupExpiredSessions(): Promise<number> {
    const count = await this.store.mutate((state) => this.store.pruneExpiredSessions(state, this.now().getTime()));
    if (count > 0) this.logger.info(`cleaned up ${count} expired session(s)`);
    return count;
  }

  async getUserStats(userId: string): Promise<UserStats | undefined> {
    const state = await this.store.read();
    const user = this.store.findUserById(state, userId);
    if (!user) return undefined;

    const now = this.now().getTime();
    return {
      user,
      taskCount: this.store.tasksOf(state, userId).length,
      activeSessions: state.sessions.filter((s) => s.userId === userId && Date.parse(s.expiresAt) > now).length,
    };
  }
}
