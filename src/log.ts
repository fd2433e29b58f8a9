export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const ORDER: Record<Exclude<LogLevel, 'silent'>, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
  /** Logger whose lines are prefixed with `[scope]`. */
  child(scope: string): Logger;
}

export type SecurityEvent =
  | 'failed_login'
  | 'successful_login'
  | 'registration'
  | 'oauth_login'
  | 'oauth_link_refused'
  | 'account_deleted'
  | 'rate_limited';

function fmtMeta(meta: unknown) {
  if (meta === undefined) return '';
  if (typeof meta === 'string') return ` ${meta}`;
  if (meta instanceof Error) return ` ${meta.stack ?? meta.message}`;
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

export function createLogger(level: LogLevel = 'info', scope?: string): Logger {
  if (level === 'silent') {
    const silent: Logger = {
      error: () => {},
      warn: () => {},
      info: () => {},
      debug: () => {},
      child: () => silent,
    };
    return silent;
  }

  const threshold = ORDER[level];
  const tag = scope ? `[${scope}] ` : '';
  const prefix = (lvl: string) => `${new Date().toISOString()} ${lvl.toUpperCase()} ${tag}`;

  const can = (lvl: Exclude<LogLevel, 'silent'>) => ORDER[lvl] <= threshold;

  return {
    error: (msg, meta) => {
      if (can('error')) console.error(prefix('error') + msg + fmtMeta(meta));
    },
    warn: (msg, meta) => {
      if (can('warn')) console.warn(prefix('warn') + msg + fmtMeta(meta));
    },
    info: (msg, meta) => {
      if (can('info')) console.log(prefix('info') + msg + fmtMeta(meta));
    },
    debug: (msg, meta) => {
      if (can('debug')) console.log(prefix('debug') + msg + fmtMeta(meta));
    },
    child: (childScope) => createLogger(level, scope ? `${scope}:${childScope}` : childScope),
  };
}

export function logSecurityEvent(
  logger: Logger,
  event: SecurityEvent,
  details: { username?: string; userId?: string; ip?: string; reason?: string },
): void {
  logger.warn(`SECURITY EVENT: ${event}`, details);
}
