import { z } from 'zod';

const str = z.string().min(1);

export const DEFAULT_STATE_DIR = '.task-assistant';

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug']);

export const EnvSchema = z.object({
  // server
  NODE_ENV: z.enum(['development', 'production', 'test']).optional(),
  PORT: z.coerce.number().int().min(0).max(65535).optional(),
  HOST: str.optional(),
  SECRET_KEY: str.optional(),
  CORS_ORIGINS: str.optional(),

  // behavior
  TASK_ASSISTANT_LOG_LEVEL: LogLevelSchema.optional(),
  TASK_ASSISTANT_STATE_DIR: str.optional(),
  TASK_ASSISTANT_SESSION_TTL_DAYS: z.coerce.number().int().positive().optional(),
  TASK_ASSISTANT_AUTH_RATE_LIMIT: z.coerce.number().int().positive().optional(),
  TASK_ASSISTANT_HTTP_RPS: z.coerce.number().positive().optional(),
  TASK_ASSISTANT_TRUST_PROXY: z.coerce.number().int().min(0).optional(),

  // Pinecone
  PINECONE_API_KEY: str.optional(),
  PINECONE_INDEX_HOST: str.url().optional(),

  // Hugging Face inference
  HF_TOKEN: str.optional(),
  HF_MODEL: str.optional(),

  // Google sign-in
  GOOGLE_CLIENT_ID: str.optional(),
  GOOGLE_CLIENT_SECRET: str.optional(),
  GOOGLE_REDIRECT_URI: str.url().optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  // blank values count as unset
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  return EnvSchema.parse(cleaned);
}

export const DEFAULT_HF_MODEL = 'sentence-transformers/all-mpnet-base-v2';
export const DEV_SECRET_KEY = 'dev-secret-key';

export interface AppSettings {
  port: number;
  host: string;
  production: boolean;
  secretKey: string;
  stateDir: string;
  logLevel: z.infer<typeof LogLevelSchema>;
  sessionTtlDays: number;
  authRateLimit: number;
  trustProxy: number;
  corsOrigins: string[];
  httpRps?: number;
  pinecone?: { apiKey: string; indexHost: string };
  huggingFace?: { token: string; model: string };
  google?: { clientId: string; clientSecret: string; redirectUri?: string };
}

export function resolveSettings(env: EnvConfig = readEnv()): AppSettings {
  const production = env.NODE_ENV === 'production';
  if (production && !env.SECRET_KEY) {
    throw new Error('SECRET_KEY must be set when NODE_ENV=production.');
  }

  return {
    port: env.PORT ?? 8080,
    host: env.HOST ?? '0.0.0.0',
    production,
    secretKey: env.SECRET_KEY ?? DEV_SECRET_KEY,
    stateDir: env.TASK_ASSISTANT_STATE_DIR ?? DEFAULT_STATE_DIR,
    logLevel: env.TASK_ASSISTANT_LOG_LEVEL ?? 'info',
    sessionTtlDays: env.TASK_ASSISTANT_SESSION_TTL_DAYS ?? 30,
    authRateLimit: env.TASK_ASSISTANT_AUTH_RATE_LIMIT ?? 5,
    trustProxy: env.TASK_ASSISTANT_TRUST_PROXY ?? 0,
    corsOrigins: (env.CORS_ORIGINS ?? '')
      .split(',')
      .map((o) => o.trim())
      .filter(Boolean),
    httpRps: env.TASK_ASSISTANT_HTTP_RPS,
    pinecone:
      env.PINECONE_API_KEY && env.PINECONE_INDEX_HOST
        ? { apiKey: env.PINECONE_API_KEY, indexHost: env.PINECONE_INDEX_HOST }
        : undefined,
    huggingFace: env.HF_TOKEN ? { token: env.HF_TOKEN, model: env.HF_MODEL ?? DEFAULT_HF_MODEL } : undefined,
    google:
      env.GOOGLE_CLIENT_ID && env.GOOGLE_CLIENT_SECRET
        ? {
            clientId: env.GOOGLE_CLIENT_ID,
            clientSecret: env.GOOGLE_CLIENT_SECRET,
            redirectUri: env.GOOGLE_REDIRECT_URI,
          }
        : undefined,
  };
}

export function doctorReport(env = readEnv()) {
  const missing: string[] = [];
  const notes: string[] = [];

  if (!env.SECRET_KEY) {
    if (env.NODE_ENV === 'production') missing.push('SECRET_KEY');
    else notes.push('SECRET_KEY unset: using a development key to sign OAuth state cookies.');
  }

  if (env.PINECONE_API_KEY || env.PINECONE_INDEX_HOST || env.HF_TOKEN) {
    if (!env.PINECONE_API_KEY) missing.push('PINECONE_API_KEY');
    if (!env.PINECONE_INDEX_HOST) missing.push('PINECONE_INDEX_HOST');
    if (!env.HF_TOKEN) missing.push('HF_TOKEN');
  } else {
    notes.push('Semantic search disabled: set PINECONE_API_KEY, PINECONE_INDEX_HOST and HF_TOKEN to enable it.');
  }

  if (env.GOOGLE_CLIENT_ID || env.GOOGLE_CLIENT_SECRET) {
    if (!env.GOOGLE_CLIENT_ID) missing.push('GOOGLE_CLIENT_ID');
    if (!env.GOOGLE_CLIENT_SECRET) missing.push('GOOGLE_CLIENT_SECRET');
    if (!env.GOOGLE_REDIRECT_URI) {
      notes.push('Google: GOOGLE_REDIRECT_URI optional (defaults to <request origin>/api/auth/google/callback).');
    }
  } else {
    notes.push('Google sign-in disabled: set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET to enable it.');
  }

  return {
    features: {
      semanticSearch: !!(env.PINECONE_API_KEY && env.PINECONE_INDEX_HOST && env.HF_TOKEN),
      googleSignIn: !!(env.GOOGLE_CLIENT_ID && env.GOOGLE_CLIENT_SECRET),
    },
    missing: [...new Set(missing)],
    notes: [...new Set(notes)],
  };
}
