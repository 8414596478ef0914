import 'dotenv/config';
import { z } from 'zod';
import { formatIssues } from './errors.js';

export const TokenModeSchema = z.enum(['prefix', 'signed']);

export type TokenMode = z.infer<typeof TokenModeSchema>;

// Empty variables (`FOO=` in .env) fall back to the default like unset ones.
const blank = (v: unknown) => (v === '' ? undefined : v);

export const EnvSchema = z.object({
  PORT: z.preprocess(blank, z.coerce.number().int().positive().default(3001)),
  HOST: z.preprocess(blank, z.string().default('0.0.0.0')),
  LOG_LEVEL: z.preprocess(blank, z.string().default('info')),
  CORS_ORIGIN: z.preprocess(blank, z.string().default('*')),
  TRUST_PROXY: z.preprocess(blank, z.enum(['true', 'false']).default('false')),

  TOKEN_MODE: z.preprocess(blank, TokenModeSchema.default('prefix')),
  JWT_SECRET: z.preprocess(blank, z.string().default('dev-jwt-secret-change-me')),
  TOKEN_TTL_SECONDS: z.preprocess(blank, z.coerce.number().int().positive().default(60 * 60 * 24)),

  ADMIN_USERNAME: z.preprocess(blank, z.string().default('admin')),
  ADMIN_PASSWORD: z.preprocess(blank, z.string().default('password')),

  CATALOG_PATH: z.preprocess(blank, z.string().optional())
});

export type AppConfig = {
  port: number;
  host: string;
  logLevel: string;
  corsOrigin: string | true;
  trustProxy: boolean;

  tokenMode: TokenMode;
  jwtSecret: string;
  tokenTtlSeconds: number;

  adminUsername: string;
  adminPassword: string;

  catalogPath: string | null;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw new Error(`Invalid environment: ${formatIssues(parsed.error)}`);
  const e = parsed.data;

  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    corsOrigin: e.CORS_ORIGIN === '*' ? true : e.CORS_ORIGIN,
    trustProxy: e.TRUST_PROXY === 'true',

    tokenMode: e.TOKEN_MODE,
    jwtSecret: e.JWT_SECRET,
    tokenTtlSeconds: e.TOKEN_TTL_SECONDS,

    adminUsername: e.ADMIN_USERNAME,
    adminPassword: e.ADMIN_PASSWORD,

    catalogPath: e.CATALOG_PATH ?? null
  };
}

export const config = loadConfig();
