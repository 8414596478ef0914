import Fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from './config.js';
import { authPlugin } from './auth.js';
import { AuthService } from './authService.js';
import { AuditLog } from './audit.js';
import { StaticContentCatalog, type ContentCatalog } from './courseCatalog.js';
import { coursesPlugin } from './courses.js';
import { MemoryCredentialStore, type CredentialStore } from './store.js';
import { createTokenAuthority, type TokenAuthority } from './tokens.js';

export type BuildOptions = {
  config: AppConfig;
  logger?: FastifyServerOptions['logger'];
  store?: CredentialStore;
  tokens?: TokenAuthority;
  catalog?: ContentCatalog;
};

const ansi = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m'
};

function colorStatus(statusCode: number) {
  if (statusCode >= 500) return `${ansi.red}${statusCode}${ansi.reset}`;
  if (statusCode >= 400) return `${ansi.yellow}${statusCode}${ansi.reset}`;
  return `${ansi.green}${statusCode}${ansi.reset}`;
}

const quietUrls = new Set(['/ping', '/health', '/api/health']);

export async function buildApp(opts: BuildOptions) {
  const { config } = opts;

  const app = Fastify({
    disableRequestLogging: true,
    logger: opts.logger ?? false,
    trustProxy: config.trustProxy
  });

  const store = opts.store ?? new MemoryCredentialStore();
  const tokens = opts.tokens ?? createTokenAuthority(config);
  const catalog = opts.catalog ?? StaticContentCatalog.fromFile(config.catalogPath ?? undefined);
  const service = new AuthService(store, tokens, new AuditLog());

  await app.register(cors, { origin: config.corsOrigin });

  app.addHook('onResponse', async (req, reply) => {
    if (quietUrls.has(req.url)) return;
    const ms = Number(reply.elapsedTime.toFixed(1));
    const who = req.user ? ` ${ansi.dim}(${req.user.username})${ansi.reset}` : '';
    app.log.info(`${ansi.cyan}${req.method}${ansi.reset} ${req.url} -> ${colorStatus(reply.statusCode)} ${ansi.dim}${ms}ms${ansi.reset}${who}`);
  });

  app.setErrorHandler(async (err, req, reply) => {
    const status = err.statusCode ?? 500;
    if (status < 500) {
      return reply.code(status).send({ ok: false, error: 'invalid_request', message: 'Invalid request format' });
    }
    req.log.error({ err }, 'unhandled error');
    return reply.code(500).send({ ok: false, error: 'internal', message: 'Internal server error' });
  });

  app.get('/ping', async () => ({ status: 'ok', message: 'pong' }));
  app.get('/health', async () => ({ ok: true }));
  app.get('/api/health', async () => ({ ok: true }));

  await app.register(authPlugin, {
    service,
    seed: { username: config.adminUsername, password: config.adminPassword }
  });
  await app.register(coursesPlugin, { catalog });

  return app;
}
