import fp from 'fastify-plugin';
import type { AuthService, AuthenticatedUser } from './authService.js';
import { sendAuthError } from './errors.js';

declare module 'fastify' {
  interface FastifyInstance {
    auth: AuthService;
  }

  interface FastifyRequest {
    user?: AuthenticatedUser;
  }
}

export type AuthPluginOptions = {
  service: AuthService;
  seed: { username: string; password: string };
};

type CredentialsBody = { username?: unknown; password?: unknown } | undefined;
type RefreshBody = { token?: unknown } | undefined;
type ChangePasswordBody = { username?: unknown; old_password?: unknown; new_password?: unknown } | undefined;

function str(v: unknown) {
  return typeof v === 'string' ? v : undefined;
}

export const authPlugin = fp(async (app, opts: AuthPluginOptions) => {
  const service = opts.service;

  if (await service.seed(opts.seed.username, opts.seed.password)) {
    app.log.info({ username: opts.seed.username }, 'bootstrapped admin user');
  }

  app.decorate('auth', service);

  app.post<{ Body: CredentialsBody }>('/api/auth/register', async (req, reply) => {
    const r = await service.register(str(req.body?.username), str(req.body?.password));
    if (!r.ok) return sendAuthError(reply, r.error);
    return reply.code(201).send({ ok: true, message: `User '${r.value.username}' registered successfully` });
  });

  app.post<{ Body: CredentialsBody }>('/api/auth/login', async (req, reply) => {
    const r = await service.login(str(req.body?.username), str(req.body?.password));
    if (!r.ok) return sendAuthError(reply, r.error);
    return { ok: true, token: r.value.token, role: r.value.role };
  });

  app.get('/api/auth/validate', async (req, reply) => {
    const r = service.validate(req.headers.authorization);
    if (!r.ok) return sendAuthError(reply, r.error);
    return { ok: true, message: 'Token is valid', username: r.value.username };
  });

  app.post<{ Body: RefreshBody }>('/api/auth/refresh', async (req, reply) => {
    const r = service.refresh(str(req.body?.token));
    if (!r.ok) return sendAuthError(reply, r.error);
    return { ok: true, token: r.value.token };
  });

  app.post<{ Body: ChangePasswordBody }>('/api/auth/change-password', async (req, reply) => {
    const body = req.body;
    const r = await service.changePassword(str(body?.username), str(body?.old_password), str(body?.new_password));
    if (!r.ok) return sendAuthError(reply, r.error);
    return { ok: true, message: 'Password changed successfully' };
  });

  // admin views; the bearer's user must exist and hold manage_users
  app.get('/api/admin/users', async (req, reply) => {
    const r = await service.authorize(req.headers.authorization, 'manage_users');
    if (!r.ok) return sendAuthError(reply, r.error);
    req.user = r.value;
    return { ok: true, users: await service.listUsers() };
  });

  app.get<{ Querystring: { limit?: string } }>('/api/admin/audit', async (req, reply) => {
    const r = await service.authorize(req.headers.authorization, 'manage_users');
    if (!r.ok) return sendAuthError(reply, r.error);
    req.user = r.value;
    const requested = Number(req.query.limit ?? 200);
    const limit = Math.min(1000, Math.max(1, Number.isFinite(requested) ? Math.trunc(requested) : 200));
    return { ok: true, events: service.auditTrail(limit) };
  });
});
