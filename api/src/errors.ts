import type { FastifyReply } from 'fastify';
import type { ZodError } from 'zod';

export type AuthErrorKind =
  | 'missing_fields'
  | 'already_exists'
  | 'invalid_credentials'
  | 'missing_token'
  | 'invalid_token'
  | 'not_found'
  | 'wrong_secret'
  | 'forbidden';

export type Result<T, E extends string = AuthErrorKind> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends string>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export const authErrors: Record<AuthErrorKind, { status: number; message: string }> = {
  missing_fields: { status: 400, message: 'Missing required fields' },
  already_exists: { status: 409, message: 'User already exists' },
  invalid_credentials: { status: 401, message: 'Invalid credentials' },
  missing_token: { status: 401, message: 'Missing or invalid token header' },
  invalid_token: { status: 401, message: 'Invalid token' },
  not_found: { status: 404, message: 'User not found' },
  wrong_secret: { status: 401, message: 'Old password is incorrect' },
  forbidden: { status: 403, message: 'Permission denied' }
};

export function sendAuthError(reply: FastifyReply, kind: AuthErrorKind) {
  const { status, message } = authErrors[kind];
  return reply.code(status).send({ ok: false, error: kind, message });
}

export function formatIssues(error: ZodError) {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}
