import { describe, it, expect, beforeEach } from 'vitest';
import { AuthService } from '../src/authService.js';
import { MemoryCredentialStore } from '../src/store.js';
import { PrefixTokenAuthority } from '../src/tokens.js';

describe('AuthService', () => {
  let service: AuthService;

  beforeEach(async () => {
    service = new AuthService(new MemoryCredentialStore(), new PrefixTokenAuthority());
    await service.seed();
  });

  describe('register', () => {
    it('succeeds once, then reports already_exists whatever the password', async () => {
      expect(await service.register('alice', 'pw-1')).toEqual({ ok: true, value: { username: 'alice' } });
      expect(await service.register('alice', 'pw-2')).toEqual({ ok: false, error: 'already_exists' });
    });

    it('requires both fields', async () => {
      expect(await service.register('', 'pw')).toEqual({ ok: false, error: 'missing_fields' });
      expect(await service.register('alice', '')).toEqual({ ok: false, error: 'missing_fields' });
      expect(await service.register(undefined, undefined)).toEqual({ ok: false, error: 'missing_fields' });
    });

    it('lets one of N concurrent callers win', async () => {
      const results = await Promise.all(Array.from({ length: 8 }, () => service.register('dup', 'pw')));
      expect(results.filter((r) => r.ok)).toHaveLength(1);
      expect(results.filter((r) => !r.ok && r.error === 'already_exists')).toHaveLength(7);
    });
  });

  describe('login', () => {
    it('returns a token that validates, plus the role', async () => {
      await service.register('alice', 'pw');
      const r = await service.login('alice', 'pw');

      expect(r).toEqual({ ok: true, value: { token: 'token_for_alice', role: 'user' } });
      expect(service.validate('Bearer token_for_alice')).toEqual({ ok: true, value: { username: 'alice' } });
    });

    it('logs in the seeded admin', async () => {
      expect(await service.login('admin', 'password')).toEqual({ ok: true, value: { token: 'token_for_admin', role: 'admin' } });
    });

    it('rejects a wrong password or an unknown user the same way', async () => {
      await service.register('alice', 'pw');
      expect(await service.login('alice', 'not-pw')).toEqual({ ok: false, error: 'invalid_credentials' });
      expect(await service.login('nobody', 'pw')).toEqual({ ok: false, error: 'invalid_credentials' });
    });

    it('requires both fields', async () => {
      expect(await service.login('alice', undefined)).toEqual({ ok: false, error: 'missing_fields' });
    });
  });

  describe('validate', () => {
    it('needs a Bearer header', () => {
      expect(service.validate(undefined)).toEqual({ ok: false, error: 'missing_token' });
      expect(service.validate('')).toEqual({ ok: false, error: 'missing_token' });
      expect(service.validate('Basic dXNlcjpwdw==')).toEqual({ ok: false, error: 'missing_token' });
      expect(service.validate('bearer token_for_alice')).toEqual({ ok: false, error: 'missing_token' });
    });

    it('rejects tokens without the issuance prefix', () => {
      expect(service.validate('Bearer something_else')).toEqual({ ok: false, error: 'invalid_token' });
      expect(service.validate('Bearer ')).toEqual({ ok: false, error: 'invalid_token' });
    });

    it('accepts a well-formed token for a user that was never registered', () => {
      expect(service.validate('Bearer token_for_ghost')).toEqual({ ok: true, value: { username: 'ghost' } });
    });
  });

  describe('refresh', () => {
    it('keeps refreshed tokens valid across repeated refreshes', async () => {
      await service.register('alice', 'pw');
      const login = await service.login('alice', 'pw');
      if (!login.ok) throw new Error('login failed');

      const once = service.refresh(login.value.token);
      if (!once.ok) throw new Error('refresh failed');
      const twice = service.refresh(once.value.token);
      if (!twice.ok) throw new Error('refresh failed');

      expect(twice.value.token).toBe('token_for_alice_refreshed_refreshed');
      expect(service.validate(`Bearer ${twice.value.token}`).ok).toBe(true);
    });

    it('rejects missing or malformed tokens', () => {
      expect(service.refresh(undefined)).toEqual({ ok: false, error: 'invalid_token' });
      expect(service.refresh('')).toEqual({ ok: false, error: 'invalid_token' });
      expect(service.refresh('nope')).toEqual({ ok: false, error: 'invalid_token' });
    });
  });

  describe('changePassword', () => {
    beforeEach(async () => {
      await service.register('alice', 'old-pw');
    });

    it('swaps which password logs in', async () => {
      expect(await service.changePassword('alice', 'old-pw', 'new-pw')).toEqual({ ok: true, value: { username: 'alice' } });
      expect(await service.login('alice', 'old-pw')).toEqual({ ok: false, error: 'invalid_credentials' });
      expect((await service.login('alice', 'new-pw')).ok).toBe(true);
    });

    it('classifies each failure', async () => {
      expect(await service.changePassword('alice', '', 'new-pw')).toEqual({ ok: false, error: 'missing_fields' });
      expect(await service.changePassword('nobody', 'old-pw', 'new-pw')).toEqual({ ok: false, error: 'not_found' });
      expect(await service.changePassword('alice', 'guess', 'new-pw')).toEqual({ ok: false, error: 'wrong_secret' });
    });
  });

  describe('authorize', () => {
    it('grants manage_users to admins only', async () => {
      await service.register('alice', 'pw');

      expect(await service.authorize('Bearer token_for_admin', 'manage_users')).toEqual({
        ok: true,
        value: { username: 'admin', role: 'admin' }
      });
      expect(await service.authorize('Bearer token_for_alice', 'manage_users')).toEqual({ ok: false, error: 'forbidden' });
      expect(await service.authorize('Bearer token_for_alice', 'create_note')).toEqual({
        ok: true,
        value: { username: 'alice', role: 'user' }
      });
    });

    it('denies a refreshed prefix token, whose username carries the suffix', async () => {
      const refreshed = service.refresh('token_for_admin');
      if (!refreshed.ok) throw new Error('refresh failed');

      expect(refreshed.value.token).toBe('token_for_admin_refreshed');
      expect(await service.authorize(`Bearer ${refreshed.value.token}`, 'manage_users')).toEqual({ ok: false, error: 'forbidden' });
    });

    it('denies tokens whose user does not exist', async () => {
      expect(await service.authorize('Bearer token_for_ghost', 'create_note')).toEqual({ ok: false, error: 'forbidden' });
    });

    it('passes header failures through', async () => {
      expect(await service.authorize(undefined, 'create_note')).toEqual({ ok: false, error: 'missing_token' });
      expect(await service.authorize('Bearer junk', 'create_note')).toEqual({ ok: false, error: 'invalid_token' });
    });
  });

  describe('seed and audit trail', () => {
    it('seeds only once', async () => {
      expect(await service.seed()).toBe(false);
      expect(await service.listUsers()).toEqual([{ username: 'admin', role: 'admin', createdAt: expect.any(Number) }]);
    });

    it('records events newest first', async () => {
      await service.register('alice', 'pw');
      await service.login('alice', 'wrong');
      await service.login('alice', 'pw');
      await service.changePassword('alice', 'bad', 'x');

      expect(service.auditTrail().map((e) => e.event)).toEqual([
        'change_password_failed',
        'login_ok',
        'login_failed',
        'register',
        'bootstrap_admin'
      ]);
      expect(service.auditTrail(1)[0].meta).toEqual({ username: 'alice', reason: 'wrong_secret' });
    });
  });
});
