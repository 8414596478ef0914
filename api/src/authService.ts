import { hasPermission, type Permission } from './access.js';
import { AuditLog } from './audit.js';
import { fail, ok, type Result } from './errors.js';
import logger from './logger.js';
import { DEFAULT_ADMIN, type CredentialStore, type Role } from './store.js';
import type { TokenAuthority } from './tokens.js';

export type AuthenticatedUser = { username: string; role: Role };

const BEARER = 'Bearer ';

function present(v: string | undefined): v is string {
  return typeof v === 'string' && v.length > 0;
}

/**
 * Register, login, validate, refresh and change-password over one
 * CredentialStore and one TokenAuthority. Every failure comes back as a
 * single error kind; nothing here throws for bad input.
 *
 * `validate` and `refresh` only check a token's form, not whether its user
 * still exists. `authorize` does look the user up, since it needs the role.
 */
export class AuthService {
  constructor(
    private readonly store: CredentialStore,
    private readonly tokens: TokenAuthority,
    private readonly auditLog: AuditLog = new AuditLog()
  ) {}

  async seed(username?: string, password?: string) {
    const inserted = await this.store.seedDefault(username, password);
    if (inserted) this.auditLog.record('bootstrap_admin', { username: username ?? DEFAULT_ADMIN.username });
    return inserted;
  }

  async register(username?: string, password?: string): Promise<Result<{ username: string }>> {
    if (!present(username) || !present(password)) return fail('missing_fields');

    const created = await this.store.create(username, password);
    if (!created.ok) {
      logger.warn('auth', 'Registration rejected, user exists', { username });
      return created;
    }

    this.auditLog.record('register', { username });
    logger.info('auth', 'User registered', { username });
    return ok({ username });
  }

  async login(username?: string, password?: string): Promise<Result<{ token: string; role: Role }>> {
    if (!present(username) || !present(password)) return fail('missing_fields');

    const user = await this.store.verify(username, password);
    if (!user) {
      this.auditLog.record('login_failed', { username });
      return fail('invalid_credentials');
    }

    this.auditLog.record('login_ok', { username });
    logger.debug('auth', 'User logged in', { username });
    return ok({ token: this.tokens.issue(user.username), role: user.role });
  }

  /** Accepts the raw `Authorization` header value. */
  validate(authorization?: string): Result<{ username: string }> {
    if (!authorization?.startsWith(BEARER)) return fail('missing_token');
    const username = this.tokens.parse(authorization.slice(BEARER.length));
    if (username === null) return fail('invalid_token');
    return ok({ username });
  }

  refresh(token?: string): Result<{ token: string }> {
    if (!present(token)) return fail('invalid_token');
    const next = this.tokens.refresh(token);
    if (next === null) return fail('invalid_token');
    return ok({ token: next });
  }

  async changePassword(username?: string, oldPassword?: string, newPassword?: string): Promise<Result<{ username: string }>> {
    if (!present(username) || !present(oldPassword) || !present(newPassword)) return fail('missing_fields');

    const updated = await this.store.updateSecret(username, oldPassword, newPassword);
    if (!updated.ok) {
      this.auditLog.record('change_password_failed', { username, reason: updated.error });
      return updated;
    }

    this.auditLog.record('change_password', { username });
    logger.info('auth', 'Password changed', { username });
    return ok({ username });
  }

  /**
   * Validates the bearer token, then requires its user to exist and hold
   * `permission`. Under prefix tokens a refreshed token parses to a
   * suffixed username (`token_for_admin_refreshed` → `admin_refreshed`),
   * which matches no record and is therefore `forbidden`.
   */
  async authorize(authorization: string | undefined, permission: Permission): Promise<Result<AuthenticatedUser>> {
    const validated = this.validate(authorization);
    if (!validated.ok) return validated;

    const user = await this.store.get(validated.value.username);
    if (!user || !hasPermission(user.role, permission)) return fail('forbidden');
    return ok({ username: user.username, role: user.role });
  }

  listUsers() {
    return this.store.list();
  }

  auditTrail(limit?: number) {
    return this.auditLog.list(limit);
  }
}
