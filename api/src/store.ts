import { hashPassword, verifyPassword } from './security.js';
import { fail, ok, type Result } from './errors.js';
import logger from './logger.js';

export type Role = 'admin' | 'user';

export type CredentialRecord = {
  readonly username: string;
  readonly secretHash: string;
  readonly role: Role;
  readonly createdAt: number;
};

export type UserSummary = Pick<CredentialRecord, 'username' | 'role' | 'createdAt'>;

export const DEFAULT_ADMIN = { username: 'admin', password: 'password' } as const;

/**
 * Owner of all user state. Methods are async so a persistent backend can
 * implement the same contract; mutating methods must keep their existence
 * check and their write in one critical section.
 */
export interface CredentialStore {
  seedDefault(username?: string, secret?: string): Promise<boolean>;
  create(username: string, secret: string): Promise<Result<CredentialRecord, 'already_exists'>>;
  get(username: string): Promise<CredentialRecord | null>;
  verify(username: string, secret: string): Promise<CredentialRecord | null>;
  updateSecret(username: string, oldSecret: string, newSecret: string): Promise<Result<void, 'not_found' | 'wrong_secret'>>;
  list(): Promise<UserSummary[]>;
}

// No await may appear between a lookup and the write that depends on it:
// the event loop is the lock.
export class MemoryCredentialStore implements CredentialStore {
  private readonly users = new Map<string, CredentialRecord>();

  async seedDefault(username: string = DEFAULT_ADMIN.username, secret: string = DEFAULT_ADMIN.password) {
    if (this.users.has(username)) return false;
    this.users.set(username, record(username, secret, 'admin'));
    logger.success('store', 'Default admin user seeded', { username });
    return true;
  }

  async create(username: string, secret: string): Promise<Result<CredentialRecord, 'already_exists'>> {
    if (this.users.has(username)) return fail('already_exists');
    const rec = record(username, secret, 'user');
    this.users.set(username, rec);
    return ok(rec);
  }

  async get(username: string) {
    return this.users.get(username) ?? null;
  }

  async verify(username: string, secret: string) {
    const rec = this.users.get(username);
    if (!rec || !verifyPassword(secret, rec.secretHash)) return null;
    return rec;
  }

  async updateSecret(username: string, oldSecret: string, newSecret: string): Promise<Result<void, 'not_found' | 'wrong_secret'>> {
    const rec = this.users.get(username);
    if (!rec) return fail('not_found');
    if (!verifyPassword(oldSecret, rec.secretHash)) return fail('wrong_secret');
    // replace, never mutate: readers holding the old record keep a consistent view
    this.users.set(username, Object.freeze({ ...rec, secretHash: hashPassword(newSecret) }));
    return ok(undefined);
  }

  async list(): Promise<UserSummary[]> {
    return [...this.users.values()].map(({ username, role, createdAt }) => ({ username, role, createdAt }));
  }
}

function record(username: string, secret: string, role: Role): CredentialRecord {
  return Object.freeze({ username, secretHash: hashPassword(secret), role, createdAt: Date.now() });
}
