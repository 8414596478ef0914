import crypto from 'node:crypto';
import type { AppConfig } from './config.js';
import { safeEqual } from './security.js';

/** Mints and reads bearer tokens. `parse` and `refresh` answer `null` for a token they reject. */
export interface TokenAuthority {
  issue(username: string): string;
  parse(token: string): string | null;
  refresh(token: string): string | null;
}

export const TOKEN_PREFIX = 'token_for_';
export const REFRESH_SUFFIX = '_refreshed';

/**
 * Unsigned, non-expiring tokens: `token_for_<username>`. Validity is purely
 * structural. Refreshing appends `_refreshed`, so repeated refreshes pile up
 * suffixes and the parsed username carries them too.
 */
export class PrefixTokenAuthority implements TokenAuthority {
  issue(username: string) {
    return `${TOKEN_PREFIX}${username}`;
  }

  parse(token: string) {
    if (!token.startsWith(TOKEN_PREFIX)) return null;
    return token.slice(TOKEN_PREFIX.length);
  }

  refresh(token: string) {
    if (!token.startsWith(TOKEN_PREFIX)) return null;
    return `${token}${REFRESH_SUFFIX}`;
  }
}

type SignedPayload = { sub: string; iat: number; exp: number };

function isSignedPayload(v: unknown): v is SignedPayload {
  if (typeof v !== 'object' || v === null) return false;
  return (
    'sub' in v && typeof v.sub === 'string' &&
    'iat' in v && typeof v.iat === 'number' &&
    'exp' in v && typeof v.exp === 'number'
  );
}

const HEADER = Buffer.from(JSON.stringify({ alg: 'HS256', typ: 'JWT' })).toString('base64url');

/** HS256 JWTs carrying `sub`, `iat` and `exp`. */
export class SignedTokenAuthority implements TokenAuthority {
  constructor(
    private readonly secret: string,
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now
  ) {}

  issue(username: string) {
    const iat = Math.floor(this.now() / 1000);
    const payload = Buffer.from(JSON.stringify({ sub: username, iat, exp: iat + this.ttlSeconds })).toString('base64url');
    const data = `${HEADER}.${payload}`;
    return `${data}.${this.sign(data)}`;
  }

  parse(token: string) {
    const parts = token.split('.');
    if (parts.length !== 3) return null;
    const [h, p, s] = parts;
    if (h !== HEADER || !safeEqual(this.sign(`${h}.${p}`), s)) return null;

    let payload: unknown;
    try {
      payload = JSON.parse(Buffer.from(p, 'base64url').toString('utf8'));
    } catch {
      return null;
    }
    if (!isSignedPayload(payload)) return null;
    if (payload.exp <= Math.floor(this.now() / 1000)) return null;
    return payload.sub;
  }

  refresh(token: string) {
    const username = this.parse(token);
    return username === null ? null : this.issue(username);
  }

  private sign(data: string) {
    return crypto.createHmac('sha256', this.secret).update(data).digest('base64url');
  }
}

export function createTokenAuthority(cfg: Pick<AppConfig, 'tokenMode' | 'jwtSecret' | 'tokenTtlSeconds'>): TokenAuthority {
  if (cfg.tokenMode === 'signed') return new SignedTokenAuthority(cfg.jwtSecret, cfg.tokenTtlSeconds);
  return new PrefixTokenAuthority();
}
