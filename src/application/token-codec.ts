import { createHmac, randomUUID, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { ROLES } from '../domain/index.js';
import type { Principal } from '../domain/index.js';

const claimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(ROLES),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
});

/** Claims carried by a dashboard session token. Times are epoch seconds. */
export type TokenClaims = z.infer<typeof claimsSchema>;

export interface IssuedToken {
  access_token: string;
  token_type: 'Bearer';
  expires_at: string; // ISO-8601
}

export type TokenVerification =
  | { ok: true; claims: TokenClaims }
  | { ok: false; reason: 'malformed' | 'bad_signature' | 'expired' | 'revoked' };

/**
 * Revoked token ids, each kept only until the token would have expired
 * anyway, so the list stays bounded by the number of live sessions.
 */
export class RevocationList {
  private readonly revoked: Map<string, number> = new Map();

  revoke(jti: string, expiresAtSec: number): void {
    this.revoked.set(jti, expiresAtSec);
  }

  has(jti: string, nowSec: number): boolean {
    this.prune(nowSec);
    return this.revoked.has(jti);
  }

  get size(): number {
    return this.revoked.size;
  }

  private prune(nowSec: number): void {
    for (const [jti, exp] of this.revoked) {
      if (exp <= nowSec) this.revoked.delete(jti);
    }
  }
}

/**
 * Short-lived HMAC-SHA256 signed session tokens:
 * `base64url(JSON claims).base64url(signature)`.
 */
export class DashboardTokenCodec {
  private readonly key: Buffer;
  private readonly ttlSeconds: number;
  private readonly revocations: RevocationList;
  private readonly nowFn: () => number;

  constructor(key: Buffer, ttlSeconds: number, nowFn: () => number = Date.now) {
    this.key = key;
    this.ttlSeconds = ttlSeconds;
    this.revocations = new RevocationList();
    this.nowFn = nowFn;
  }

  issue(principal: Principal): IssuedToken {
    const iat = Math.floor(this.nowFn() / 1000);
    const claims: TokenClaims = {
      sub: principal.username,
      role: principal.role,
      iat,
      exp: iat + this.ttlSeconds,
      jti: randomUUID(),
    };

    const body = Buffer.from(JSON.stringify(claims), 'utf-8').toString('base64url');
    return {
      access_token: `${body}.${this.sign(body).toString('base64url')}`,
      token_type: 'Bearer',
      expires_at: new Date(claims.exp * 1000).toISOString(),
    };
  }

  verify(token: string): TokenVerification {
    const parts = token.split('.');
    const [body, signature] = parts;
    if (parts.length !== 2 || !body || !signature) return { ok: false, reason: 'malformed' };

    const provided = Buffer.from(signature, 'base64url');
    const expected = this.sign(body);
    if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
      return { ok: false, reason: 'bad_signature' };
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(Buffer.from(body, 'base64url').toString('utf-8'));
    } catch {
      return { ok: false, reason: 'malformed' };
    }

    const parsed = claimsSchema.safeParse(decoded);
    if (!parsed.success) return { ok: false, reason: 'malformed' };

    const nowSec = Math.floor(this.nowFn() / 1000);
    if (parsed.data.exp <= nowSec) return { ok: false, reason: 'expired' };
    if (this.revocations.has(parsed.data.jti, nowSec)) return { ok: false, reason: 'revoked' };

    return { ok: true, claims: parsed.data };
  }

  revoke(claims: TokenClaims): void {
    this.revocations.revoke(claims.jti, claims.exp);
  }

  private sign(body: string): Buffer {
    return createHmac('sha256', this.key).update(body).digest();
  }
}
