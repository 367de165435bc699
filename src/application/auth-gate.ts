import type { Logger } from 'pino';
import { ControlPlaneError } from '../domain/index.js';
import type { Principal, Spoke } from '../domain/index.js';
import type { UserStore } from './stores.js';
import type { AuthFailureLimiter } from './rate-limiter.js';
import type { DashboardTokenCodec, IssuedToken, TokenClaims } from './token-codec.js';
import { verifySecret } from './secrets.js';

export type SpokeCallVerdict = 'ok' | 'unauthorized' | 'forbidden_source_ip';

/** The part of a spoke identity needed to check a presented key. */
export interface SpokeCredential {
  readonly api_key_hash: string;
  readonly allowed_source_ip: string | null;
}

export interface SpokeDirectory {
  find(spokeId: string): Spoke | undefined;
}

export interface DashboardSession {
  readonly principal: Principal;
  readonly claims: TokenClaims;
}

export interface AuthGateDeps {
  users: UserStore;
  spokes: SpokeDirectory;
  tokens: DashboardTokenCodec;
  limiter: AuthFailureLimiter;
  log: Logger;
}

// Well-formed hash that matches nothing; unknown users and spoke ids pay the same scrypt cost.
const DUMMY_HASH = `scrypt$${Buffer.alloc(16).toString('base64url')}$${Buffer.alloc(32).toString('base64url')}`;
const UNKNOWN_SPOKE: SpokeCredential = { api_key_hash: DUMMY_HASH, allowed_source_ip: null };

/** Strips the IPv4-mapped IPv6 prefix Node reports for IPv4 peers. */
export function normalizeIp(ip: string): string {
  return ip.startsWith('::ffff:') ? ip.slice('::ffff:'.length) : ip;
}

/**
 * Checks a presented API key (and caller IP) against a stored credential.
 * The key is checked first: a wrong key is never reported as an IP problem.
 */
export async function verifySpokeCredential(
  credential: SpokeCredential,
  apiKey: string | undefined,
  sourceIp: string,
): Promise<SpokeCallVerdict> {
  if (!apiKey) return 'unauthorized';
  if (!(await verifySecret(apiKey, credential.api_key_hash))) return 'unauthorized';

  if (
    credential.allowed_source_ip !== null
    && normalizeIp(sourceIp) !== normalizeIp(credential.allowed_source_ip)
  ) {
    return 'forbidden_source_ip';
  }
  return 'ok';
}

/**
 * Front door for both kinds of callers: dashboard users (session tokens)
 * and spokes (API key + optional source IP allowlist).
 *
 * Login and spoke-key failures are counted per origin; an origin over
 * the limit is refused before any secret is compared.
 */
export class AuthGate {
  private readonly deps: AuthGateDeps;
  private readonly warnedWithoutAllowlist: Set<string> = new Set();

  constructor(deps: AuthGateDeps) {
    this.deps = deps;
  }

  async login(username: string, password: string, origin: string): Promise<IssuedToken> {
    const source = normalizeIp(origin);
    this.assertNotThrottled(source);

    const user = await this.deps.users.findByUsername(username);
    const valid = await verifySecret(password, user?.password_hash ?? DUMMY_HASH);

    if (user === undefined || !valid) {
      this.recordFailure(source, 'login', { username });
      throw new ControlPlaneError('Unauthenticated', 'Invalid credentials');
    }

    this.deps.limiter.reset(source);
    this.deps.log.info({ username, origin: source }, 'Dashboard login succeeded');
    return this.deps.tokens.issue({ username: user.username, role: user.role });
  }

  logout(session: DashboardSession): void {
    this.deps.tokens.revoke(session.claims);
    this.deps.log.info({ username: session.principal.username }, 'Dashboard session revoked');
  }

  authenticateDashboard(token: string | undefined): DashboardSession {
    if (!token) {
      throw new ControlPlaneError('Unauthenticated', 'Missing bearer token');
    }

    const result = this.deps.tokens.verify(token);
    if (!result.ok) {
      throw new ControlPlaneError('Unauthenticated', `Session token rejected (${result.reason})`);
    }

    return {
      principal: { username: result.claims.sub, role: result.claims.role },
      claims: result.claims,
    };
  }

  async authenticateSpokeCall(
    apiKey: string | undefined,
    sourceIp: string,
    spokeId: string,
  ): Promise<Spoke> {
    const source = normalizeIp(sourceIp);
    this.assertNotThrottled(source);

    const spoke = this.deps.spokes.find(spokeId);
    const verdict = await verifySpokeCredential(spoke ?? UNKNOWN_SPOKE, apiKey, source);

    if (spoke === undefined || verdict === 'unauthorized') {
      this.recordFailure(source, 'spoke_key', { spoke_id: spokeId });
      throw new ControlPlaneError('Unauthorized', 'Invalid spoke credentials');
    }
    if (verdict === 'forbidden_source_ip') {
      this.recordFailure(source, 'spoke_source_ip', { spoke_id: spokeId });
      throw new ControlPlaneError('ForbiddenSourceIP', `Source IP ${source} is not allowed for this spoke`);
    }

    if (spoke.allowed_source_ip === null && !this.warnedWithoutAllowlist.has(spoke.id)) {
      this.warnedWithoutAllowlist.add(spoke.id);
      this.deps.log.warn(
        { spoke_id: spoke.id, spoke_name: spoke.name },
        'Spoke has no source IP allowlist; accepting its calls from any address',
      );
    }

    return spoke;
  }

  private assertNotThrottled(origin: string): void {
    if (this.deps.limiter.isBlocked(origin)) {
      this.deps.log.warn({ origin }, 'Authentication attempt throttled');
      throw new ControlPlaneError('RateLimited', 'Too many failed authentication attempts; try again later');
    }
  }

  private recordFailure(origin: string, kind: string, context: Record<string, string>): void {
    const failures = this.deps.limiter.recordFailure(origin);
    this.deps.log.warn({ ...context, origin, kind, failures }, 'Authentication failure');
  }
}
