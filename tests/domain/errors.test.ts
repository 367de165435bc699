import { describe, it, expect } from 'vitest';
import { ControlPlaneError, isControlPlaneError, toPublicSpoke } from '../../src/domain/index.js';

describe('ControlPlaneError', () => {
  it('maps each kind to its HTTP status', () => {
    expect(new ControlPlaneError('Unauthenticated', 'x').statusCode).toBe(401);
    expect(new ControlPlaneError('ForbiddenSourceIP', 'x').statusCode).toBe(403);
    expect(new ControlPlaneError('SpokeUnreachable', 'x').statusCode).toBe(409);
    expect(new ControlPlaneError('RateLimited', 'x').statusCode).toBe(429);
  });

  it('is recognised by the type guard', () => {
    expect(isControlPlaneError(new ControlPlaneError('NotFound', 'gone'))).toBe(true);
    expect(isControlPlaneError(new Error('plain'))).toBe(false);
  });
});

describe('toPublicSpoke', () => {
  it('strips key material', () => {
    const spoke = toPublicSpoke({
      id: 'id-1',
      name: 's1',
      address: '10.0.0.5:49950',
      api_key_hash: 'scrypt$a$b',
      api_key_sealed: 'v1.a.b.c',
      allowed_source_ip: null,
      status: 'pending',
      last_seen: null,
      consecutive_failures: 0,
      registered_at: '2026-01-01T00:00:00.000Z',
      last_metrics: null,
    });
    expect(Object.keys(spoke)).not.toContain('api_key_hash');
    expect(Object.keys(spoke)).not.toContain('api_key_sealed');
    expect(spoke.name).toBe('s1');
  });
});
