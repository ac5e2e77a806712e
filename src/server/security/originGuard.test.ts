import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { requireSameOriginWriteOrThrow } from './originGuard';
import { securityConfig } from './securityConfig';

describe('requireSameOriginWriteOrThrow', () => {
  const enabled = securityConfig.sync.requireSameOriginWrites;

  beforeEach(() => {
    securityConfig.sync.requireSameOriginWrites = true;
    vi.stubEnv('NEXTAUTH_URL', 'https://ledger.example.test/app');
  });

  afterEach(() => {
    securityConfig.sync.requireSameOriginWrites = enabled;
    vi.unstubAllEnvs();
  });

  it('does nothing when the guard is off', () => {
    securityConfig.sync.requireSameOriginWrites = false;
    expect(() => requireSameOriginWriteOrThrow({ headers: new Headers() })).not.toThrow();
  });

  it('accepts the configured origin', () => {
    const headers = new Headers({ origin: 'https://ledger.example.test' });
    expect(() => requireSameOriginWriteOrThrow({ headers })).not.toThrow();
  });

  it('rejects a missing or foreign origin', () => {
    expect(() => requireSameOriginWriteOrThrow({ headers: new Headers() })).toThrow('missing_origin');
    expect(() => requireSameOriginWriteOrThrow({ headers: new Headers({ origin: 'https://evil.example.test' }) }))
      .toThrow('bad_origin');
  });

  it('fails closed without NEXTAUTH_URL', () => {
    vi.stubEnv('NEXTAUTH_URL', '');
    expect(() => requireSameOriginWriteOrThrow({ headers: new Headers({ origin: 'https://ledger.example.test' }) }))
      .toThrow('server_misconfigured');
  });
});
