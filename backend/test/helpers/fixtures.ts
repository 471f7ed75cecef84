import { setTimeout as delay } from 'node:timers/promises';
import { base64url, CompactSign, exportJWK, generateKeyPair, type JWK, type KeyLike } from 'jose';
import pino from 'pino';
import type { JwksFetch } from '../../src/auth/keySourceCache.js';
import { createTrustPolicy } from '../../src/auth/trustPolicy.js';
import type { TrustPolicy } from '../../src/types/auth.js';

export const silentLogger = pino({ level: 'silent' });

export const TENANT_ID = '11111111-2222-3333-4444-555555555555';
export const AUDIENCE = 'api://00000000-0000-0000-0000-000000000000';
export const ISSUER_V1 = `https://sts.windows.net/${TENANT_ID}/`;
export const ISSUER_V2 = `https://login.microsoftonline.com/${TENANT_ID}/v2.0`;
export const JWKS_URI = `https://login.example.test/${TENANT_ID}/discovery/v2.0/keys`;

/** Fixed validator clock: 2023-11-14T22:13:20.000Z */
export const NOW_MS = 1_700_000_000_000;
export const NOW_S = NOW_MS / 1000;
export const SKEW_MS = 5_000;

export interface TestKey {
  kid: string;
  alg: string;
  privateKey: KeyLike;
  jwk: JWK;
}

export async function createTestKey(kid: string, alg = 'RS256'): Promise<TestKey> {
  const { publicKey, privateKey } = await generateKeyPair(alg, { extractable: true });
  const jwk = await exportJWK(publicKey);
  return { kid, alg, privateKey, jwk: { ...jwk, kid, alg, use: 'sig' } };
}

export function createPolicy(overrides: Partial<Parameters<typeof createTrustPolicy>[0]> = {}): TrustPolicy {
  return createTrustPolicy({
    expectedIssuers: [ISSUER_V1, ISSUER_V2],
    expectedAudience: AUDIENCE,
    allowedAlgorithms: ['RS256'],
    clockSkewToleranceMs: SKEW_MS,
    ...overrides,
  });
}

export type Claims = Record<string, unknown>;

export function baseClaims(overrides: Claims = {}): Claims {
  return {
    iss: ISSUER_V2,
    sub: 'user-subject-1',
    aud: AUDIENCE,
    iat: NOW_S - 60,
    nbf: NOW_S - 60,
    exp: NOW_S + 3600,
    upn: 'alice@example.test',
    name: 'Alice Example',
    oid: 'aaaaaaaa-0000-0000-0000-000000000001',
    ...overrides,
  };
}

/** Signs any JSON claim set, including ones with ill-typed registered claims. */
export async function signToken(
  key: TestKey,
  claims: Claims,
  header: { alg?: string; kid?: string | undefined } = {},
): Promise<string> {
  return new CompactSign(new TextEncoder().encode(JSON.stringify(claims)))
    .setProtectedHeader({ alg: header.alg ?? key.alg, kid: 'kid' in header ? header.kid : key.kid, typ: 'JWT' })
    .sign(key.privateKey);
}

/** Builds a compact token by hand, for headers jose refuses to sign. */
export function craftToken(header: Claims, claims: Claims, signature = ''): string {
  return `${base64url.encode(JSON.stringify(header))}.${base64url.encode(JSON.stringify(claims))}.${signature}`;
}

export interface FakeJwksEndpoint {
  fetch: JwksFetch;
  readonly calls: number;
  setKeys(keys: JWK[]): void;
  /** Next responses answer with this status / body instead of the key set. */
  failWith(response: { status?: number; body?: string } | 'network' | 'hang' | undefined): void;
}

/** In-process stand-in for the provider's key set endpoint. */
export function createFakeJwksEndpoint(initialKeys: JWK[], options: { latencyMs?: number } = {}): FakeJwksEndpoint {
  let keys = initialKeys;
  let calls = 0;
  let failure: { status?: number; body?: string } | 'network' | 'hang' | undefined;

  const fetch: JwksFetch = async (_url, init) => {
    calls += 1;
    if (options.latencyMs) {
      await delay(options.latencyMs);
    }
    if (failure === 'network') {
      throw new TypeError('fetch failed');
    }
    if (failure === 'hang') {
      return new Promise<Response>((_resolve, rejectFetch) => {
        init.signal.addEventListener('abort', () => rejectFetch(new Error('aborted')));
      });
    }
    if (failure) {
      return new Response(failure.body ?? '', { status: failure.status ?? 200 });
    }
    return new Response(JSON.stringify({ keys }), {
      status: 200,
      headers: { 'content-type': 'application/json' },
    });
  };

  return {
    fetch,
    get calls() {
      return calls;
    },
    setKeys(next) {
      keys = next;
    },
    failWith(next) {
      failure = next;
    },
  };
}
