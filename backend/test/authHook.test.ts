import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import Fastify from 'fastify';
import {
  buildAuthContext,
  buildAuthHook,
  extractBearerToken,
  matchesAnyPattern,
  statusForFailure,
  type TokenVerifier,
} from '../src/middleware/auth.js';
import { VALIDATION_FAILURE_KINDS, type ValidationResult, type VerifiedClaims } from '../src/types/auth.js';
import { AUDIENCE, ISSUER_V2, NOW_S } from './helpers/fixtures.js';

const claims: VerifiedClaims = {
  subject: 'user-subject-1',
  issuer: ISSUER_V2,
  audience: AUDIENCE,
  expiresAt: NOW_S + 3600,
  issuedAt: NOW_S - 60,
  additional: { preferred_username: 'alice@example.test', name: 'Alice Example' },
};

function stubVerifier(result: ValidationResult) {
  const seen: string[] = [];
  const verifier: TokenVerifier = {
    async validate(token) {
      seen.push(token);
      return result;
    },
  };
  return { verifier, seen };
}

async function buildTestApp(result: ValidationResult) {
  const { verifier, seen } = stubVerifier(result);
  const app = Fastify({ logger: false });
  app.addHook('onRequest', buildAuthHook({ validator: verifier, publicPaths: ['GET /health', '/docs/*'] }));
  app.get('/health', async () => ({ status: 'healthy' }));
  app.get('/docs/intro', async () => ({ page: 'intro' }));
  app.get('/private', async (request) => ({ sub: request.auth?.sub ?? null, upn: request.auth?.upn ?? null }));
  await app.ready();
  return { app, seen };
}

describe('auth hook', () => {
  test('public paths skip validation entirely', async () => {
    const { app, seen } = await buildTestApp({ ok: true, claims });

    const health = await app.inject({ method: 'GET', url: '/health?probe=1' });
    const docs = await app.inject({ method: 'GET', url: '/docs/intro' });

    assert.equal(health.statusCode, 200);
    assert.equal(docs.statusCode, 200);
    assert.deepEqual(seen, []);
    await app.close();
  });

  test('missing authorization header is a 401 with a bearer challenge', async () => {
    const { app } = await buildTestApp({ ok: true, claims });

    const response = await app.inject({ method: 'GET', url: '/private' });

    assert.equal(response.statusCode, 401);
    assert.equal(response.headers['www-authenticate'], 'Bearer realm="api"');
    assert.deepEqual(response.json(), { error: 'Unauthorized', code: 'auth.missing_token' });
    await app.close();
  });

  test('non-bearer authorization header is a 401', async () => {
    const { app, seen } = await buildTestApp({ ok: true, claims });

    const response = await app.inject({ method: 'GET', url: '/private', headers: { authorization: 'Basic dGVzdDp0ZXN0' } });

    assert.equal(response.statusCode, 401);
    assert.deepEqual(response.json(), { error: 'Unauthorized', code: 'auth.invalid_header' });
    assert.deepEqual(seen, []);
    await app.close();
  });

  test('validation failures answer a generic 401 without the failure kind', async () => {
    const { app } = await buildTestApp({ ok: false, failure: { kind: 'AudienceRejected', reason: 'audience mismatch' } });

    const response = await app.inject({ method: 'GET', url: '/private', headers: { authorization: 'Bearer abc.def.ghi' } });

    assert.equal(response.statusCode, 401);
    assert.equal(response.headers['www-authenticate'], 'Bearer realm="api", error="invalid_token"');
    assert.deepEqual(response.json(), { error: 'Unauthorized', code: 'auth.invalid_token' });
    await app.close();
  });

  test('verified tokens attach the auth context', async () => {
    const { app, seen } = await buildTestApp({ ok: true, claims });

    const response = await app.inject({ method: 'GET', url: '/private', headers: { authorization: 'bearer abc.def.ghi' } });

    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json(), { sub: 'user-subject-1', upn: 'alice@example.test' });
    assert.deepEqual(seen, ['abc.def.ghi']);
    await app.close();
  });

  test('CORS preflight is never challenged', async () => {
    const { app, seen } = await buildTestApp({ ok: true, claims });

    const response = await app.inject({ method: 'OPTIONS', url: '/private' });

    assert.notEqual(response.statusCode, 401);
    assert.deepEqual(seen, []);
    await app.close();
  });
});

describe('helpers', () => {
  test('extracts bearer tokens', () => {
    assert.equal(extractBearerToken('Bearer abc.def.ghi'), 'abc.def.ghi');
    assert.equal(extractBearerToken('bearer   abc.def.ghi  '), 'abc.def.ghi');
    assert.equal(extractBearerToken('Bearer'), undefined);
    assert.equal(extractBearerToken('Bearer a b'), undefined);
    assert.equal(extractBearerToken('Basic abc'), undefined);
    assert.equal(extractBearerToken(undefined), undefined);
  });

  test('matches method-qualified and wildcard path patterns', () => {
    assert.equal(matchesAnyPattern('/health', 'GET', ['GET /health']), true);
    assert.equal(matchesAnyPattern('/health', 'POST', ['GET /health']), false);
    assert.equal(matchesAnyPattern('/docs/a/b', 'GET', ['/docs/*']), true);
    assert.equal(matchesAnyPattern('/api/protected', 'GET', ['/docs/*']), false);
    assert.equal(matchesAnyPattern('/anything', 'GET', []), false);
  });

  test('every failure kind maps to 401', () => {
    for (const kind of VALIDATION_FAILURE_KINDS) {
      assert.equal(statusForFailure(kind), 401);
    }
  });

  test('auth context falls back to preferred_username for the principal name', () => {
    const context = buildAuthContext('abc.def.ghi', claims);

    assert.equal(context.upn, 'alice@example.test');
    assert.equal(context.name, 'Alice Example');
    assert.equal(context.oid, undefined);
    assert.equal(context.expiresAt.getTime(), (NOW_S + 3600) * 1000);
    assert.equal(context.issuedAt?.getTime(), (NOW_S - 60) * 1000);
  });
});
