import { importJWK, type JWK } from 'jose';
import type { BaseLogger } from 'pino';
import { z } from 'zod';
import logger from '../logger.js';
import { recordKeySetFetch } from '../metrics/prometheus.js';
import {
  isSupportedAlgorithm,
  type FetchError,
  type FetchErrorReason,
  type KeyLookupResult,
  type KeyResolver,
  type KeySetSnapshot,
  type RefreshResult,
  type SigningKey,
  type SupportedAlgorithm,
} from '../types/auth.js';

export type JwksFetch = (
  url: URL,
  init: { signal: AbortSignal; headers: Record<string, string> },
) => Promise<Response>;

export interface KeySourceCacheOptions {
  jwksUri: string | URL;
  /** How long a fetched key set counts as fresh. */
  cacheMaxAgeMs?: number;
  /** Upper bound for one provider round trip, body included. */
  fetchTimeoutMs?: number;
  /**
   * Keep answering lookups from the last (expired) snapshot when the provider
   * cannot be reached. Off by default: requests are rejected instead.
   */
  serveStaleOnError?: boolean;
  fetch?: JwksFetch;
  now?: () => number;
  logger?: BaseLogger;
}

const DEFAULT_CACHE_MAX_AGE_MS = 600_000;
const DEFAULT_FETCH_TIMEOUT_MS = 5_000;

// Unknown members (x5t, issuer, ...) are stripped; importJWK only needs key material.
const JwkSchema = z.object({
  kty: z.string().min(1),
  kid: z.string().min(1),
  alg: z.string().optional(),
  use: z.string().optional(),
  key_ops: z.array(z.string()).optional(),
  crv: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
  d: z.string().optional(),
  x5c: z.array(z.string()).optional(),
});

const JwksSchema = z.object({
  keys: z.array(z.unknown()),
});

const defaultFetch: JwksFetch = (url, init) => fetch(url, init);

function inferAlgorithm(jwk: z.infer<typeof JwkSchema>): SupportedAlgorithm | undefined {
  if (jwk.alg !== undefined) {
    return isSupportedAlgorithm(jwk.alg) ? jwk.alg : undefined;
  }
  switch (jwk.kty) {
    case 'RSA':
      return 'RS256';
    case 'EC':
      if (jwk.crv === 'P-256') return 'ES256';
      if (jwk.crv === 'P-384') return 'ES384';
      if (jwk.crv === 'P-521') return 'ES512';
      return undefined;
    case 'OKP':
      return jwk.crv === 'Ed25519' || jwk.crv === 'Ed448' ? 'EdDSA' : undefined;
    default:
      return undefined;
  }
}

function fetchError(reason: FetchErrorReason, message: string): FetchError {
  return { kind: 'FetchError', reason, message };
}

/**
 * In-memory view of an identity provider's published signing keys.
 *
 * Snapshots are replaced wholesale, so a reader sees either the old key map or the
 * new one. Concurrent refreshes share one outbound request.
 */
export class KeySourceCache implements KeyResolver {
  private readonly jwksUri: URL;
  private readonly cacheMaxAgeMs: number;
  private readonly fetchTimeoutMs: number;
  private readonly serveStaleOnError: boolean;
  private readonly fetchImpl: JwksFetch;
  private readonly now: () => number;
  private readonly log: BaseLogger;

  private snapshot: KeySetSnapshot | undefined;
  private inFlight: Promise<RefreshResult> | undefined;

  constructor(options: KeySourceCacheOptions) {
    this.jwksUri = new URL(options.jwksUri);
    this.cacheMaxAgeMs = options.cacheMaxAgeMs ?? DEFAULT_CACHE_MAX_AGE_MS;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.serveStaleOnError = options.serveStaleOnError ?? false;
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? logger;
  }

  getSnapshot(): KeySetSnapshot | undefined {
    return this.snapshot;
  }

  isFresh(): boolean {
    return this.snapshot !== undefined && this.now() < this.snapshot.expiresAt;
  }

  async getKey(keyId: string): Promise<KeyLookupResult> {
    const current = this.snapshot;
    if (current && this.now() < current.expiresAt) {
      // A fresh set that lacks the id answers NotFound without touching the network.
      return lookup(current, keyId);
    }

    const refreshed = await this.refresh();
    if (refreshed.ok) {
      return lookup(refreshed.snapshot, keyId);
    }

    if (this.serveStaleOnError && current) {
      this.log.warn(
        { jwksUri: this.jwksUri.href, reason: refreshed.error.reason, expiredAt: new Date(current.expiresAt).toISOString() },
        'Serving expired key set after failed refresh',
      );
      return lookup(current, keyId);
    }

    return { ok: false, error: refreshed.error };
  }

  refresh(): Promise<RefreshResult> {
    if (!this.inFlight) {
      this.inFlight = this.load().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async load(): Promise<RefreshResult> {
    const result = await this.fetchKeySet();
    recordKeySetFetch({ outcome: result.ok ? 'ok' : result.error.reason });

    if (!result.ok) {
      this.log.error({ jwksUri: this.jwksUri.href, reason: result.error.reason, err: result.error.message }, 'Key set refresh failed');
      return result;
    }

    this.snapshot = result.snapshot;
    this.log.info(
      { jwksUri: this.jwksUri.href, keyIds: [...result.snapshot.keys.keys()] },
      'Key set refreshed',
    );
    return result;
  }

  private async fetchKeySet(): Promise<RefreshResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.fetchTimeoutMs);

    let body: unknown;
    try {
      const response = await this.fetchImpl(this.jwksUri, {
        signal: controller.signal,
        headers: { accept: 'application/json' },
      });
      if (!response.ok) {
        await response.body?.cancel();
        return { ok: false, error: fetchError('http_status', `Key set endpoint answered ${response.status}`) };
      }
      try {
        body = await response.json();
      } catch (error) {
        if (controller.signal.aborted) {
          throw error;
        }
        return { ok: false, error: fetchError('invalid_key_set', 'Key set response is not valid JSON') };
      }
    } catch (error) {
      if (controller.signal.aborted) {
        return { ok: false, error: fetchError('timeout', `Key set fetch exceeded ${this.fetchTimeoutMs}ms`) };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: fetchError('network', message) };
    } finally {
      clearTimeout(timer);
    }

    const parsed = JwksSchema.safeParse(body);
    if (!parsed.success) {
      return { ok: false, error: fetchError('invalid_key_set', 'Key set response has no "keys" array') };
    }

    const keys = new Map<string, SigningKey>();
    for (const entry of parsed.data.keys) {
      const key = await this.importKey(entry);
      if (!key) {
        continue;
      }
      if (keys.has(key.keyId)) {
        this.log.warn({ kid: key.keyId }, 'Duplicate key id in key set; keeping the first');
        continue;
      }
      keys.set(key.keyId, key);
    }

    const fetchedAt = this.now();
    const snapshot: KeySetSnapshot = Object.freeze({
      keys,
      fetchedAt,
      expiresAt: fetchedAt + this.cacheMaxAgeMs,
    });
    return { ok: true, snapshot };
  }

  private async importKey(entry: unknown): Promise<SigningKey | undefined> {
    const parsed = JwkSchema.safeParse(entry);
    if (!parsed.success) {
      this.log.warn({ issues: parsed.error.issues.map((issue) => issue.message) }, 'Skipping malformed JWK');
      return undefined;
    }

    const jwk = parsed.data;
    if (jwk.d !== undefined || jwk.kty === 'oct') {
      this.log.warn({ kid: jwk.kid }, 'Skipping non-public JWK');
      return undefined;
    }
    if (jwk.use !== undefined && jwk.use !== 'sig') {
      return undefined;
    }

    const algorithm = inferAlgorithm(jwk);
    if (!algorithm) {
      this.log.warn({ kid: jwk.kid, kty: jwk.kty, alg: jwk.alg }, 'Skipping JWK with unsupported algorithm');
      return undefined;
    }

    const source: JWK = { ...jwk, alg: algorithm };
    try {
      const publicKey = await importJWK(source, algorithm);
      return Object.freeze({ keyId: jwk.kid, algorithm, publicKey, jwk: Object.freeze(source) });
    } catch (error) {
      this.log.warn({ kid: jwk.kid, err: error }, 'Skipping JWK that failed to import');
      return undefined;
    }
  }
}

function lookup(snapshot: KeySetSnapshot, keyId: string): KeyLookupResult {
  const key = snapshot.keys.get(keyId);
  return key ? { ok: true, key } : { ok: false, error: { kind: 'NotFound', keyId } };
}
