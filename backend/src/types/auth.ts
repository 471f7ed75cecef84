import type { JWK, KeyLike } from 'jose';

export const SUPPORTED_ALGORITHMS = [
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
  'ES256',
  'ES384',
  'ES512',
  'EdDSA',
] as const;

export type SupportedAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

export function isSupportedAlgorithm(value: string): value is SupportedAlgorithm {
  return (SUPPORTED_ALGORITHMS as readonly string[]).includes(value);
}

export interface SigningKey {
  /** `kid` as published by the provider. */
  readonly keyId: string;
  readonly algorithm: SupportedAlgorithm;
  /** Verification key imported from the published JWK. */
  readonly publicKey: KeyLike | Uint8Array;
  /** Source JWK, kept for diagnostics. */
  readonly jwk: Readonly<JWK>;
}

export interface KeySetSnapshot {
  readonly keys: ReadonlyMap<string, SigningKey>;
  /** Epoch milliseconds. */
  readonly fetchedAt: number;
  /** Epoch milliseconds; the snapshot is stale from this instant on. */
  readonly expiresAt: number;
}

export type FetchErrorReason = 'timeout' | 'network' | 'http_status' | 'invalid_key_set';

export interface FetchError {
  readonly kind: 'FetchError';
  readonly reason: FetchErrorReason;
  readonly message: string;
}

export interface KeyNotFound {
  readonly kind: 'NotFound';
  readonly keyId: string;
}

export type KeyLookupResult =
  | { readonly ok: true; readonly key: SigningKey }
  | { readonly ok: false; readonly error: KeyNotFound | FetchError };

export type RefreshResult =
  | { readonly ok: true; readonly snapshot: KeySetSnapshot }
  | { readonly ok: false; readonly error: FetchError };

/** Anything that can resolve a key id to a verification key. */
export interface KeyResolver {
  getKey(keyId: string): Promise<KeyLookupResult>;
}

export interface TrustPolicy {
  /** Exact issuer strings; every accepted issuer URL shape must be listed. */
  readonly expectedIssuers: ReadonlySet<string>;
  readonly expectedAudience: string;
  readonly allowedAlgorithms: ReadonlySet<SupportedAlgorithm>;
  /** Applied symmetrically to `exp`, `nbf` and `iat`. */
  readonly clockSkewToleranceMs: number;
}

export interface VerifiedClaims {
  readonly subject?: string;
  readonly issuer: string;
  /** `aud` exactly as presented in the token. */
  readonly audience: string | readonly string[];
  /** NumericDate (seconds). */
  readonly expiresAt: number;
  readonly issuedAt?: number;
  readonly notBefore?: number;
  /** Every other claim in the payload, untouched. */
  readonly additional: Readonly<Record<string, unknown>>;
}

export const VALIDATION_FAILURE_KINDS = [
  'Malformed',
  'AlgorithmRejected',
  'KeyUnresolvable',
  'SignatureInvalid',
  'IssuerRejected',
  'AudienceRejected',
  'Expired',
  'NotYetValid',
] as const;

export type ValidationFailureKind = (typeof VALIDATION_FAILURE_KINDS)[number];

export interface ValidationFailure {
  readonly kind: ValidationFailureKind;
  /** Internal description; never sent to the client. */
  readonly reason: string;
  readonly cause?: FetchError;
}

export type ValidationResult =
  | { readonly ok: true; readonly claims: VerifiedClaims }
  | { readonly ok: false; readonly failure: ValidationFailure };
