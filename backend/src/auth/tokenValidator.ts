import { base64url, compactVerify, errors } from 'jose';
import type {
  KeyResolver,
  TrustPolicy,
  ValidationFailure,
  ValidationFailureKind,
  ValidationResult,
  VerifiedClaims,
} from '../types/auth.js';

const SEGMENT_PATTERN = /^[A-Za-z0-9_-]*$/;
const REGISTERED_CLAIMS = new Set(['iss', 'sub', 'aud', 'exp', 'nbf', 'iat']);
// Seconds either side of the epoch that still fit in a Date.
const MAX_NUMERIC_DATE = 8.64e12;

type JsonObject = Record<string, unknown>;

interface ParsedToken {
  header: JsonObject;
  payload: JsonObject;
}

export interface TokenValidatorOptions {
  /** Epoch milliseconds. */
  now?: () => number;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function reject(kind: ValidationFailureKind, reason: string, extra?: Pick<ValidationFailure, 'cause'>): ValidationResult {
  return { ok: false, failure: { kind, reason, ...extra } };
}

function decodeSegment(segment: string): JsonObject | undefined {
  if (segment.length === 0 || !SEGMENT_PATTERN.test(segment)) {
    return undefined;
  }

  let value: unknown;
  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(base64url.decode(segment));
    value = JSON.parse(text);
  } catch {
    return undefined;
  }

  return isJsonObject(value) ? value : undefined;
}

function parseToken(token: string): ParsedToken | undefined {
  const segments = token.split('.');
  if (segments.length !== 3) {
    return undefined;
  }

  const [rawHeader, rawPayload, rawSignature] = segments;
  // An empty signature is structurally valid (unsecured JWS); the algorithm check rejects it.
  if (!SEGMENT_PATTERN.test(rawSignature)) {
    return undefined;
  }

  const header = decodeSegment(rawHeader);
  const payload = decodeSegment(rawPayload);
  if (!header || !payload) {
    return undefined;
  }

  return { header, payload };
}

function acceptedAudience(aud: unknown, expected: string): string | string[] | undefined {
  if (typeof aud === 'string') {
    return aud === expected ? aud : undefined;
  }
  if (Array.isArray(aud)) {
    const entries = aud.filter((entry): entry is string => typeof entry === 'string');
    return entries.length === aud.length && entries.includes(expected) ? entries : undefined;
  }
  return undefined;
}

function readNumericDate(payload: JsonObject, claim: 'exp' | 'nbf' | 'iat'): number | undefined | null {
  const value = payload[claim];
  if (value === undefined) {
    return undefined;
  }
  return typeof value === 'number' && Math.abs(value) <= MAX_NUMERIC_DATE ? value : null;
}

/**
 * Decides whether a bearer token is authentic and acceptable under a trust policy.
 *
 * Checks run in a fixed order (structure, algorithm, key, signature, then claims) and
 * the first failing check is the result. Nothing in the payload is looked at before
 * the signature has been verified.
 */
export class TokenValidator {
  private readonly now: () => number;

  constructor(
    private readonly keys: KeyResolver,
    private readonly policy: TrustPolicy,
    options: TokenValidatorOptions = {},
  ) {
    this.now = options.now ?? Date.now;
  }

  async validate(rawToken: string): Promise<ValidationResult> {
    const token = rawToken.trim();
    const parsed = parseToken(token);
    if (!parsed) {
      return reject('Malformed', 'token is not a compact JWS with JSON header and payload');
    }
    const { header, payload } = parsed;

    const alg = header.alg;
    if (typeof alg !== 'string' || alg.length === 0) {
      return reject('AlgorithmRejected', 'header has no "alg"');
    }
    if (alg.toLowerCase() === 'none') {
      return reject('AlgorithmRejected', 'unsigned token');
    }
    const allowed = [...this.policy.allowedAlgorithms].find((candidate) => candidate === alg);
    if (!allowed) {
      return reject('AlgorithmRejected', `algorithm ${alg} is not allowed`);
    }

    const kid = header.kid;
    if (typeof kid !== 'string' || kid.length === 0) {
      return reject('KeyUnresolvable', 'header has no "kid"');
    }
    const lookup = await this.keys.getKey(kid);
    if (!lookup.ok) {
      if (lookup.error.kind === 'NotFound') {
        return reject('KeyUnresolvable', `no signing key with kid ${kid}`);
      }
      return reject('KeyUnresolvable', `key source unavailable (${lookup.error.reason})`, { cause: lookup.error });
    }
    const key = lookup.key;
    if (key.algorithm !== allowed) {
      return reject('AlgorithmRejected', `key ${kid} is published for ${key.algorithm}, token declares ${allowed}`);
    }

    try {
      await compactVerify(token, key.publicKey, { algorithms: [allowed] });
    } catch (error) {
      if (error instanceof errors.JWSInvalid || error instanceof errors.JOSENotSupported) {
        return reject('Malformed', error.message);
      }
      if (error instanceof errors.JOSEAlgNotAllowed) {
        return reject('AlgorithmRejected', error.message);
      }
      return reject('SignatureInvalid', error instanceof Error ? error.message : 'signature verification failed');
    }

    // Payload is authentic from here on.
    const iss = payload.iss;
    if (typeof iss !== 'string' || !this.policy.expectedIssuers.has(iss)) {
      return reject('IssuerRejected', `issuer ${String(iss)} is not trusted`);
    }

    const audience = acceptedAudience(payload.aud, this.policy.expectedAudience);
    if (audience === undefined) {
      return reject('AudienceRejected', `audience ${JSON.stringify(payload.aud)} does not include the expected audience`);
    }

    const exp = readNumericDate(payload, 'exp');
    const nbf = readNumericDate(payload, 'nbf');
    const iat = readNumericDate(payload, 'iat');
    if (exp === null || nbf === null || iat === null) {
      return reject('Malformed', 'time claims must be NumericDate values');
    }

    const now = this.now();
    const tolerance = this.policy.clockSkewToleranceMs;
    if (exp === undefined) {
      return reject('Expired', 'token has no "exp"');
    }
    if (exp * 1000 < now - tolerance) {
      return reject('Expired', `expired at ${exp}`);
    }
    if (nbf !== undefined && nbf * 1000 > now + tolerance) {
      return reject('NotYetValid', `not valid before ${nbf}`);
    }
    if (iat !== undefined && iat * 1000 > now + tolerance) {
      return reject('NotYetValid', `issued in the future at ${iat}`);
    }

    const sub = payload.sub;
    if (sub !== undefined && typeof sub !== 'string') {
      return reject('Malformed', '"sub" must be a string');
    }

    const additional: JsonObject = Object.fromEntries(
      Object.entries(payload).filter(([name]) => !REGISTERED_CLAIMS.has(name)),
    );

    const claims: VerifiedClaims = {
      subject: sub,
      issuer: iss,
      audience,
      expiresAt: exp,
      issuedAt: iat,
      notBefore: nbf,
      additional,
    };
    return { ok: true, claims };
  }
}

/** Reassembles the verbatim claim object, registered claims included. */
export function toClaimSet(claims: VerifiedClaims): JsonObject {
  const set: JsonObject = { ...claims.additional, iss: claims.issuer, aud: claims.audience, exp: claims.expiresAt };
  if (claims.subject !== undefined) set.sub = claims.subject;
  if (claims.issuedAt !== undefined) set.iat = claims.issuedAt;
  if (claims.notBefore !== undefined) set.nbf = claims.notBefore;
  return set;
}
