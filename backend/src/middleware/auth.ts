import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AuthContext } from '../auth/context.js';
import { recordTokenValidation } from '../metrics/prometheus.js';
import type { ValidationFailureKind, ValidationResult, VerifiedClaims } from '../types/auth.js';
import { sendError } from '../utils/errors.js';

type OnRequestHook = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | void>;

export interface TokenVerifier {
  validate(token: string): Promise<ValidationResult>;
}

export interface AuthHookOptions {
  validator: TokenVerifier;
  /** `METHOD /path` or `/path`; a single `*` acts as a wildcard. */
  publicPaths: string[];
  realm?: string;
}

function parsePatterns(rawPatterns: string[]): string[] {
  const unique = new Set<string>();
  for (const pattern of rawPatterns) {
    if (!pattern) continue;
    unique.add(pattern.trim());
  }
  return [...unique];
}

export function matchesAnyPattern(pathname: string, method: string, patterns: string[]): boolean {
  if (!patterns.length) {
    return false;
  }

  const target = pathname.toLowerCase();
  const targetWithMethod = `${method.toLowerCase()} ${target}`;

  return patterns.some((pattern) => {
    const candidate = pattern.toLowerCase();
    if (candidate.includes(' ')) {
      return matchPattern(targetWithMethod, candidate);
    }
    return matchPattern(target, candidate);
  });
}

function matchPattern(value: string, pattern: string): boolean {
  if (!pattern.includes('*')) {
    return value === pattern;
  }

  const [prefix = '', suffix = ''] = pattern.split('*');
  if (prefix && !value.startsWith(prefix)) {
    return false;
  }
  if (suffix && !value.endsWith(suffix)) {
    return false;
  }
  return value.length >= prefix.length + suffix.length;
}

export function extractBearerToken(headerValue?: string): string | undefined {
  if (!headerValue) {
    return undefined;
  }

  const match = headerValue.match(/^Bearer\s+(\S+)\s*$/i);
  return match?.[1];
}

/**
 * Every validation failure is an authentication failure. 403 stays reserved for
 * authorization decisions taken by the routes.
 */
export function statusForFailure(kind: ValidationFailureKind): 401 {
  switch (kind) {
    case 'Malformed':
    case 'AlgorithmRejected':
    case 'KeyUnresolvable':
    case 'SignatureInvalid':
    case 'IssuerRejected':
    case 'AudienceRejected':
    case 'Expired':
    case 'NotYetValid':
      return 401;
    default: {
      const unhandled: never = kind;
      throw new Error(`Unhandled validation failure: ${String(unhandled)}`);
    }
  }
}

function stringClaim(claims: VerifiedClaims, name: string): string | undefined {
  const value = claims.additional[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function toDate(seconds?: number): Date | undefined {
  if (typeof seconds !== 'number' || Number.isNaN(seconds)) {
    return undefined;
  }
  return new Date(seconds * 1000);
}

export function buildAuthContext(token: string, claims: VerifiedClaims): AuthContext {
  return {
    token,
    sub: claims.subject,
    name: stringClaim(claims, 'name'),
    upn: stringClaim(claims, 'upn') ?? stringClaim(claims, 'preferred_username'),
    oid: stringClaim(claims, 'oid'),
    issuedAt: toDate(claims.issuedAt),
    expiresAt: new Date(claims.expiresAt * 1000),
    claims,
  };
}

export function buildAuthHook(options: AuthHookOptions): OnRequestHook {
  const publicPathPatterns = parsePatterns(options.publicPaths);
  const realm = options.realm ?? 'api';

  return async function authHook(request: FastifyRequest, reply: FastifyReply) {
    // Skip auth for CORS preflight
    if (request.method.toUpperCase() === 'OPTIONS') {
      return;
    }
    const rawPath = request.raw.url ? request.raw.url.split('?')[0] : '';
    if (matchesAnyPattern(rawPath, request.method, publicPathPatterns)) {
      return;
    }

    const headerValue = request.headers.authorization;
    if (!headerValue) {
      recordTokenValidation({ outcome: 'missing_token' });
      request.log.warn({ path: rawPath }, 'Missing bearer token');
      reply.header('WWW-Authenticate', `Bearer realm="${realm}"`);
      return sendError(reply, 401, 'auth.missing_token', 'Unauthorized');
    }

    const token = extractBearerToken(headerValue);
    if (!token) {
      recordTokenValidation({ outcome: 'invalid_header' });
      request.log.warn({ path: rawPath }, 'Authorization header is not a bearer token');
      reply.header('WWW-Authenticate', `Bearer realm="${realm}", error="invalid_request"`);
      return sendError(reply, 401, 'auth.invalid_header', 'Unauthorized');
    }

    request.log.debug({ tokenPrefix: token.slice(0, 12), tokenLength: token.length }, 'Received bearer token');

    const result = await options.validator.validate(token);
    if (!result.ok) {
      const { kind, reason } = result.failure;
      recordTokenValidation({ outcome: kind });
      request.log.warn({ path: rawPath, kind, reason }, 'Rejected bearer token');
      reply.header('WWW-Authenticate', `Bearer realm="${realm}", error="invalid_token"`);
      return sendError(reply, statusForFailure(kind), 'auth.invalid_token', 'Unauthorized');
    }

    recordTokenValidation({ outcome: 'success' });
    request.auth = buildAuthContext(token, result.claims);
  };
}
