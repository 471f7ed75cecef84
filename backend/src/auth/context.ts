import type { VerifiedClaims } from '../types/auth.js';

export interface AuthContext {
  /** Raw bearer token as received from the client. */
  token: string;
  /** Subject identifier. */
  sub?: string;
  /** Optional human readable name. */
  name?: string;
  /** User principal name (`upn`, falling back to `preferred_username`). */
  upn?: string;
  /** Directory object id of the caller. */
  oid?: string;
  /** Token issue timestamp when available. */
  issuedAt?: Date;
  expiresAt: Date;
  /** Verified claims for downstream checks. */
  claims: VerifiedClaims;
}
