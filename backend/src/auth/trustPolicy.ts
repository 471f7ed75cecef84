import { isSupportedAlgorithm, type SupportedAlgorithm, type TrustPolicy } from '../types/auth.js';

export interface TrustPolicyInput {
  expectedIssuers: Iterable<string>;
  expectedAudience: string;
  allowedAlgorithms: Iterable<string>;
  clockSkewToleranceMs: number;
}

/**
 * Builds the immutable policy the validator runs against. Throws on any setting that
 * would weaken verification, so a bad deployment fails at start-up instead of at the
 * first request.
 */
export function createTrustPolicy(input: TrustPolicyInput): TrustPolicy {
  const issuers = new Set<string>();
  for (const issuer of input.expectedIssuers) {
    const trimmed = issuer.trim();
    if (trimmed.length > 0) {
      issuers.add(trimmed);
    }
  }
  if (issuers.size === 0) {
    throw new Error('Trust policy requires at least one expected issuer');
  }

  const audience = input.expectedAudience.trim();
  if (!audience) {
    throw new Error('Trust policy requires an expected audience');
  }

  const algorithms = new Set<SupportedAlgorithm>();
  for (const algorithm of input.allowedAlgorithms) {
    if (algorithm.trim().toLowerCase() === 'none') {
      throw new Error('The unsigned "none" algorithm can never be allowed');
    }
    if (!isSupportedAlgorithm(algorithm)) {
      throw new Error(`Unsupported signature algorithm in trust policy: ${algorithm}`);
    }
    algorithms.add(algorithm);
  }
  if (algorithms.size === 0) {
    throw new Error('Trust policy requires at least one allowed algorithm');
  }

  if (!Number.isFinite(input.clockSkewToleranceMs) || input.clockSkewToleranceMs < 0) {
    throw new Error('Clock skew tolerance must be a non-negative number of milliseconds');
  }

  return Object.freeze({
    expectedIssuers: issuers,
    expectedAudience: audience,
    allowedAlgorithms: algorithms,
    clockSkewToleranceMs: input.clockSkewToleranceMs,
  });
}
