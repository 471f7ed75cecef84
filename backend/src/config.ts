import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

function parseEnvList(raw: string | undefined): string[] {
  const unique = new Set<string>();
  if (!raw) {
    return [];
  }
  for (const entry of raw.split(',')) {
    const trimmed = entry.trim();
    if (trimmed.length > 0) {
      unique.add(trimmed);
    }
  }
  return [...unique];
}

function parseEnvFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined) {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

/** Both issuer URL shapes Entra ID uses for one tenant (v1.0 and v2.0 tokens). */
export function entraIssuers(tenantId: string): string[] {
  return [`https://sts.windows.net/${tenantId}/`, `https://login.microsoftonline.com/${tenantId}/v2.0`];
}

export function entraJwksUri(tenantId: string): string {
  return `https://login.microsoftonline.com/${tenantId}/discovery/v2.0/keys`;
}

const tenantIdFromEnv = process.env.AZURE_TENANT_ID?.trim() || undefined;
const clientIdFromEnv = process.env.AZURE_CLIENT_ID?.trim() || undefined;

const issuersFromEnv = parseEnvList(process.env.AUTH_ISSUERS);
const algorithmsFromEnv = parseEnvList(process.env.AUTH_ALGORITHMS);
const publicPathsFromEnv = parseEnvList(process.env.AUTH_PUBLIC_PATHS);
const defaultPublicPaths = ['GET /', 'GET /health', 'GET /ready', 'GET /metrics'];

const ConfigSchema = z.object({
  nodeEnv: z.string().optional().default('development'),
  port: z.coerce.number().int().positive().default(8080),
  host: z.string().min(1).default('0.0.0.0'),
  logLevel: z.string().optional().default('info'),
  serviceName: z.string().min(1).default('jwt-backend'),
  auth: z
    .object({
      tenantId: z.string().optional(),
      clientId: z.string().optional(),
      audience: z.string().optional(),
      issuers: z.array(z.string().url()),
      jwksUri: z.string().url().optional(),
      algorithms: z.array(z.string().min(1)).nonempty(),
      clockSkewMs: z.coerce.number().int().nonnegative().default(5_000),
      jwksCacheMs: z.coerce.number().int().positive().default(600_000),
      jwksFetchTimeoutMs: z.coerce.number().int().positive().default(5_000),
      jwksServeStale: z.boolean().default(false),
      publicPaths: z.array(z.string()),
    })
    .superRefine((value, ctx) => {
      if (value.algorithms.some((alg) => alg.toLowerCase() === 'none')) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'AUTH_ALGORITHMS must not contain "none"',
        });
      }

      const forbidden = value.publicPaths.filter((pattern) => pattern.toLowerCase().includes('/api/'));
      if (forbidden.length > 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `AUTH_PUBLIC_PATHS contains protected API routes (${forbidden.join(', ')})`,
        });
      }
    }),
});

const parsed = ConfigSchema.parse({
  nodeEnv: process.env.NODE_ENV,
  port: process.env.PORT,
  host: process.env.HOST,
  logLevel: process.env.LOG_LEVEL,
  serviceName: process.env.SERVICE_NAME,
  auth: {
    tenantId: tenantIdFromEnv,
    clientId: clientIdFromEnv,
    audience: process.env.AUTH_AUDIENCE?.trim() || (clientIdFromEnv ? `api://${clientIdFromEnv}` : undefined),
    issuers: issuersFromEnv.length ? issuersFromEnv : tenantIdFromEnv ? entraIssuers(tenantIdFromEnv) : [],
    jwksUri: process.env.JWKS_URI?.trim() || (tenantIdFromEnv ? entraJwksUri(tenantIdFromEnv) : undefined),
    algorithms: algorithmsFromEnv.length ? algorithmsFromEnv : ['RS256'],
    clockSkewMs: process.env.AUTH_CLOCK_SKEW_MS,
    jwksCacheMs: process.env.JWKS_CACHE_MS,
    jwksFetchTimeoutMs: process.env.JWKS_FETCH_TIMEOUT_MS,
    jwksServeStale: parseEnvFlag(process.env.JWKS_SERVE_STALE),
    publicPaths: publicPathsFromEnv.length ? publicPathsFromEnv : defaultPublicPaths,
  },
});

export type AppConfig = typeof parsed;

export const config: AppConfig = parsed;

/** Names of the settings the server cannot start without. */
export function missingRequiredSettings(value: AppConfig = config): string[] {
  const missing: string[] = [];
  if (!value.auth.tenantId && (!value.auth.jwksUri || value.auth.issuers.length === 0)) {
    missing.push('AZURE_TENANT_ID');
  }
  if (!value.auth.clientId && !value.auth.audience) {
    missing.push('AZURE_CLIENT_ID');
  }
  return missing;
}
