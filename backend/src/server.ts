import { buildApp } from './app.js';
import { KeySourceCache } from './auth/keySourceCache.js';
import { TokenValidator } from './auth/tokenValidator.js';
import { createTrustPolicy } from './auth/trustPolicy.js';
import { config, missingRequiredSettings } from './config.js';
import logger from './logger.js';
import { describeError } from './utils/errors.js';

async function bootstrap() {
  const missing = missingRequiredSettings();
  const { auth } = config;
  if (missing.length > 0 || !auth.jwksUri || !auth.audience) {
    logger.error({ missing }, 'Missing required environment variables');
    process.exit(1);
  }

  const policy = createTrustPolicy({
    expectedIssuers: auth.issuers,
    expectedAudience: auth.audience,
    allowedAlgorithms: auth.algorithms,
    clockSkewToleranceMs: auth.clockSkewMs,
  });

  const keyCache = new KeySourceCache({
    jwksUri: auth.jwksUri,
    cacheMaxAgeMs: auth.jwksCacheMs,
    fetchTimeoutMs: auth.jwksFetchTimeoutMs,
    serveStaleOnError: auth.jwksServeStale,
    logger: logger.child({ component: 'key-source-cache' }),
  });

  const validator = new TokenValidator(keyCache, policy);

  logger.info(
    {
      tenantId: auth.tenantId,
      clientId: auth.clientId,
      audience: policy.expectedAudience,
      issuers: [...policy.expectedIssuers],
      algorithms: [...policy.allowedAlgorithms],
      jwksUri: auth.jwksUri,
      publicPaths: auth.publicPaths,
    },
    'Bearer authentication enabled',
  );

  // Warm the key cache, but do not block startup if the provider is unreachable
  const warmed = await keyCache.refresh();
  if (!warmed.ok) {
    logger.warn({ reason: warmed.error.reason }, 'Starting without a key set; first request will retry');
  }

  const app = await buildApp({
    logger,
    validator,
    keyCache,
    publicPaths: auth.publicPaths,
    info: {
      service: config.serviceName,
      tenantId: auth.tenantId ?? null,
      clientId: auth.clientId ?? null,
    },
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  try {
    await app.listen({ port: config.port, host: config.host });
    logger.info({ port: config.port }, 'jwt backend listening');
  } catch (error) {
    logger.error({ err: describeError(error) }, 'Failed to start server');
    process.exit(1);
  }
}

bootstrap().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Bootstrap failed');
  process.exit(1);
});
