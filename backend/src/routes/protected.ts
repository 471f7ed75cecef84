import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { toClaimSet } from '../auth/tokenValidator.js';
import { sendError } from '../utils/errors.js';

function isoOrNull(date?: Date): string | null {
  return date ? date.toISOString() : null;
}

export async function registerProtectedRoutes(app: FastifyInstance) {
  const protectedHandler = async (request: FastifyRequest, reply: FastifyReply) => {
    const auth = request.auth;
    if (!auth) {
      return sendError(reply, 401, 'auth.missing_token', 'Unauthorized');
    }

    request.log.info({ upn: auth.upn ?? 'N/A', sub: auth.sub }, 'Protected endpoint accessed');

    return {
      message: 'Successfully accessed protected resource',
      timestamp: new Date().toISOString(),
      user: {
        upn: auth.upn ?? 'N/A',
        name: auth.name ?? 'N/A',
        oid: auth.oid ?? 'N/A',
      },
      token_info: {
        issuer: auth.claims.issuer,
        audience: auth.claims.audience,
        issued_at: isoOrNull(auth.issuedAt),
        expires_at: auth.expiresAt.toISOString(),
      },
    };
  };

  app.get('/api/protected', protectedHandler);
  app.post('/api/protected', protectedHandler);

  app.post('/api/token-info', async (request, reply) => {
    const auth = request.auth;
    if (!auth) {
      return sendError(reply, 401, 'auth.missing_token', 'Unauthorized');
    }

    request.log.info({ upn: auth.upn ?? 'N/A' }, 'Token info requested');

    return {
      message: 'Token decoded successfully',
      claims: toClaimSet(auth.claims),
    };
  });
}
