import type { FastifyReply } from 'fastify';

export interface ErrorBody {
  error: string;
  code: string;
  details?: unknown;
}

export function sendError(reply: FastifyReply, status: number, code: string, message: string, details?: unknown) {
  const payload: ErrorBody = { error: message, code };
  if (details !== undefined) payload.details = details;
  return reply.code(status).send(payload);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
