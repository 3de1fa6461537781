import type { FastifyReply, FastifyRequest, onRequestHookHandler } from 'fastify';

const PUBLIC_PATHS = new Set(['/health']);

export function extractApiKey(request: FastifyRequest): string | null {
  const headerKey = request.headers['x-api-key'];
  if (typeof headerKey === 'string' && headerKey.trim().length > 0) {
    return headerKey.trim();
  }
  const auth = request.headers.authorization;
  if (!auth) return null;
  const match = auth.match(/^Bearer\s+(.+)$/i);
  return match ? match[1].trim() : null;
}

function isPublicRequest(request: FastifyRequest): boolean {
  const path = (request.raw.url ?? '').split('?')[0];
  return PUBLIC_PATHS.has(path);
}

function forbidden(reply: FastifyReply): void {
  reply.code(403).send({ error: 'forbidden' });
}

/**
 * Rejects callers that do not present one of `apiKeys`.
 * With an empty key list every non-public request is rejected.
 */
export function createApiKeyGate(apiKeys: readonly string[]): onRequestHookHandler {
  const accepted = new Set(apiKeys);

  return function apiKeyGate(request, reply, done) {
    if (isPublicRequest(request)) return done();

    const provided = extractApiKey(request);
    if (!provided || !accepted.has(provided)) {
      request.log.debug({ url: request.url }, 'Rejected request without a valid API key');
      return forbidden(reply);
    }
    done();
  };
}
