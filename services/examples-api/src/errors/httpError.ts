export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

const CLIENT_ERROR_CODES: Record<number, string> = {
  400: 'bad_request',
  404: 'not_found',
  405: 'method_not_allowed',
  406: 'not_acceptable',
  413: 'payload_too_large',
  415: 'unsupported_media_type',
};

function statusCodeOf(err: unknown): number | null {
  if (err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return null;
}

/**
 * Normalizes anything that reaches the error handler.
 * Fastify's own client errors (malformed JSON, unsupported media type, oversized body) keep their status.
 */
export function mapToHttpError(err: unknown): HttpError {
  const message = err instanceof Error ? err.message : 'Unknown error';
  const statusCode = statusCodeOf(err);

  if (statusCode !== null && statusCode >= 400 && statusCode < 500) {
    return new HttpError(statusCode, CLIENT_ERROR_CODES[statusCode] ?? 'client_error', message);
  }
  return new HttpError(500, 'internal_error', message);
}
