import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { mapToHttpError } from './httpError';

type ErrorResponsePayload = {
  error: string;
  message?: string;
};

export function createHttpErrorHandler() {
  return function httpErrorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) {
    const httpError = mapToHttpError(error);

    if (httpError.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error while processing request');
    } else {
      request.log.debug({ err: error }, 'Mapped client error to HttpError response');
    }

    // internal fault details stay in the log
    const response: ErrorResponsePayload =
      httpError.statusCode >= 500
        ? { error: httpError.code }
        : { error: httpError.code, message: httpError.message };

    if (!reply.sent) {
      reply.status(httpError.statusCode).send(response);
    }
  };
}
