import type { FastifyInstance } from 'fastify';
import {
  ExecutionFailedError,
  MalformedRestrictionError,
  UnknownCollectionError,
} from 'pg-metadata-catalog';

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, _request, reply) => {
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    if (error instanceof UnknownCollectionError) {
      return reply.status(404).send({ error: error.name, message: error.message });
    }

    if (error instanceof MalformedRestrictionError) {
      return reply.status(400).send({ error: error.name, message: error.message });
    }

    // The database rejected or never received the statement; the caller may retry
    if (error instanceof ExecutionFailedError) {
      app.log.error({ err: error, collection: error.collection }, 'metadata query failed');
      return reply.status(502).send({
        error: error.name,
        message: `Failed to fetch collection "${error.collection}"`,
        retryable: true,
      });
    }

    // Fastify built-in errors (schema validation, bad JSON) carry their own status
    if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
