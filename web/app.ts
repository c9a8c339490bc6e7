import fastify, { FastifyError, FastifyInstance } from 'fastify';
import {
  ArbiterError,
  ConfigurationError,
  JobNotFoundError,
  ValidationError } from '../modules/errors';
import { ArbiterService } from '../services/arbiter';
import { ErrorReply } from '../types/http';
import { registerAppRoutes } from './routes';

const BODY_LIMIT = 2 * 1024 * 1024; //job_data tops out at 400K chars

function statusCodeFor(error: Error): number {
  if (error instanceof ValidationError) {
    return 400;
  }
  if (error instanceof JobNotFoundError) {
    return 404;
  }
  if (error instanceof ConfigurationError) {
    return 503;
  }
  return 500;
}

function isFastifyError(error: Error): error is FastifyError {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

export const buildServer = (arbiter: ArbiterService, logger = false): FastifyInstance => {
  const server = fastify({ logger, bodyLimit: BODY_LIMIT });

  server.setErrorHandler<Error>(async (error, request, reply) => {
    if (error instanceof ArbiterError) {
      const code = statusCodeFor(error);
      if (code >= 500) {
        arbiter.logger.error(`http-${code} ${request.method} ${request.url}: ${error.message}`);
      }
      const body: ErrorReply = { error: error.code, detail: error.message };
      return reply.status(code).send(body);
    }
    //schema validation and body parsing errors carry their own 4xx code
    if (isFastifyError(error) && error.statusCode !== undefined && error.statusCode < 500) {
      const body: ErrorReply = { error: 'VALIDATION_ERROR', detail: error.message };
      return reply.status(error.statusCode).send(body);
    }
    arbiter.logger.error(`http-500 ${request.method} ${request.url}: ${error.message}`);
    const body: ErrorReply = { error: 'INTERNAL_ERROR', detail: 'Internal server error' };
    return reply.status(500).send(body);
  });

  registerAppRoutes(server, arbiter);
  return server;
};
