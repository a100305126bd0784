import fastify, { type FastifyInstance } from 'fastify';

import { createLoggerOptions } from './logger';
import { registerHealthRoutes } from './routes/health';
import { describeError } from './errors';
import type { AppContext } from './types';

export interface CreateAppOptions {
  logLevel: string;
}

/** Scrape and probe endpoints; the load itself runs in the scheduler. */
export const createApp = (ctx: AppContext, options: CreateAppOptions): FastifyInstance => {
  const app = fastify({ logger: createLoggerOptions(options.logLevel) });

  registerHealthRoutes(app, ctx);

  app.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, 'Unhandled error');
    reply.status(500).send({ message: describeError(error) });
  });

  return app;
};
