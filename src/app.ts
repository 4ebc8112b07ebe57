import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import * as Sentry from '@sentry/node';
import legacyOrderRoutes from './routes/legacyOrderRoutes';
import { config } from './config/env';
import { buildCompatSettings } from './config/compat';
import { CompatError } from './services/compat/errors';
import type { CompatSettings } from './services/compat/types';
import { LegacyOrderService } from './services/legacyOrderService';
import { createDefaultOrderSource, type OrderSource } from './services/orderSourceService';

export type BuildAppOptions = {
  orderSource?: OrderSource;
  settings?: CompatSettings;
};

export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      transport:
        config.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
      redact: ['req.headers.authorization', 'req.headers.cookie'],
    },
  });

  // Setup Zod validation
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  const settings = options.settings ?? buildCompatSettings(config);
  const orderSource = options.orderSource ?? createDefaultOrderSource();
  app.decorate('legacyOrders', new LegacyOrderService(orderSource, settings));

  app.register(legacyOrderRoutes, { prefix: '/legacy' });

  // Health Check
  app.get('/health', async () => {
    return { status: 'ok' };
  });

  // Global Error Handler
  // Every error reaches clients in the flat v1 {error, message} shape
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof CompatError) {
      request.log.warn({ code: error.code, url: request.url }, error.message);
      return reply.status(error.statusCode).send({ error: error.code, message: error.message });
    }

    if (error.validation) {
      request.log.warn({ url: request.url, validation: error.validation }, 'Request validation failed');
      return reply.status(400).send({ error: 'VALIDATION_ERROR', message: 'Invalid request data' });
    }

    request.log.error(error);

    Sentry.withScope((scope) => {
      scope.setContext('request', {
        method: request.method,
        url: request.url,
      });
      scope.setTag('error_code', error.code || 'INTERNAL_ERROR');
      scope.setTag('status_code', String(error.statusCode || 500));
      Sentry.captureException(error);
    });

    const statusCode = error.statusCode || 500;
    const code = error.code || 'INTERNAL_ERROR';
    const message = error.message || 'Something went wrong';

    return reply.status(statusCode).send({ error: code, message });
  });

  return app;
}
