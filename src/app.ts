import Fastify from 'fastify';
import type { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import { loggerOptions, logger } from './utils/logger';
import { NotFoundError, formatErrorResponse } from './utils/errors';
import { HttpMessageSource } from './services/messages';
import type { MessageSource } from './services/messages';
import { createQaService } from './services/qa';

// Import plugins
import envPlugin from './plugins/env';
import corsPlugin from './plugins/cors';
import swaggerPlugin from './plugins/swagger';

// Import routes
import healthRoutes from './routes/health/index';
import askRoutes from './routes/ask/index';

export interface BuildAppOptions {
  /** Replaces the HTTP upstream client, e.g. with an in-process source in tests */
  messageSource?: MessageSource;
  /** Environment values to validate instead of process.env */
  env?: Record<string, unknown>;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({
    logger: loggerOptions,
    trustProxy: true,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    disableRequestLogging: true,
    maxParamLength: 200,
  }).withTypeProvider<TypeBoxTypeProvider>();

  // Register plugins
  await app.register(envPlugin, { data: options.env });
  await app.register(corsPlugin);
  await app.register(swaggerPlugin);

  const helmetPlugin = await import('@fastify/helmet');
  await app.register(helmetPlugin.default, {
    contentSecurityPolicy: false,
  });

  const rateLimitPlugin = await import('@fastify/rate-limit');
  await app.register(rateLimitPlugin.default, {
    max: app.config.RATE_LIMIT_MAX,
    timeWindow: app.config.RATE_LIMIT_TIME_WINDOW,
  });

  const source =
    options.messageSource ??
    new HttpMessageSource({
      url: app.config.MEMBER_MESSAGES_API,
      timeoutMs: app.config.UPSTREAM_TIMEOUT_MS,
    });
  const qaService = createQaService(source, {
    policy: { topK: app.config.QA_TOP_K },
    timeout: app.config.QA_TIMEOUT_MS,
  });

  app.setErrorHandler((error, request, reply) => {
    const response = formatErrorResponse(error, request.url, request.id);
    if (response.error.statusCode >= 500) {
      request.log.error({ err: error }, error.message);
    } else {
      request.log.warn({ err: error }, error.message);
    }
    return reply.status(response.error.statusCode).send(response);
  });

  app.setNotFoundHandler((request, reply) => {
    const response = formatErrorResponse(new NotFoundError('Route not found'), request.url, request.id);
    return reply.status(404).send(response);
  });

  await app.register(healthRoutes, { source });
  await app.register(askRoutes, { qaService });

  app.addHook('onClose', async () => {
    logger.info('Server is shutting down...');
  });

  return app;
}
