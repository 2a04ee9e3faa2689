import { Type } from '@sinclair/typebox';
import type { FastifyPluginAsyncTypebox } from '@fastify/type-provider-typebox';
import type { MessageSource } from '@services/messages';
import { toError } from '@utils/errors';

export interface HealthRoutesOptions {
  source: MessageSource;
}

const healthRoutes: FastifyPluginAsyncTypebox<HealthRoutesOptions> = async (fastify, { source }) => {
  fastify.get(
    '/health',
    {
      schema: {
        description: 'Health check endpoint',
        tags: ['Health'],
        response: {
          200: Type.Object({
            status: Type.Literal('ok'),
          }),
        },
      },
    },
    async (_request, reply) => {
      return reply.send({ status: 'ok' });
    }
  );

  // Readiness check endpoint
  fastify.get(
    '/ready',
    {
      schema: {
        description: 'Readiness check endpoint - loads the upstream message collection',
        tags: ['Health'],
        response: {
          200: Type.Object({
            status: Type.Literal('ready'),
            upstream: Type.Literal(true),
            messageCount: Type.Number(),
            timestamp: Type.String(),
          }),
          503: Type.Object({
            status: Type.Literal('not_ready'),
            upstream: Type.Literal(false),
            upstreamError: Type.String(),
            timestamp: Type.String(),
          }),
        },
      },
    },
    async (_request, reply) => {
      try {
        const messages = await source.fetchMessages();
        return reply.send({
          status: 'ready',
          upstream: true,
          messageCount: messages.length,
          timestamp: new Date().toISOString(),
        });
      } catch (err) {
        const error = toError(err);
        fastify.log.error({ err: error }, 'Upstream readiness check failed');
        return reply.status(503).send({
          status: 'not_ready',
          upstream: false,
          upstreamError: error.message,
          timestamp: new Date().toISOString(),
        });
      }
    }
  );
};

export default healthRoutes;
