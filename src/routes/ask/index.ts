import { Type } from '@sinclair/typebox';
import type { FastifyPluginAsyncTypebox } from '@fastify/type-provider-typebox';
import type { QaService } from '@services/qa';
import { ErrorResponseSchema } from '../schemas';

export interface AskRoutesOptions {
  qaService: QaService;
}

const askRoutes: FastifyPluginAsyncTypebox<AskRoutesOptions> = async (fastify, { qaService }) => {
  fastify.get(
    '/ask',
    {
      schema: {
        description: 'Answer a natural-language question about members',
        tags: ['Ask'],
        querystring: Type.Object({
          q: Type.String({ description: 'Natural-language question about members' }),
        }),
        response: {
          200: Type.Object({
            answer: Type.String(),
          }),
          400: ErrorResponseSchema,
          502: ErrorResponseSchema,
          504: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const result = await qaService.ask(request.query.q, { requestId: request.id });

      if (!result.success) {
        throw result.error;
      }

      const { answer, outcome, kind, reasonCodes } = result.data;
      request.log.info(
        { kind, outcome, reasonCodes, durationMs: result.metadata.durationMs },
        'Question answered'
      );

      return reply.send({ answer });
    }
  );
};

export default askRoutes;
