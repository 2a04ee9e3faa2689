import fp from 'fastify-plugin';
import fastifyCors from '@fastify/cors';
import type { FastifyPluginAsync } from 'fastify';

const corsPlugin: FastifyPluginAsync = async (fastify) => {
  const origins = fastify.config.CORS_ORIGIN.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  await fastify.register(fastifyCors, {
    origin: origins,
    credentials: fastify.config.CORS_CREDENTIALS,
    methods: ['GET', 'OPTIONS'],
  });
};

export default fp(corsPlugin, {
  name: 'cors',
  dependencies: ['env'],
});
