import fp from 'fastify-plugin';
import fastifyEnv from '@fastify/env';
import { Type } from '@sinclair/typebox';
import type { Static } from '@sinclair/typebox';

const envSchema = Type.Object({
  NODE_ENV: Type.String({ default: 'development' }),
  PORT: Type.Number({ default: 3000 }),
  HOST: Type.String({ default: '0.0.0.0' }),
  LOG_LEVEL: Type.String({ default: 'info' }),

  // Rate Limiting
  RATE_LIMIT_MAX: Type.Number({ default: 100 }),
  RATE_LIMIT_TIME_WINDOW: Type.Number({ default: 60000 }),

  // CORS
  CORS_ORIGIN: Type.String({ default: 'http://localhost:3001,http://localhost:3000' }),
  CORS_CREDENTIALS: Type.Boolean({ default: true }),

  // Swagger
  SWAGGER_ENABLED: Type.Boolean({ default: true }),
  SWAGGER_PATH: Type.String({ default: '/documentation' }),

  // Upstream message source
  MEMBER_MESSAGES_API: Type.String({
    default: 'https://november7-730026606190.europe-west1.run.app/messages',
  }),
  UPSTREAM_TIMEOUT_MS: Type.Number({ default: 20000 }),

  // Question answering
  QA_TOP_K: Type.Integer({ default: 5, minimum: 1 }),
  QA_TIMEOUT_MS: Type.Number({ default: 30000 }),
});

export type Env = Static<typeof envSchema>;

declare module 'fastify' {
  interface FastifyInstance {
    config: Env;
  }
}

export interface EnvPluginOptions {
  /** Values to validate instead of process.env */
  data?: Record<string, unknown>;
}

export default fp<EnvPluginOptions>(
  async function envPlugin(fastify, options) {
    await fastify.register(fastifyEnv, {
      confKey: 'config',
      schema: envSchema,
      dotenv: options.data === undefined,
      data: options.data ?? process.env,
    });
  },
  {
    name: 'env',
  }
);
