import Fastify from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { loadConfig, type AppConfig } from './config.js';
import { logger } from './middleware/logger.js';
import { metricsMiddleware } from './middleware/metrics.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { buildProviders, type LLMProvider } from './providers/index.js';
import { healthRoutes } from './routes/health.js';
import { messageRoutes } from './routes/messages.js';
import { metricsRoutes } from './routes/metrics.js';
import { CacheLayer } from './services/cache-layer.js';
import { ChatGateway } from './services/chat-gateway.js';
import { FallbackOrchestrator } from './services/fallback.js';
import { InMemoryHistoryStore, type HistoryStore } from './services/history-store.js';
import { createModelResolver } from './services/model-resolver.js';

export interface BuildServerOptions {
  config?: AppConfig;
  providers?: readonly LLMProvider[];
  history?: HistoryStore;
}

async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? loadConfig();

  const server = Fastify({
    logger: false,
    disableRequestLogging: true,
  });

  await server.register(cors);

  server.addHook('onRequest', requestIdMiddleware);
  server.addHook('onRequest', metricsMiddleware);

  const providers = options.providers ?? buildProviders({
    order: config.providerOrder,
    credentials: config.credentials,
    timeoutMs: config.fallback.providerTimeoutMs,
  });

  const orchestrator = new FallbackOrchestrator(providers, createModelResolver(config.models), {
    maxAttempts: config.fallback.maxAttempts,
    backoffMs: config.fallback.backoffMs,
  });

  const cache = new CacheLayer(config.cache);
  server.addHook('onClose', async () => {
    cache.close();
  });

  const gateway = new ChatGateway(
    orchestrator,
    cache,
    options.history ?? new InMemoryHistoryStore(config.chat.maxHistoryStored),
    {
      historyLimit: config.chat.historyLimit,
      smallTalkMaxTokens: config.chat.smallTalkMaxTokens,
      cacheCommonResponses: config.chat.cacheCommonResponses,
      generationTimeoutMs: config.chat.generationTimeoutMs,
      botUsername: config.chat.botUsername,
      botName: config.chat.botName,
    }
  );

  // Must precede the route plugins; encapsulated contexts copy the handler at registration.
  server.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      reply.code(400).send({
        error: 'Validation error',
        details: error.errors,
      });
      return;
    }

    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      reply.code(error.statusCode).send({ error: error.message });
      return;
    }

    logger.error({
      requestId: request.id,
      error: error.message,
      stack: error.stack,
    }, 'Request error');

    reply.code(500).send({
      error: 'Internal server error',
      requestId: request.id,
    });
  });

  await server.register((instance) => healthRoutes(instance, orchestrator.providerNames));
  await server.register(metricsRoutes);
  await server.register((instance) => messageRoutes(instance, gateway, cache.rateLimiter));

  return server;
}

async function main() {
  const config = loadConfig();
  const server = await buildServer({ config });

  logger.info({ port: config.port }, 'Starting server');

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info({ signal }, 'Shutting down');
      server.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ error }, 'Shutdown failed');
          process.exit(1);
        }
      );
    });
  }

  try {
    await server.listen({ port: config.port, host: config.host });
  } catch (err) {
    logger.error({ error: err }, 'Server failed to start');
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    logger.fatal({ error }, 'Startup failed');
    process.exit(1);
  });
}

export { buildServer };
