import type { FastifyInstance } from 'fastify';

export const SERVICE_NAME = 'chat-gateway';
export const SERVICE_VERSION = '1.0.0';

export async function healthRoutes(app: FastifyInstance, providerNames: string[]): Promise<void> {
  app.get('/', async (_request, reply) => {
    return reply.type('text/plain').send('alive');
  });

  app.get('/health', async () => ({
    status: 'healthy',
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    providers: providerNames,
  }));
}
