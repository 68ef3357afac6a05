import type { FastifyInstance } from 'fastify';
import { IncomingMessageSchema, ReplyResponseSchema } from '../schemas/request.js';
import type { ChatGateway } from '../services/chat-gateway.js';
import type { RateLimiter } from '../services/rate-limiter.js';
import { logger } from '../middleware/logger.js';

export async function messageRoutes(
  fastify: FastifyInstance,
  gateway: ChatGateway,
  rateLimiter: RateLimiter
) {
  fastify.post('/v1/messages', async (request, reply) => {
    const body = IncomingMessageSchema.parse(request.body);

    logger.info({
      requestId: request.id,
      chatId: body.chatId,
      chatType: body.chatType,
    }, 'Inbound message');

    const result = await gateway.handleMessage(body);

    if (result.status === 'rate_limited') {
      const status = rateLimiter.status(body.userId);
      return reply
        .code(429)
        .header('X-RateLimit-Limit', status.limit)
        .header('X-RateLimit-Remaining', status.remaining)
        .header('X-RateLimit-Reset', new Date(status.resetTime).toISOString())
        .header('Retry-After', Math.max(Math.ceil((status.resetTime - Date.now()) / 1000), 1))
        .send(ReplyResponseSchema.parse(result));
    }

    if (result.status === 'cooldown') {
      return reply.code(202).send(ReplyResponseSchema.parse(result));
    }

    return reply.code(200).send(ReplyResponseSchema.parse(result));
  });
}
