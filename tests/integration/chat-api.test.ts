import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { loadConfig } from '../../src/config.js';
import { buildServer } from '../../src/server.js';
import { FALLBACK_REPLY } from '../../src/services/chat-gateway.js';
import { stubProvider, succeed } from '../helpers/stub-provider.js';

describe('Chat API Integration', () => {
  let server: Awaited<ReturnType<typeof buildServer>>;
  const provider = stubProvider('stub', succeed('stub', 'hello from stub'));

  beforeAll(async () => {
    server = await buildServer({
      config: loadConfig({ BACKOFF_MS: '0', RATE_LIMIT_MAX: '2' }),
      providers: [provider],
    });
  });

  afterAll(async () => {
    if (server) {
      await server.close();
    }
  });

  it('returns health check', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'healthy',
      service: 'chat-gateway',
      version: '1.0.0',
      providers: ['stub'],
    });
  });

  it('answers the liveness probe', async () => {
    const response = await server.inject({ method: 'GET', url: '/' });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('alive');
  });

  it('replies to a valid message', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/messages',
      payload: { userId: 'user-1', chatId: 'chat-1', text: 'Can you explain quantum entanglement in detail?' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'replied',
      reply: 'hello from stub',
      source: 'stub',
      sizeClass: 'large',
    });
    expect(response.headers['x-request-id']).toEqual(expect.any(String));
  });

  it('echoes an incoming request id', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/health',
      headers: { 'x-request-id': 'req-123' },
    });

    expect(response.headers['x-request-id']).toBe('req-123');
  });

  it('rejects invalid schema with 400', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/messages',
      payload: { invalid: 'schema' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json<{ error: string }>().error).toBe('Validation error');
  });

  it('rejects malformed JSON with 400', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/messages',
      headers: { 'content-type': 'application/json' },
      payload: 'invalid json{{{',
    });

    expect(response.statusCode).toBe(400);
  });

  it('returns 429 with limit headers once a user is over the limit', async () => {
    const send = (text: string) =>
      server.inject({
        method: 'POST',
        url: '/v1/messages',
        payload: { userId: 'user-limited', chatId: 'chat-limited', text },
      });

    await send('first message that is long enough');
    await send('second message that is long enough');
    const response = await send('third message that is long enough');

    expect(response.statusCode).toBe(429);
    expect(response.json()).toEqual({ status: 'rate_limited' });
    expect(response.headers['x-ratelimit-limit']).toBe('2');
    expect(response.headers['x-ratelimit-remaining']).toBe('0');
    expect(response.headers['retry-after']).toBe('60');
  });

  it('returns 202 while a group chat is cooling down', async () => {
    const send = (userId: string) =>
      server.inject({
        method: 'POST',
        url: '/v1/messages',
        payload: {
          userId,
          chatId: 'group-1',
          chatType: 'group',
          replyToBot: true,
          text: 'what do you all think about pizza toppings',
        },
      });

    await send('member-1');
    const response = await send('member-2');

    expect(response.statusCode).toBe(202);
    expect(response.json()).toEqual({ status: 'cooldown' });
  });

  it('ignores group chatter that does not address the bot', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/messages',
      payload: { userId: 'member-3', chatId: 'group-2', chatType: 'group', text: 'anyone up for lunch today' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ignored' });
  });

  it('serves Prometheus metrics', async () => {
    const response = await server.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toContain('text/plain');
    expect(response.body).toContain('chat_gateway_provider_attempt_duration_seconds');
  });
});

describe('Chat API without providers', () => {
  it('answers with the fixed fallback reply', async () => {
    const server = await buildServer({ config: loadConfig({}), providers: [] });

    const response = await server.inject({
      method: 'POST',
      url: '/v1/messages',
      payload: { userId: 'user-1', chatId: 'chat-1', text: 'Can you explain quantum entanglement in detail?' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ reply: FALLBACK_REPLY, source: 'fallback' });
    await server.close();
  });
});

describe('Chat API unexpected errors', () => {
  it('answers 500 with the request id when a provider throws', async () => {
    const broken = stubProvider('broken', () => {
      throw new Error('socket exploded');
    });
    const server = await buildServer({ config: loadConfig({}), providers: [broken] });

    const response = await server.inject({
      method: 'POST',
      url: '/v1/messages',
      headers: { 'x-request-id': 'req-500' },
      payload: { userId: 'user-1', chatId: 'chat-1', text: 'Can you explain quantum entanglement in detail?' },
    });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: 'Internal server error', requestId: 'req-500' });
    await server.close();
  });
});
