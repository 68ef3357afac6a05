/**
 * Prometheus metrics for the HTTP surface, the provider chain and the
 * cache layer.
 */

import client from 'prom-client';
import type { FastifyRequest, FastifyReply, HookHandlerDoneFunction } from 'fastify';

const register = new client.Registry();

client.collectDefaultMetrics({ register });

const httpRequestDuration = new client.Histogram({
  name: 'chat_gateway_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.3, 0.5, 1, 2, 5, 10],
  registers: [register],
});

const httpRequestTotal = new client.Counter({
  name: 'chat_gateway_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [register],
});

const providerAttemptDuration = new client.Histogram({
  name: 'chat_gateway_provider_attempt_duration_seconds',
  help: 'Duration of single provider attempts in seconds',
  labelNames: ['provider', 'model', 'outcome'],
  buckets: [0.25, 0.5, 1, 2, 5, 10, 20, 30],
  registers: [register],
});

const providerFallbacks = new client.Counter({
  name: 'chat_gateway_provider_fallbacks_total',
  help: 'Times the chain moved past a provider',
  labelNames: ['provider'],
  registers: [register],
});

const cacheHits = new client.Counter({
  name: 'chat_gateway_cache_hits_total',
  help: 'Total number of cache hits',
  labelNames: ['namespace'],
  registers: [register],
});

const cacheMisses = new client.Counter({
  name: 'chat_gateway_cache_misses_total',
  help: 'Total number of cache misses',
  labelNames: ['namespace'],
  registers: [register],
});

const cacheEvictions = new client.Counter({
  name: 'chat_gateway_cache_evictions_total',
  help: 'Entries removed by the janitor sweep',
  labelNames: ['namespace'],
  registers: [register],
});

const rateLimitExceeded = new client.Counter({
  name: 'chat_gateway_rate_limit_exceeded_total',
  help: 'Total number of per-user rate limit rejections',
  registers: [register],
});

const cooldownRejected = new client.Counter({
  name: 'chat_gateway_cooldown_rejections_total',
  help: 'Total number of per-chat cooldown rejections',
  registers: [register],
});

/**
 * Metrics middleware for Fastify.
 */
export function metricsMiddleware(
  request: FastifyRequest,
  reply: FastifyReply,
  done: HookHandlerDoneFunction
): void {
  const startTime = Date.now();

  reply.raw.on('finish', () => {
    const duration = (Date.now() - startTime) / 1000;
    const route = request.routeOptions?.url || request.url;
    const labels = {
      method: request.method,
      route,
      status_code: reply.statusCode.toString(),
    };

    httpRequestDuration.observe(labels, duration);
    httpRequestTotal.inc(labels);
  });

  done();
}

/**
 * Track the latency and outcome of one provider attempt.
 */
export function trackProviderAttempt(
  provider: string,
  model: string,
  outcome: string,
  durationSeconds: number
): void {
  providerAttemptDuration.observe({ provider, model, outcome }, durationSeconds);
}

/**
 * Track the chain moving past a provider.
 */
export function trackFallback(provider: string): void {
  providerFallbacks.inc({ provider });
}

/**
 * Track cache hit.
 */
export function trackCacheHit(namespace: string): void {
  cacheHits.inc({ namespace });
}

/**
 * Track cache miss.
 */
export function trackCacheMiss(namespace: string): void {
  cacheMisses.inc({ namespace });
}

/**
 * Track entries removed by a sweep.
 */
export function trackEvictions(namespace: string, count: number): void {
  if (count > 0) {
    cacheEvictions.inc({ namespace }, count);
  }
}

/**
 * Track rate limit exceeded.
 */
export function trackRateLimitExceeded(): void {
  rateLimitExceeded.inc();
}

/**
 * Track a message rejected by the chat cooldown.
 */
export function trackCooldownRejected(): void {
  cooldownRejected.inc();
}

/**
 * Get metrics in Prometheus format.
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get metrics content type.
 */
export function getContentType(): string {
  return register.contentType;
}

export { register };
