import {
  ExhaustedError,
  GenerationAbortedError,
  NoProvidersConfiguredError,
  type ProviderError,
} from '../errors.js';
import { logger } from '../middleware/logger.js';
import { trackFallback, trackProviderAttempt } from '../middleware/metrics.js';
import type { GenerationRequest, GenerationResult, LLMProvider } from '../providers/base.js';
import type { ModelResolver } from './model-resolver.js';

export interface FallbackOptions {
  maxAttempts?: number;
  backoffMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Walks the provider chain in configuration order. The first success wins.
 * Transient failures are retried on the same provider with a fixed backoff;
 * rate limits and permanent failures move straight to the next provider.
 */
export class FallbackOrchestrator {
  private readonly providers: readonly LLMProvider[];
  private readonly resolveModel: ModelResolver;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;

  constructor(providers: readonly LLMProvider[], resolveModel: ModelResolver, options: FallbackOptions = {}) {
    const maxAttempts = options.maxAttempts ?? 2;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }

    this.providers = Object.freeze([...providers]);
    this.resolveModel = resolveModel;
    this.maxAttempts = maxAttempts;
    this.backoffMs = options.backoffMs ?? 1000;
  }

  get providerNames(): string[] {
    return this.providers.map(p => p.name);
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    let lastError: ProviderError | undefined;

    for (const provider of this.providers) {
      const model = this.resolveModel(provider.name, request.sizeClass);

      for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
        if (request.signal?.aborted) {
          throw new GenerationAbortedError(lastError);
        }

        const startedAt = Date.now();
        const result = await provider.generate({
          model,
          messages: request.messages,
          sampling: request.sampling,
          signal: request.signal,
        });
        trackProviderAttempt(
          provider.name,
          model,
          result.success ? 'success' : result.error.kind,
          (Date.now() - startedAt) / 1000
        );

        if (result.success) {
          logger.info({ provider: provider.name, model, attempt }, 'Provider response');
          return result.data;
        }

        lastError = result.error;

        if (result.error.kind === 'rate_limited') {
          logger.warn({ provider: provider.name }, 'Provider rate limited, skipping retries');
          break;
        }

        if (result.error.kind === 'permanent') {
          logger.error(
            { provider: provider.name, statusCode: result.error.statusCode, error: result.error.message },
            'Provider permanent error'
          );
          break;
        }

        logger.warn(
          { provider: provider.name, attempt, maxAttempts: this.maxAttempts, error: result.error.message },
          'Provider transient error'
        );
        if (attempt < this.maxAttempts) {
          await sleep(this.backoffMs);
        }
      }

      trackFallback(provider.name);
      logger.info({ provider: provider.name }, 'Falling back to next provider');
    }

    // Nothing recorded means the chain had no providers to try.
    if (!lastError) {
      logger.error('No providers configured');
      throw new NoProvidersConfiguredError();
    }

    throw new ExhaustedError(lastError);
  }
}
