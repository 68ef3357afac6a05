import OpenAI from 'openai';

export type ProviderErrorKind = 'rate_limited' | 'transient' | 'permanent';

/**
 * A vendor failure after classification. Providers hand these back as values;
 * the orchestrator decides what to do with each kind.
 */
export interface ProviderError {
  kind: ProviderErrorKind;
  message: string;
  statusCode?: number;
}

// Only consulted when no HTTP response came back.
const NETWORK_PATTERNS = [
  /timed?\s*out/i,
  /timeout/i,
  /ECONNRESET/,
  /ECONNREFUSED/,
  /ETIMEDOUT/,
  /ENOTFOUND/,
  /EAI_AGAIN/,
  /socket hang up/i,
  /fetch failed/i,
  /connection error/i,
  /network/i,
];

export function classifyFailure(statusCode: number | undefined, message: string): ProviderErrorKind {
  if (statusCode === 429 || message.toLowerCase().includes('rate limit')) {
    return 'rate_limited';
  }
  if (statusCode !== undefined && statusCode >= 500) {
    return 'transient';
  }
  if (statusCode === undefined && NETWORK_PATTERNS.some(pattern => pattern.test(message))) {
    return 'transient';
  }
  return 'permanent';
}

export function toProviderError(error: unknown): ProviderError {
  // Covers APIConnectionTimeoutError as well.
  if (error instanceof OpenAI.APIConnectionError) {
    return { kind: 'transient', message: error.message };
  }

  if (error instanceof OpenAI.APIError) {
    const statusCode = typeof error.status === 'number' ? error.status : undefined;
    return { kind: classifyFailure(statusCode, error.message), message: error.message, statusCode };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { kind: classifyFailure(undefined, message), message };
}

export type GatewayErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'NO_PROVIDERS_CONFIGURED'
  | 'PROVIDERS_EXHAUSTED'
  | 'GENERATION_ABORTED';

export abstract class GatewayError extends Error {
  abstract readonly code: GatewayErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Thrown while building a provider; the provider is left out of the chain. */
export class ConfigurationError extends GatewayError {
  readonly code = 'CONFIGURATION_ERROR';
}

export class NoProvidersConfiguredError extends GatewayError {
  readonly code = 'NO_PROVIDERS_CONFIGURED';

  constructor() {
    super('No providers configured');
  }
}

export class ExhaustedError extends GatewayError {
  readonly code = 'PROVIDERS_EXHAUSTED';

  constructor(readonly lastError: ProviderError) {
    super(`All providers failed. Last error (${lastError.kind}): ${lastError.message}`);
  }
}

export class GenerationAbortedError extends GatewayError {
  readonly code = 'GENERATION_ABORTED';

  constructor(readonly lastError?: ProviderError) {
    super('Generation aborted before a provider succeeded');
  }
}
