import { ConfigurationError } from '../errors.js';
import { logger } from '../middleware/logger.js';
import type { LLMProvider } from './base.js';
import { CerebrasProvider } from './cerebras.js';
import { GroqProvider } from './groq.js';
import { OpenAICompatibleProvider, type ProviderName, type ProviderOptions } from './openai-compatible.js';
import { SambaNovaProvider } from './sambanova.js';

export { GroqProvider, CerebrasProvider, SambaNovaProvider, OpenAICompatibleProvider };
export type { ProviderName, ProviderOptions };
export type {
  LLMProvider,
  Message,
  Role,
  SizeClass,
  SamplingParams,
  GenerationRequest,
  GenerationResult,
  ProviderRequest,
  ProviderResult,
} from './base.js';

const factories: Record<ProviderName, (options: ProviderOptions) => LLMProvider> = {
  groq: options => new GroqProvider(options),
  cerebras: options => new CerebrasProvider(options),
  sambanova: options => new SambaNovaProvider(options),
};

function isProviderName(name: string): name is ProviderName {
  return Object.hasOwn(factories, name);
}

export interface BuildProvidersOptions {
  order: readonly string[];
  credentials: Partial<Record<ProviderName, string>>;
  timeoutMs?: number;
}

/**
 * Instantiate providers in priority order. Unknown names and providers
 * without credentials are left out; the result is frozen.
 */
export function buildProviders(options: BuildProvidersOptions): readonly LLMProvider[] {
  const providers: LLMProvider[] = [];

  for (const name of options.order) {
    if (!isProviderName(name)) {
      logger.warn({ provider: name }, 'Skipping unknown provider');
      continue;
    }

    try {
      providers.push(factories[name]({ apiKey: options.credentials[name], timeoutMs: options.timeoutMs }));
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      logger.warn({ provider: name, error: error.message }, 'Skipping provider');
    }
  }

  logger.info({ providers: providers.map(p => p.name) }, 'Provider chain ready');
  return Object.freeze(providers);
}
