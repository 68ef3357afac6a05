import { OpenAICompatibleProvider, type ProviderOptions } from './openai-compatible.js';

export class CerebrasProvider extends OpenAICompatibleProvider {
  constructor(options: ProviderOptions = {}) {
    super(
      { name: 'cerebras', baseURL: 'https://api.cerebras.ai/v1', credential: 'CEREBRAS_API_KEY' },
      options,
    );
  }
}
