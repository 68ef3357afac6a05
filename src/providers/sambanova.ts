import { OpenAICompatibleProvider, type ProviderOptions } from './openai-compatible.js';

export class SambaNovaProvider extends OpenAICompatibleProvider {
  constructor(options: ProviderOptions = {}) {
    super(
      { name: 'sambanova', baseURL: 'https://api.sambanova.ai/v1', credential: 'SAMBANOVA_API_KEY' },
      options,
    );
  }
}
