import { OpenAICompatibleProvider, type ProviderOptions } from './openai-compatible.js';

export class GroqProvider extends OpenAICompatibleProvider {
  constructor(options: ProviderOptions = {}) {
    super(
      { name: 'groq', baseURL: 'https://api.groq.com/openai/v1', credential: 'GROQ_API_KEY' },
      options,
    );
  }
}
