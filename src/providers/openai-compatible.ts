import OpenAI, { type ClientOptions } from 'openai';
import { ConfigurationError, toProviderError } from '../errors.js';
import { logger } from '../middleware/logger.js';
import type { LLMProvider, Message, ProviderRequest, ProviderResult } from './base.js';

export type ProviderName = 'groq' | 'cerebras' | 'sambanova';

export interface ProviderOptions {
  apiKey?: string;
  timeoutMs?: number;
  fetch?: ClientOptions['fetch'];
}

interface VendorSpec {
  name: ProviderName;
  baseURL: string;
  credential: string;
}

function toChatMessage(message: Message): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

/**
 * Shared client for vendors that speak the OpenAI chat completions protocol.
 * The SDK's own retries are disabled so every attempt is one the orchestrator
 * counted.
 */
export abstract class OpenAICompatibleProvider implements LLMProvider {
  readonly name: ProviderName;
  private client: OpenAI;

  protected constructor(vendor: VendorSpec, options: ProviderOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError(`Missing ${vendor.credential}`);
    }

    this.name = vendor.name;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: vendor.baseURL,
      maxRetries: 0,
      timeout: options.timeoutMs ?? 30000,
      fetch: options.fetch,
    });
  }

  async generate(request: ProviderRequest): Promise<ProviderResult> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: request.messages.map(toChatMessage),
          temperature: request.sampling.temperature,
          max_tokens: request.sampling.maxTokens,
          top_p: request.sampling.topP,
        },
        { signal: request.signal },
      );

      const content = completion.choices[0]?.message?.content?.trim();
      if (!content) {
        logger.warn({ provider: this.name, model: request.model }, 'Provider returned an empty completion');
        return { success: false, error: { kind: 'permanent', message: 'Empty completion' } };
      }

      return {
        success: true,
        data: {
          content,
          providerName: this.name,
          model: request.model,
        },
      };
    } catch (error) {
      const providerError = toProviderError(error);
      logger.debug(
        { provider: this.name, kind: providerError.kind, statusCode: providerError.statusCode },
        'Provider call failed',
      );
      return { success: false, error: providerError };
    }
  }
}
