import type { ProviderError } from '../errors.js';

export type Role = 'system' | 'user' | 'assistant';

export interface Message {
  readonly role: Role;
  readonly content: string;
}

export type SizeClass = 'small' | 'large';

export interface SamplingParams {
  temperature: number;
  maxTokens: number;
  topP: number;
}

export interface GenerationRequest {
  messages: readonly Message[];
  sizeClass: SizeClass;
  sampling: SamplingParams;
  signal?: AbortSignal;
}

export interface ProviderRequest {
  model: string;
  messages: readonly Message[];
  sampling: SamplingParams;
  signal?: AbortSignal;
}

export interface GenerationResult {
  content: string;
  providerName: string;
  model: string;
}

export type ProviderResult =
  | { success: true; data: GenerationResult }
  | { success: false; error: ProviderError };

export interface LLMProvider {
  readonly name: string;
  generate(request: ProviderRequest): Promise<ProviderResult>;
}
