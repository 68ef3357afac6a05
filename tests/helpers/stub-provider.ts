import { vi } from 'vitest';
import type { ProviderErrorKind } from '../../src/errors.js';
import type { ProviderRequest, ProviderResult } from '../../src/providers/base.js';

type Behavior = (request: ProviderRequest, call: number) => ProviderResult | Promise<ProviderResult>;

export function stubProvider(name: string, behavior: Behavior) {
  let call = 0;
  return {
    name,
    generate: vi.fn(async (request: ProviderRequest) => behavior(request, ++call)),
  };
}

export function succeed(name: string, content: string): Behavior {
  return (request) => ({ success: true, data: { content, providerName: name, model: request.model } });
}

export function failure(kind: ProviderErrorKind, message: string, statusCode?: number): ProviderResult {
  return { success: false, error: { kind, message, statusCode } };
}

export function fail(kind: ProviderErrorKind, message: string, statusCode?: number): Behavior {
  return () => failure(kind, message, statusCode);
}
