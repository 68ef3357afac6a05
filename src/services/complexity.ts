import type { SizeClass } from '../providers/base.js';

const TOKEN_PATTERN = /[\p{L}\p{N}_]+|[^\p{L}\p{N}_\s]/gu;

const SMALL_TALK_PATTERN = new RegExp(
  '^(' +
    [
      'hi',
      'hello',
      'hey',
      'hii',
      'yo',
      'sup',
      'how are you',
      'how r u',
      'good morning',
      'good night',
      'good evening',
      'hola',
      'namaste',
      'hey there',
      'hi there',
      'hlo',
      'wassup',
      'whats up',
      "how's it going",
    ].join('|') +
    ')\\b',
  'i'
);

export interface ComplexityOptions {
  maxSmallTokens?: number;
}

export function countTokens(text: string): number {
  return text.match(TOKEN_PATTERN)?.length ?? 0;
}

/**
 * Route short messages and greetings to the cheap model. Runs before any
 * network access, so it stays synchronous and pure.
 */
export function classifyComplexity(text: string, options: ComplexityOptions = {}): SizeClass {
  if (countTokens(text) <= (options.maxSmallTokens ?? 4)) {
    return 'small';
  }
  return SMALL_TALK_PATTERN.test(text.trim()) ? 'small' : 'large';
}
