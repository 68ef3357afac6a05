import type { SizeClass } from '../providers/base.js';

export type ModelPair = Record<SizeClass, string>;

export interface ModelTable {
  default: ModelPair;
  [provider: string]: ModelPair | undefined;
}

export type ModelResolver = (providerName: string, sizeClass: SizeClass) => string;

export const DEFAULT_MODEL_TABLE: ModelTable = {
  default: { large: 'llama-3.3-70b-versatile', small: 'llama-3.1-8b-instant' },
  groq: { large: 'llama-3.3-70b-versatile', small: 'llama-3.1-8b-instant' },
  cerebras: { large: 'llama-3.3-70b', small: 'llama3.1-8b' },
  sambanova: { large: 'Meta-Llama-3.3-70B-Instruct', small: 'Meta-Llama-3.1-8B-Instruct' },
};

// Providers missing from the table use the default row.
export function createModelResolver(table: ModelTable = DEFAULT_MODEL_TABLE): ModelResolver {
  return (providerName, sizeClass) => (table[providerName] ?? table.default)[sizeClass];
}
