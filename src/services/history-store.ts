import type { Message, Role } from '../providers/base.js';

export interface HistoryStore {
  recent(chatId: string, limit: number): Promise<Message[]>;
  append(chatId: string, role: Role, content: string): Promise<void>;
}

/** Keeps the last `maxStored` turns per chat, oldest first. */
export class InMemoryHistoryStore implements HistoryStore {
  private turns = new Map<string, Message[]>();
  private maxStored: number;

  constructor(maxStored: number = 20) {
    this.maxStored = maxStored;
  }

  async recent(chatId: string, limit: number): Promise<Message[]> {
    if (limit <= 0) return [];
    return (this.turns.get(chatId) ?? []).slice(-limit);
  }

  async append(chatId: string, role: Role, content: string): Promise<void> {
    const turns = this.turns.get(chatId) ?? [];
    turns.push(Object.freeze({ role, content }));
    this.turns.set(chatId, turns.slice(-this.maxStored));
  }
}
