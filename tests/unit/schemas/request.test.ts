import { describe, it, expect } from 'vitest';
import {
  IncomingMessageSchema,
  ReplyResponseSchema,
  SamplingSchema,
} from '../../../src/schemas/request.js';

describe('Request Schemas', () => {
  describe('IncomingMessageSchema', () => {
    it('validates valid messages', () => {
      const result = IncomingMessageSchema.safeParse({
        userId: 'user-1',
        chatId: 'chat-1',
        chatType: 'group',
        text: 'hello',
      });
      expect(result.success).toBe(true);
    });

    it('accepts numeric ids and defaults to a private chat', () => {
      const parsed = IncomingMessageSchema.parse({ userId: 42, chatId: -1001, text: 'hello' });

      expect(parsed).toEqual({ userId: '42', chatId: '-1001', chatType: 'private', text: 'hello', replyToBot: false });
    });

    it('requires ids and text', () => {
      expect(IncomingMessageSchema.safeParse({}).success).toBe(false);
      expect(IncomingMessageSchema.safeParse({ userId: 'u', chatId: 'c', text: '' }).success).toBe(false);
    });

    it('keeps the reply-to-bot flag', () => {
      const parsed = IncomingMessageSchema.parse({ userId: 'u', chatId: 'c', chatType: 'group', text: 'ok', replyToBot: true });

      expect(parsed.replyToBot).toBe(true);
    });

    it('rejects unknown chat types', () => {
      const result = IncomingMessageSchema.safeParse({
        userId: 'u',
        chatId: 'c',
        chatType: 'channel',
        text: 'hello',
      });
      expect(result.success).toBe(false);
    });
  });

  describe('SamplingSchema', () => {
    it('enforces parameter ranges', () => {
      expect(SamplingSchema.safeParse({ temperature: 0.8, maxTokens: 150, topP: 0.9 }).success).toBe(true);
      expect(SamplingSchema.safeParse({ temperature: 2.1, maxTokens: 150, topP: 0.9 }).success).toBe(false);
      expect(SamplingSchema.safeParse({ temperature: 0.8, maxTokens: 0, topP: 0.9 }).success).toBe(false);
      expect(SamplingSchema.safeParse({ temperature: 0.8, maxTokens: 150, topP: 1.5 }).success).toBe(false);
    });
  });

  describe('ReplyResponseSchema', () => {
    it('strips fields it does not know', () => {
      expect(ReplyResponseSchema.parse({ status: 'cooldown', extra: true })).toEqual({ status: 'cooldown' });
    });
  });
});
