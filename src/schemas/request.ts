import { z } from 'zod';

export const SamplingSchema = z.object({
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().positive(),
  topP: z.number().min(0).max(1),
});

const IdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

export const IncomingMessageSchema = z.object({
  userId: IdSchema,
  chatId: IdSchema,
  chatType: z.enum(['private', 'group', 'supergroup']).default('private'),
  text: z.string().min(1).max(4096),
  userName: z.string().max(128).optional(),
  replyToBot: z.boolean().default(false),
});

export const ReplyResponseSchema = z.object({
  status: z.enum(['replied', 'rate_limited', 'cooldown', 'ignored']),
  reply: z.string().optional(),
  source: z.string().optional(),
  sizeClass: z.enum(['small', 'large']).optional(),
});
