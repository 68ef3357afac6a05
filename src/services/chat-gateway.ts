import { GatewayError } from '../errors.js';
import { logger } from '../middleware/logger.js';
import { SamplingSchema } from '../schemas/request.js';
import type { Message, SamplingParams, SizeClass } from '../providers/base.js';
import type { CacheLayer } from './cache-layer.js';
import { classifyComplexity } from './complexity.js';
import type { FallbackOrchestrator } from './fallback.js';
import type { HistoryStore } from './history-store.js';

export const FALLBACK_REPLY = 'Ah! Something went wrong... Please try again!';

export const DEFAULT_SYSTEM_PROMPT =
  'You are a cheerful, warm chat companion. ' +
  'Keep responses concise and natural, around 1-3 sentences.';

export type ChatType = 'private' | 'group' | 'supergroup';

export interface IncomingMessage {
  userId: string;
  chatId: string;
  chatType: ChatType;
  text: string;
  userName?: string;
  /** The message replies to one of the bot's own messages. */
  replyToBot?: boolean;
}

export type ReplySource = 'cache' | 'common_cache' | 'fallback' | (string & {});

export type HandleResult =
  | { status: 'replied'; reply: string; source: ReplySource; sizeClass: SizeClass }
  | { status: 'rate_limited' }
  | { status: 'cooldown' }
  | { status: 'ignored' };

export interface ChatGatewayOptions {
  systemPrompt?: string;
  historyLimit?: number;
  smallTalkMaxTokens?: number;
  cacheCommonResponses?: boolean;
  generationTimeoutMs?: number;
  sampling?: SamplingParams;
  /** Handle without the `@`; a `@handle` mention addresses the bot in groups. */
  botUsername?: string;
  /** Display name; mentioning it anywhere in a group message addresses the bot. */
  botName?: string;
}

const DEFAULT_SAMPLING: SamplingParams = { temperature: 0.8, maxTokens: 150, topP: 0.9 };

/**
 * Handles one inbound chat message: rate limit, group addressing, cooldown,
 * cache lookup, provider chain, cache store. Terminal generation failures become
 * FALLBACK_REPLY; vendor error text never reaches the reply.
 */
export class ChatGateway {
  private readonly systemPrompt: string;
  private readonly historyLimit: number;
  private readonly smallTalkMaxTokens: number;
  private readonly cacheCommonResponses: boolean;
  private readonly generationTimeoutMs?: number;
  private readonly sampling: SamplingParams;
  private readonly mention?: string;
  private readonly botName?: string;

  constructor(
    private readonly orchestrator: FallbackOrchestrator,
    private readonly cache: CacheLayer,
    private readonly history: HistoryStore,
    options: ChatGatewayOptions = {}
  ) {
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.historyLimit = options.historyLimit ?? 6;
    this.smallTalkMaxTokens = options.smallTalkMaxTokens ?? 4;
    this.cacheCommonResponses = options.cacheCommonResponses ?? true;
    this.generationTimeoutMs = options.generationTimeoutMs;
    this.sampling = SamplingSchema.parse(options.sampling ?? DEFAULT_SAMPLING);
    this.mention = options.botUsername ? `@${options.botUsername}` : undefined;
    this.botName = options.botName?.toLowerCase();
  }

  async handleMessage(message: IncomingMessage): Promise<HandleResult> {
    if (!message.text.trim()) {
      return { status: 'ignored' };
    }

    if (!this.cache.rateLimiter.check(message.userId)) {
      return { status: 'rate_limited' };
    }

    const isPrivate = message.chatType === 'private';
    const text = isPrivate ? message.text.trim() : this.addressedText(message);
    if (!text) {
      return { status: 'ignored' };
    }

    if (!isPrivate && !this.cache.cooldown.check(message.chatId)) {
      return { status: 'cooldown' };
    }

    const sizeClass = classifyComplexity(text, { maxSmallTokens: this.smallTalkMaxTokens });
    const useCommon = sizeClass === 'small' && this.cacheCommonResponses;

    if (useCommon) {
      const common = this.cache.common.get(text);
      if (common !== undefined) {
        return { status: 'replied', reply: common, source: 'common_cache', sizeClass };
      }
    }

    const cached = this.cache.responses.get(message.chatId, text);
    if (cached !== undefined) {
      return { status: 'replied', reply: cached, source: 'cache', sizeClass };
    }

    logger.info(
      { chatId: message.chatId, userId: message.userId, sizeClass, preview: text.slice(0, 30) },
      'Generating reply'
    );

    const messages = await this.buildMessages(message.chatId, text, message.userName);

    try {
      const result = await this.orchestrator.generate({
        messages,
        sizeClass,
        sampling: this.sampling,
        signal: this.generationTimeoutMs ? AbortSignal.timeout(this.generationTimeoutMs) : undefined,
      });

      this.cache.responses.put(message.chatId, text, result.content);
      if (useCommon) {
        this.cache.common.put(text, result.content);
      }
      await this.history.append(message.chatId, 'user', text);
      await this.history.append(message.chatId, 'assistant', result.content);

      return { status: 'replied', reply: result.content, source: result.providerName, sizeClass };
    } catch (error) {
      if (!(error instanceof GatewayError)) {
        throw error;
      }
      logger.error({ chatId: message.chatId, code: error.code, error: error.message }, 'Provider fallback failed');
      return { status: 'replied', reply: FALLBACK_REPLY, source: 'fallback', sizeClass };
    }
  }

  /**
   * Text the bot should answer in a group chat, with its `@handle` removed,
   * or undefined when the message is not addressed to the bot.
   */
  private addressedText(message: IncomingMessage): string | undefined {
    const text = message.text.trim();

    if ((this.mention && text.includes(this.mention)) || message.replyToBot) {
      return this.mention ? text.split(this.mention).join('').trim() : text;
    }

    if (this.botName && text.toLowerCase().includes(this.botName)) {
      return text;
    }

    return undefined;
  }

  private async buildMessages(chatId: string, text: string, userName?: string): Promise<Message[]> {
    const history = await this.history.recent(chatId, this.historyLimit);
    const content = userName ? `${text} (User: ${userName})` : text;

    return [
      { role: 'system', content: this.systemPrompt },
      ...history,
      { role: 'user', content },
    ];
  }
}
