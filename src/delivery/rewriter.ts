/**
 * DealRelay — Offer Rewriter
 *
 * Optional step before the post is composed: an LLM restates the offer in
 * the channel's fixed layout. Any failure or empty answer keeps the
 * original text, so a rewrite can never block a publish.
 *
 * Only the post text is sent to the model.
 */

import Anthropic from '@anthropic-ai/sdk';
import { describeError } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'rewriter' });

// ============================================================
// CONFIGURATION
// ============================================================

export const DEFAULT_REWRITE_MODEL = 'claude-3-5-haiku-20241022';
const MAX_TOKENS = 1024;
const TIMEOUT_MS = 30_000;

export const REWRITE_SYSTEM_PROMPT =
  'Ты редактор Telegram-канала со скидками. Пишешь коротко, чисто и по делу.';

export function buildRewritePrompt(text: string): string {
  return [
    'Перепиши объявление для Telegram в едином формате.',
    'Сохрани факты: товар, цены, условия, контакты. Ничего не придумывай.',
    'Верни только текст поста, без пояснений.',
    '',
    'Формат (пропускай строки, для которых нет данных):',
    '- [название товара]',
    '- Цена на МП: [цена без кэшбека]',
    '- Цена с кэшбеком: [цена с кэшбеком]',
    '- Кэшбек: [процент]%',
    '- [условия заказа и ссылка на аккаунт в Telegram]',
    '',
    'Исходный текст:',
    text,
  ].join('\n');
}

// ============================================================
// REWRITER
// ============================================================

/** Returns the model's text answer, or null when it gave none */
export type CompleteFn = (system: string, prompt: string) => Promise<string | null>;

export interface TextRewriter {
  rewrite(text: string): Promise<string>;
}

export class OfferRewriter implements TextRewriter {
  constructor(private readonly complete: CompleteFn) {}

  async rewrite(text: string): Promise<string> {
    if (text.trim().length === 0) return text;

    try {
      const rewritten = (await this.complete(REWRITE_SYSTEM_PROMPT, buildRewritePrompt(text)))?.trim();
      if (!rewritten) {
        log.warn('Rewrite returned no text, keeping the original');
        return text;
      }
      log.debug('Rewrite succeeded', { before: text.length, after: rewritten.length });
      return rewritten;
    } catch (error) {
      log.warn('Rewrite failed, keeping the original', { error: describeError(error) });
      return text;
    }
  }
}

export interface AnthropicRewriterOptions {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
}

export function createAnthropicRewriter(options: AnthropicRewriterOptions): OfferRewriter {
  const client = new Anthropic({
    apiKey: options.apiKey,
    timeout: options.timeoutMs ?? TIMEOUT_MS,
    maxRetries: 1,
  });
  const model = options.model ?? DEFAULT_REWRITE_MODEL;

  return new OfferRewriter(async (system, prompt) => {
    const response = await client.messages.create({
      model,
      max_tokens: MAX_TOKENS,
      temperature: 0.3,
      system,
      messages: [{ role: 'user', content: prompt }],
    });

    const textContent = response.content.find(c => c.type === 'text');
    if (!textContent || textContent.type !== 'text') return null;
    return textContent.text;
  });
}
