/**
 * DealRelay — Post Formatting
 */

import type { CanonicalMessage, ScoreResult } from '../types';

export const POST_HEADER_TITLE = '🔥 Интересное предложение';
export const PREVIEW_LENGTH = 250;

export function renderHeader(sourceTitle: string, score: Pick<ScoreResult, 'score' | 'reasons'>): string {
  const reasons = score.reasons.length > 0 ? score.reasons.join(', ') : 'no-reason';
  return [POST_HEADER_TITLE, `Источник: ${sourceTitle}`, `Score: ${score.score} (${reasons})`].join('\n');
}

/**
 * Text post for a message. Without a score the original text goes out as is.
 */
export function composePost(
  message: Pick<CanonicalMessage, 'text'>,
  sourceTitle: string,
  score?: Pick<ScoreResult, 'score' | 'reasons'>
): string {
  if (!score) return message.text.trim();
  return `${renderHeader(sourceTitle, score)}\n\n${message.text}`.trim();
}

export function preview(text: string, length = PREVIEW_LENGTH): string {
  return text.length > length ? `${text.slice(0, length)}…` : text;
}
