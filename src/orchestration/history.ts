/**
 * Helpers over the request's message history
 */

import type { LLMMessage, Message } from '../types/index.js';
import { toLLMMessage } from '../shared/utils/wireFormat.js';

/**
 * System prompt followed by the plain role/content history
 */
export function prepareLLMMessages(history: readonly Message[], systemPrompt: string): LLMMessage[] {
  return [{ role: 'system', content: systemPrompt }, ...history.map(toLLMMessage)];
}

export function findLastUserIndex(history: readonly Message[]): number {
  for (let i = history.length - 1; i >= 0; i--) {
    if (history[i]?.role === 'user') return i;
  }
  return -1;
}

export function lastUserMessage(history: readonly Message[]): Message | undefined {
  const index = findLastUserIndex(history);
  return index >= 0 ? history[index] : undefined;
}
