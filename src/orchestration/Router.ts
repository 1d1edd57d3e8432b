/**
 * Router - asks the coordination model which agent should handle a request
 */

import type { Message } from '../types/index.js';
import type { ILLMProvider } from '../providers/ILLMProvider.js';
import {
  type CoordinationDecision,
  FALLBACK_DECISION,
  coordinationResponseFormat,
  parseCoordinationDecision,
} from './CoordinationDecision.js';
import { COORDINATION_REQUEST_SYSTEM_PROMPT } from './prompts.js';
import { prepareLLMMessages } from './history.js';
import { logger } from '../shared/utils/logger.js';
import { errorMessage, isCancellation } from '../shared/utils/errors.js';

export interface RouterOptions {
  systemPrompt?: string;
}

export class Router {
  private readonly systemPrompt: string;

  constructor(
    private readonly llm: ILLMProvider,
    options: RouterOptions = {}
  ) {
    this.systemPrompt = options.systemPrompt ?? COORDINATION_REQUEST_SYSTEM_PROMPT;
  }

  /**
   * Decide which agent handles the request. Never fails because of what the
   * model answered: unusable replies resolve to the fallback decision.
   */
  async decide(history: readonly Message[], signal?: AbortSignal): Promise<CoordinationDecision> {
    let raw: string;
    try {
      const response = await this.llm.chat(prepareLLMMessages(history, this.systemPrompt), {
        responseFormat: coordinationResponseFormat(),
        signal,
      });
      raw = response.content;
      logger.debug('Coordination response received', {
        finishReason: response.finishReason,
        usage: response.usage ?? null,
      });
    } catch (error) {
      if (isCancellation(error)) throw error;

      logger.warn('Coordination call failed, using fallback agent', {
        error: errorMessage(error),
        fallback: FALLBACK_DECISION.agentId,
      });
      return { ...FALLBACK_DECISION };
    }

    const decision = parseCoordinationDecision(raw);
    if (!decision.ok) {
      logger.warn('Unusable coordination response, using fallback agent', {
        reason: decision.error.reason,
        error: decision.error.message,
        fallback: FALLBACK_DECISION.agentId,
      });
      return { ...FALLBACK_DECISION };
    }

    return decision.value;
  }
}
