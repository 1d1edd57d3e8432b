/**
 * Gateway to the general-purpose agent.
 *
 * The agent keeps no conversation of its own: every turn we replay the turns it
 * handled earlier, restoring its native tool history on each of its assistant
 * messages, and stream its reply (text, attachments, nested stages, new state).
 */

import type { Attachment, Message } from '../../types/index.js';
import type { GPAConfig } from '../../shared/config/schemas.js';
import type { GatewayRequest, GatewayResponse, IAgentGateway } from './IAgentGateway.js';
import { APIClient } from '../../shared/utils/apiClient.js';
import { parseChatCompletionStream } from '../../shared/utils/streamParsers.js';
import { toWireMessage, type WireMessage } from '../../shared/utils/wireFormat.js';
import { deploymentPath } from '../../providers/ChatCompletionsProvider.js';
import { gpaState, readMessageState } from '../stateCodec.js';
import { StageTracker } from '../StageTracker.js';
import { findLastUserIndex } from '../history.js';
import { augmentWithInstructions } from '../prompts.js';
import { logger } from '../../shared/utils/logger.js';
import { DelegationError } from '../../shared/utils/errors.js';

export class GeneralPurposeAgentGateway implements IAgentGateway {
  readonly agentId = 'GPA' as const;
  private apiClient: APIClient;

  constructor(private readonly config: GPAConfig) {
    this.apiClient = new APIClient({
      baseURL: config.endpoint,
      headers: config.apiKey ? { 'Api-Key': config.apiKey } : {},
      timeout: config.timeoutMs,
      name: 'General-purpose agent',
    });
  }

  async respond(request: GatewayRequest): Promise<GatewayResponse> {
    const { choice, stage, signal } = request;
    const messages = this.prepareMessages(request.history, request.additionalInstructions);
    const tracker = new StageTracker(choice, stage);

    let content = '';
    let toolHistory: unknown = undefined;
    const attachments: Attachment[] = [];

    try {
      const stream = this.apiClient.stream(
        deploymentPath(this.config.deployment),
        { messages, stream: true },
        { signal, params: { 'api-version': this.config.apiVersion } }
      );

      for await (const delta of parseChatCompletionStream(stream)) {
        if (delta.content) {
          content += delta.content;
          stage.appendContent(delta.content);
        }
        attachments.push(...(delta.attachments ?? []));
        for (const { index, ...stageDelta } of delta.stages ?? []) {
          tracker.update(index, stageDelta);
        }
        if (delta.state !== undefined) {
          toolHistory = delta.state;
        }
      }
    } finally {
      tracker.closeAll();
    }

    // Attachments reach the response only once the stream has completed
    for (const attachment of attachments) {
      choice.addAttachment(attachment);
    }

    const message: Message = {
      role: 'assistant',
      content,
      ...(attachments.length > 0 && { customContent: { attachments } }),
    };

    return { message, state: gpaState(toolHistory) };
  }

  /**
   * Build the outgoing conversation: every earlier turn this agent answered
   * (user message + its assistant message with the tool history restored),
   * then the current user message. Turns answered by other agents are left
   * out entirely.
   */
  prepareMessages(history: readonly Message[], additionalInstructions?: string): WireMessage[] {
    const lastUserIndex = findLastUserIndex(history);
    const current = history[lastUserIndex];
    if (!current) {
      throw new DelegationError('No user message to delegate', this.agentId);
    }

    const turns: WireMessage[][] = [];
    for (let i = 0; i < lastUserIndex; i++) {
      const message = history[i];
      if (!message || message.role !== 'assistant') continue;

      const decoded = readMessageState(message);
      if (!decoded) continue;
      if (!decoded.ok) {
        logger.debug('Skipping assistant message with unrecognized state', {
          index: i,
          reason: decoded.error.reason,
        });
        continue;
      }
      if (decoded.value.agent !== 'GPA') continue;

      const turn: WireMessage[] = [];
      const previous = history[i - 1];
      if (previous?.role === 'user') {
        turn.push(toWireMessage(previous));
      }
      turn.push(toWireMessage(message, decoded.value.toolHistory));
      turns.push(turn);
    }

    const maxTurns = this.config.maxRestoredTurns;
    const restored = maxTurns !== undefined && turns.length > maxTurns ? turns.slice(-maxTurns) : turns;

    return [
      ...restored.flat(),
      toWireMessage({
        ...current,
        content: augmentWithInstructions(current.content, additionalInstructions),
      }),
    ];
  }
}
