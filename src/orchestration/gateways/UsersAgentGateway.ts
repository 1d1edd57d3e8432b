/**
 * Gateway to the users management service agent.
 *
 * The agent keeps its own conversation, so we only store its conversation id:
 * reuse the newest one found in history, or create a conversation once.
 */

import type { Message } from '../../types/index.js';
import type { UMSConfig } from '../../shared/config/schemas.js';
import type { GatewayRequest, GatewayResponse, IAgentGateway } from './IAgentGateway.js';
import { APIClient } from '../../shared/utils/apiClient.js';
import { parseChatCompletionStream } from '../../shared/utils/streamParsers.js';
import { readMessageState, umsState } from '../stateCodec.js';
import { lastUserMessage } from '../history.js';
import { augmentWithInstructions } from '../prompts.js';
import { logger } from '../../shared/utils/logger.js';
import { DelegationError, ProviderError } from '../../shared/utils/errors.js';

interface CreateConversationResponse {
  id?: unknown;
}

export class UsersAgentGateway implements IAgentGateway {
  readonly agentId = 'UMS' as const;
  private apiClient: APIClient;

  constructor(config: UMSConfig) {
    this.apiClient = new APIClient({
      baseURL: config.endpoint,
      timeout: config.timeoutMs,
      name: 'Users management agent',
    });
  }

  async respond(request: GatewayRequest): Promise<GatewayResponse> {
    const { stage, signal } = request;

    const userMessage = lastUserMessage(request.history);
    if (!userMessage) {
      throw new DelegationError('No user message to delegate', this.agentId);
    }

    let conversationId = this.findConversationId(request.history);
    if (conversationId === null) {
      conversationId = await this.createConversation(signal);
      logger.info('Created users agent conversation', { conversationId });
    }

    const stream = this.apiClient.stream(
      `/conversations/${encodeURIComponent(conversationId)}/chat`,
      {
        message: {
          role: 'user',
          content: augmentWithInstructions(userMessage.content, request.additionalInstructions),
        },
        stream: true,
      },
      { signal }
    );

    // This agent reports no nested stages; its text goes to the delegation stage
    let content = '';
    for await (const delta of parseChatCompletionStream(stream)) {
      if (delta.content) {
        content += delta.content;
        stage.appendContent(delta.content);
      }
    }

    const message: Message = { role: 'assistant', content };
    return { message, state: umsState(conversationId) };
  }

  /**
   * Newest conversation id stored by this agent, scanning history backwards
   */
  findConversationId(history: readonly Message[]): string | null {
    for (let i = history.length - 1; i >= 0; i--) {
      const message = history[i];
      if (!message || message.role !== 'assistant') continue;

      const decoded = readMessageState(message);
      if (decoded?.ok && decoded.value.agent === 'UMS') {
        return decoded.value.conversationId;
      }
    }
    return null;
  }

  private async createConversation(signal?: AbortSignal): Promise<string> {
    const data = await this.apiClient.post<CreateConversationResponse>(
      '/conversations',
      {},
      { signal }
    );

    const id = data?.id;
    if (typeof id !== 'string' || !id) {
      throw new ProviderError(
        'Users management agent returned no conversation id',
        this.apiClient.name
      );
    }
    return id;
  }
}
