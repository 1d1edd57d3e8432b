/**
 * MockAgentGateway - scripted IAgentGateway for coordinator tests
 */

import type {
  GatewayRequest,
  GatewayResponse,
  IAgentGateway,
} from '../../src/orchestration/gateways/IAgentGateway.js';
import type { AgentId } from '../../src/orchestration/agents.js';
import type { ConversationState } from '../../src/orchestration/stateCodec.js';
import type { Attachment, Message } from '../../src/types/index.js';

export interface MockAgentScript {
  chunks?: string[];
  attachments?: Attachment[];
  state?: ConversationState;
  /** Thrown after the chunks were streamed */
  error?: Error;
}

export class MockAgentGateway implements IAgentGateway {
  readonly requests: GatewayRequest[] = [];

  constructor(
    readonly agentId: AgentId,
    private readonly script: MockAgentScript = {}
  ) {}

  async respond(request: GatewayRequest): Promise<GatewayResponse> {
    this.requests.push(request);

    const chunks = this.script.chunks ?? [];
    for (const chunk of chunks) {
      request.stage.appendContent(chunk);
    }
    for (const attachment of this.script.attachments ?? []) {
      request.choice.addAttachment(attachment);
    }
    if (this.script.error) {
      throw this.script.error;
    }

    const message: Message = { role: 'assistant', content: chunks.join('') };
    const state: ConversationState =
      this.script.state ??
      (this.agentId === 'GPA'
        ? { agent: 'GPA', toolHistory: [] }
        : { agent: 'UMS', conversationId: 'c-1' });
    return { message, state };
  }
}
