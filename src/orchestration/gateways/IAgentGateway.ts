/**
 * Gateway contract shared by every agent the coordinator delegates to
 */

import type { Message } from '../../types/index.js';
import type { Choice, Stage } from '../Choice.js';
import type { ConversationState } from '../stateCodec.js';
import type { AgentId } from '../agents.js';

export interface GatewayRequest {
  /** Full conversation, current user message last */
  history: readonly Message[];
  additionalInstructions?: string;
  /** Response being built; receives attachments and mirrored stages */
  choice: Choice;
  /** Stage opened for this delegation; receives the agent's text as it streams */
  stage: Stage;
  signal?: AbortSignal;
}

export interface GatewayResponse {
  message: Message;
  /** State to persist so the next turn can resume this agent's conversation */
  state: ConversationState;
}

export interface IAgentGateway {
  readonly agentId: AgentId;

  respond(request: GatewayRequest): Promise<GatewayResponse>;
}
