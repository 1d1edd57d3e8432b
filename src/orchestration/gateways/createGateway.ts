/**
 * Gateway dispatch by agent id. Adding an agent means one more case here.
 */

import type { AgentsConfig } from '../../shared/config/schemas.js';
import type { AgentId } from '../agents.js';
import type { IAgentGateway } from './IAgentGateway.js';
import { GeneralPurposeAgentGateway } from './GeneralPurposeAgentGateway.js';
import { UsersAgentGateway } from './UsersAgentGateway.js';

export type GatewayResolver = (agentId: AgentId) => IAgentGateway;

export function createGateway(agentId: AgentId, config: AgentsConfig): IAgentGateway {
  switch (agentId) {
    case 'GPA':
      return new GeneralPurposeAgentGateway(config.gpa);
    case 'UMS':
      return new UsersAgentGateway(config.ums);
    default: {
      const unknownAgent: never = agentId;
      throw new Error(`Unsupported agent: ${String(unknownAgent)}`);
    }
  }
}

export function gatewayResolver(config: AgentsConfig): GatewayResolver {
  return (agentId) => createGateway(agentId, config);
}
