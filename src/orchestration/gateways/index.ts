export type { IAgentGateway, GatewayRequest, GatewayResponse } from './IAgentGateway.js';
export { GeneralPurposeAgentGateway } from './GeneralPurposeAgentGateway.js';
export { UsersAgentGateway } from './UsersAgentGateway.js';
export { createGateway, gatewayResolver, type GatewayResolver } from './createGateway.js';
