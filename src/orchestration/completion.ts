/**
 * Entry points for hosts: build a coordinator from config and run one
 * chat-completion request through it.
 */

import type { ChatRequest, ChoiceDelta } from '../types/index.js';
import type { Config } from '../shared/config/schemas.js';
import { ChatCompletionsProvider } from '../providers/ChatCompletionsProvider.js';
import { logger } from '../shared/utils/logger.js';
import { Choice } from './Choice.js';
import { Coordinator, type CoordinationResult } from './Coordinator.js';
import { Router } from './Router.js';
import { gatewayResolver } from './gateways/createGateway.js';

export interface CompleteOptions {
  /** Receives every delta in order; only called for streaming requests */
  onDelta?: (delta: ChoiceDelta) => void;
  signal?: AbortSignal;
}

/** `message` is the aggregated assistant message for streaming and non-streaming requests alike */
export type CompletionResult = CoordinationResult;

export function createCoordinator(config: Config): Coordinator {
  logger.configure(config.logging);

  const llm = new ChatCompletionsProvider(config.llm);
  return new Coordinator({
    llm,
    router: new Router(llm),
    resolveGateway: gatewayResolver(config.agents),
  });
}

export async function complete(
  coordinator: Coordinator,
  request: ChatRequest,
  options: CompleteOptions = {}
): Promise<CompletionResult> {
  const choice = new Choice({
    sink: request.stream ? options.onDelta : undefined,
    signal: options.signal,
  });

  return coordinator.handleRequest(request.messages, choice);
}
