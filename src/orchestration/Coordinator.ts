/**
 * Coordinator - top-level state machine for one request:
 *
 *   coordinating -> delegating -> synthesizing -> done
 *                        |              |
 *                        v              v
 *               delegation_failed  synthesis_failed
 *
 * Steps run strictly in sequence; nothing re-enters coordinating.
 */

import type { Message } from '../types/index.js';
import type { ILLMProvider } from '../providers/ILLMProvider.js';
import type { GatewayResolver } from './gateways/createGateway.js';
import type { GatewayResponse } from './gateways/IAgentGateway.js';
import { Choice, closeStageSafely } from './Choice.js';
import { Router } from './Router.js';
import { type CoordinationDecision, describeDecision } from './CoordinationDecision.js';
import { encodeConversationState } from './stateCodec.js';
import { AGENT_LABELS, type AgentId } from './agents.js';
import { FINAL_RESPONSE_SYSTEM_PROMPT, buildSynthesisPrompt } from './prompts.js';
import { findLastUserIndex, prepareLLMMessages } from './history.js';
import { logger } from '../shared/utils/logger.js';
import { RequestCancelledError, errorMessage, isCancellation } from '../shared/utils/errors.js';

export type CoordinationStatus = 'done' | 'delegation_failed' | 'synthesis_failed';

export type CoordinatorPhase = 'idle' | 'coordinating' | 'delegating' | 'synthesizing' | CoordinationStatus;

const TRANSITIONS: Record<CoordinatorPhase, readonly CoordinatorPhase[]> = {
  idle: ['coordinating'],
  coordinating: ['delegating'],
  delegating: ['synthesizing', 'delegation_failed'],
  synthesizing: ['done', 'synthesis_failed'],
  done: [],
  delegation_failed: [],
  synthesis_failed: [],
};

export interface CoordinationResult {
  status: CoordinationStatus;
  decision: CoordinationDecision;
  message: Message;
}

export interface CoordinatorOptions {
  llm: ILLMProvider;
  resolveGateway: GatewayResolver;
  router?: Router;
  synthesisPrompt?: string;
  /** Called on every phase change, e.g. for tracing */
  onTransition?: (from: CoordinatorPhase, to: CoordinatorPhase) => void;
}

export function delegationErrorMessage(agentId: AgentId): string {
  return (
    `Sorry, the ${AGENT_LABELS[agentId]} agent could not process your request right now. ` +
    'Please try again later.'
  );
}

/**
 * Phase bookkeeping for a single request
 */
class CoordinationRun {
  private _phase: CoordinatorPhase = 'idle';

  constructor(private readonly onTransition?: CoordinatorOptions['onTransition']) {}

  get phase(): CoordinatorPhase {
    return this._phase;
  }

  advance(next: CoordinatorPhase): void {
    if (!TRANSITIONS[this._phase].includes(next)) {
      throw new Error(`Illegal coordinator transition: ${this._phase} -> ${next}`);
    }
    const previous = this._phase;
    this._phase = next;
    logger.debug('Coordinator transition', { from: previous, to: next });
    this.onTransition?.(previous, next);
  }
}

export class Coordinator {
  private readonly llm: ILLMProvider;
  private readonly router: Router;
  private readonly resolveGateway: GatewayResolver;
  private readonly synthesisPrompt: string;
  private readonly onTransition?: CoordinatorOptions['onTransition'];

  constructor(options: CoordinatorOptions) {
    this.llm = options.llm;
    this.router = options.router ?? new Router(options.llm);
    this.resolveGateway = options.resolveGateway;
    this.synthesisPrompt = options.synthesisPrompt ?? FINAL_RESPONSE_SYSTEM_PROMPT;
    this.onTransition = options.onTransition;
  }

  /**
   * Route, delegate and synthesize one request into `choice`.
   * Rejects only with RequestCancelledError when the choice's signal aborts.
   */
  async handleRequest(history: readonly Message[], choice: Choice): Promise<CoordinationResult> {
    const run = new CoordinationRun(this.onTransition);
    const signal = choice.abortSignal;

    // Coordination
    run.advance('coordinating');
    const decision = await this.coordinate(history, choice, signal);

    // Delegation
    run.advance('delegating');
    const agentStage = choice.openStage(`${decision.agentId} Agent`);
    let delegated: GatewayResponse;
    try {
      delegated = await this.resolveGateway(decision.agentId).respond({
        history,
        additionalInstructions: decision.additionalInstructions,
        choice,
        stage: agentStage,
        signal,
      });
    } catch (error) {
      closeStageSafely(agentStage);
      this.throwIfCancelled(error, choice);

      logger.error('Delegation failed', {
        agent: decision.agentId,
        error: errorMessage(error),
      });
      run.advance('delegation_failed');
      const content = delegationErrorMessage(decision.agentId);
      choice.appendContent(content);
      const stages = choice.stages;
      return {
        status: 'delegation_failed',
        decision,
        message: {
          role: 'assistant',
          content,
          ...(stages.length > 0 && { customContent: { stages } }),
        },
      };
    }
    closeStageSafely(agentStage);
    choice.setState(encodeConversationState(delegated.state));

    // Synthesis
    run.advance('synthesizing');
    const progress = { streamed: false };
    try {
      await this.synthesize(history, delegated.message, choice, progress, signal);
    } catch (error) {
      this.throwIfCancelled(error, choice);

      logger.warn('Synthesis failed, returning the agent response as is', {
        agent: decision.agentId,
        error: errorMessage(error),
        partial: progress.streamed,
      });
      run.advance('synthesis_failed');
      choice.appendContent(
        progress.streamed ? `\n\n${delegated.message.content}` : delegated.message.content
      );
      return {
        status: 'synthesis_failed',
        decision,
        message: { ...choice.toMessage(), content: delegated.message.content },
      };
    }

    run.advance('done');
    return { status: 'done', decision, message: choice.toMessage() };
  }

  private async coordinate(
    history: readonly Message[],
    choice: Choice,
    signal?: AbortSignal
  ): Promise<CoordinationDecision> {
    const stage = choice.openStage('Coordination');
    try {
      const decision = await this.router.decide(history, signal);
      stage.appendContent(describeDecision(decision));
      logger.info('Routing decision', {
        agent: decision.agentId,
        instructions: decision.additionalInstructions ?? null,
      });
      return decision;
    } finally {
      closeStageSafely(stage);
    }
  }

  /**
   * Stream the final answer straight into the response content
   */
  private async synthesize(
    history: readonly Message[],
    agentMessage: Message,
    choice: Choice,
    progress: { streamed: boolean },
    signal?: AbortSignal
  ): Promise<void> {
    const messages = prepareLLMMessages(history, this.synthesisPrompt);

    // +1 for the system prompt in front of the history
    const lastUser = findLastUserIndex(history);
    const target = lastUser >= 0 ? messages[lastUser + 1] : undefined;
    if (target) {
      target.content = buildSynthesisPrompt(target.content, agentMessage.content);
    }

    for await (const chunk of this.llm.streamChat(messages, { signal })) {
      if (chunk.content) {
        choice.appendContent(chunk.content);
        progress.streamed = true;
      }
    }
  }

  private throwIfCancelled(error: unknown, choice: Choice): void {
    if (isCancellation(error)) throw error;
    if (choice.isCancelled) throw new RequestCancelledError();
  }
}
