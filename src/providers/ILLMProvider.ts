/**
 * LLM Provider abstraction interface
 * The router and the synthesis step talk to the model only through this
 */

import type { ChatChunk, ChatResponse, LLMMessage } from '../types/index.js';

/**
 * Structured-output constraint sent with a chat request
 */
export interface ResponseFormat {
  type: 'json_schema';
  json_schema: {
    name: string;
    schema: object;
    strict?: boolean;
  };
}

export interface ChatOptions {
  responseFormat?: ResponseFormat;
  signal?: AbortSignal;
}

export interface ILLMProvider {
  /**
   * Send chat completion request
   */
  chat(messages: LLMMessage[], options?: ChatOptions): Promise<ChatResponse>;

  /**
   * Stream chat completion response
   */
  streamChat(messages: LLMMessage[], options?: ChatOptions): AsyncGenerator<ChatChunk>;

  /**
   * Get provider name
   */
  getProviderName(): string;

  /**
   * Get model (deployment) name
   */
  getModelName(): string;
}
