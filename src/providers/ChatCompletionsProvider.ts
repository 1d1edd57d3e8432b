/**
 * Chat-completions provider for deployment-addressed, OpenAI-compatible
 * endpoints: POST {endpoint}/openai/deployments/{deployment}/chat/completions
 */

import type { ILLMProvider, ChatOptions } from './ILLMProvider.js';
import type { ChatChunk, ChatResponse, LLMMessage } from '../types/index.js';
import type { LLMConfig } from '../shared/config/schemas.js';
import { APIClient } from '../shared/utils/apiClient.js';
import { parseOpenAIStream } from '../shared/utils/streamParsers.js';
import { ProviderError } from '../shared/utils/errors.js';

export const PROVIDER_NAME = 'chat-completions';

export function deploymentPath(deployment: string): string {
  return `/openai/deployments/${encodeURIComponent(deployment)}/chat/completions`;
}

export class ChatCompletionsProvider implements ILLMProvider {
  private apiClient: APIClient;

  constructor(private readonly config: LLMConfig) {
    this.apiClient = new APIClient({
      baseURL: config.endpoint,
      headers: config.apiKey ? { 'Api-Key': config.apiKey } : {},
      timeout: config.timeoutMs,
      name: 'LLM endpoint',
    });
  }

  async chat(messages: LLMMessage[], options: ChatOptions = {}): Promise<ChatResponse> {
    const response = await this.apiClient.post<ChatCompletionResponse>(
      deploymentPath(this.config.deployment),
      this.buildRequestBody(messages, options, false),
      { signal: options.signal, params: this.queryParams() }
    );

    return this.parseResponse(response);
  }

  async *streamChat(messages: LLMMessage[], options: ChatOptions = {}): AsyncGenerator<ChatChunk> {
    const stream = this.apiClient.stream(
      deploymentPath(this.config.deployment),
      this.buildRequestBody(messages, options, true),
      { signal: options.signal, params: this.queryParams() }
    );

    yield* parseOpenAIStream(stream);
  }

  getProviderName(): string {
    return PROVIDER_NAME;
  }

  getModelName(): string {
    return this.config.deployment;
  }

  private queryParams(): Record<string, string> {
    return { 'api-version': this.config.apiVersion };
  }

  private buildRequestBody(
    messages: LLMMessage[],
    options: ChatOptions,
    stream: boolean
  ): Record<string, unknown> {
    return {
      messages: messages.map((msg) => ({ role: msg.role, content: msg.content })),
      ...(this.config.temperature !== undefined && { temperature: this.config.temperature }),
      ...(options.responseFormat && { response_format: options.responseFormat }),
      stream,
    };
  }

  /**
   * Parse chat completion response
   */
  private parseResponse(response: ChatCompletionResponse): ChatResponse {
    const choice = response.choices?.[0];
    const message = choice?.message;

    if (!choice || !message) {
      throw new ProviderError(
        'Invalid response from LLM endpoint: missing choice or message',
        PROVIDER_NAME
      );
    }

    const usage = response.usage;
    return {
      content: message.content ?? '',
      finishReason: mapFinishReason(choice.finish_reason),
      ...(usage && {
        usage: {
          inputTokens: usage.prompt_tokens,
          outputTokens: usage.completion_tokens,
          totalTokens: usage.total_tokens,
        },
      }),
    };
  }
}

function mapFinishReason(reason: string | null | undefined): ChatResponse['finishReason'] {
  switch (reason) {
    case 'tool_calls':
    case 'function_call':
      return 'tool_calls';
    case 'length':
      return 'length';
    case 'content_filter':
      return 'content_filter';
    case 'stop':
    case null:
    case undefined:
      return 'stop';
    default:
      return 'error';
  }
}

/**
 * Chat completion response body
 */
interface ChatCompletionResponse {
  id?: string;
  choices?: Array<{
    index: number;
    message?: {
      role: string;
      content: string | null;
    };
    finish_reason: string | null;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}
