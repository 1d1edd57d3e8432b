/**
 * Core type definitions for the switchboard
 */

export type Role = 'system' | 'user' | 'assistant';

/**
 * File or link attached to a message or a stage.
 * Only one of `inlineData` / `url` is expected to carry the payload.
 */
export interface Attachment {
  mimeType?: string;
  title?: string;
  inlineData?: string;
  url?: string;
}

export type StageStatus = 'open' | 'completed';

/**
 * Partial update of a progress stage. The full stage is the fold of every
 * delta sharing the same index; `content` is appended, never replaced.
 */
export interface StageDelta {
  index: number;
  name?: string;
  status?: StageStatus;
  content?: string;
  attachments?: Attachment[];
}

export interface CustomContent {
  attachments?: Attachment[];
  state?: unknown;
  stages?: StageDelta[];
}

// Message types
export interface Message {
  role: Role;
  content: string;
  customContent?: CustomContent;
}

export interface ChatRequest {
  messages: Message[];
  stream?: boolean;
}

// Outbound stream items, emitted in the order they were produced
export type ChoiceDelta =
  | { type: 'content'; content: string }
  | { type: 'attachment'; attachment: Attachment }
  | { type: 'stage'; stage: StageDelta }
  | { type: 'state'; state: unknown };

// LLM types
export interface LLMMessage {
  role: Role;
  content: string;
}

export interface ChatResponse {
  content: string;
  finishReason: 'stop' | 'tool_calls' | 'length' | 'content_filter' | 'error';
  usage?: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
}

export interface ChatChunk {
  content: string;
  done: boolean;
}

/**
 * One parsed chunk of a chat-completion stream, including the custom content
 * agents attach to their deltas.
 */
export interface CompletionDelta {
  content?: string;
  attachments?: Attachment[];
  stages?: StageDelta[];
  state?: unknown;
  done: boolean;
}

// Result type for error handling
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

// Utility type helpers
export const createOk = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const createErr = <E = Error>(error: E): Result<never, E> => ({ ok: false, error });
