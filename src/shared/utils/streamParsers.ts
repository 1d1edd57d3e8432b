/**
 * Server-Sent Events (SSE) stream parsers
 * Handles the OpenAI-style chat-completion stream used by the LLM endpoint and
 * both agents
 */

import type { ChatChunk, CompletionDelta } from '../../types/index.js';
import {
  WireStreamChunkSchema,
  parseWireAttachments,
  parseWireStages,
} from './wireFormat.js';

/**
 * Result type for processing an SSE data line
 */
type SSELineResult = { kind: 'payload'; payload: unknown } | { kind: 'done' } | { kind: 'skip' };

/**
 * Process a single SSE line.
 * `data: ` prefixes are optional: some agents write bare JSON lines.
 */
function processSSELine(line: string): SSELineResult {
  const trimmed = line.trim();

  // Blank separators, comments and non-data fields (event:, id:, retry:)
  if (!trimmed || trimmed.startsWith(':') || /^(event|id|retry):/.test(trimmed)) {
    return { kind: 'skip' };
  }

  const data = trimmed.startsWith('data:') ? trimmed.substring(5).trim() : trimmed;

  if (data === '[DONE]') {
    return { kind: 'done' };
  }

  try {
    return { kind: 'payload', payload: JSON.parse(data) };
  } catch {
    // Skip malformed JSON and plain-text metadata lines
    return { kind: 'skip' };
  }
}

/**
 * Parse an SSE stream into its JSON payloads.
 * Stops at `[DONE]`; a trailing unterminated line is still processed.
 *
 * Format:
 * data: {"choices":[{"delta":{"content":"hello"}}]}
 * data: [DONE]
 */
export async function* parseSSEPayloads(stream: AsyncIterable<string>): AsyncGenerator<unknown> {
  let buffer = '';

  for await (const chunk of stream) {
    buffer += chunk;

    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';

    for (const line of lines) {
      const result = processSSELine(line);
      if (result.kind === 'done') return;
      if (result.kind === 'payload') yield result.payload;
    }
  }

  const result = processSSELine(buffer);
  if (result.kind === 'payload') {
    yield result.payload;
  }
}

/**
 * Convert one JSON payload into a completion delta.
 * Returns null for payloads that carry nothing (role-only deltas,
 * `conversation_id` metadata, unknown shapes).
 */
export function toCompletionDelta(payload: unknown): CompletionDelta | null {
  const parsed = WireStreamChunkSchema.safeParse(payload);
  if (!parsed.success) return null;

  const choice = parsed.data.choices?.[0];
  if (!choice) return null;

  const delta: CompletionDelta = { done: Boolean(choice.finish_reason) };

  const content = choice.delta?.content;
  if (content) delta.content = content;

  const custom = choice.delta?.custom_content;
  if (custom) {
    const attachments = parseWireAttachments(custom.attachments);
    if (attachments.length > 0) delta.attachments = attachments;

    const stages = parseWireStages(custom.stages);
    if (stages.length > 0) delta.stages = stages;

    if (custom.state !== undefined && custom.state !== null) delta.state = custom.state;
  }

  const hasPayload =
    delta.content !== undefined ||
    delta.attachments !== undefined ||
    delta.stages !== undefined ||
    delta.state !== undefined;

  return hasPayload || delta.done ? delta : null;
}

/**
 * Parse an OpenAI-style chat-completion stream including custom content
 * (attachments, stages, state). Reads until `[DONE]` or the end of the
 * stream: agents may send their state after the chunk carrying the finish
 * reason.
 */
export async function* parseChatCompletionStream(
  stream: AsyncIterable<string>
): AsyncGenerator<CompletionDelta> {
  for await (const payload of parseSSEPayloads(stream)) {
    const delta = toCompletionDelta(payload);
    if (delta) yield delta;
  }
}

/**
 * Plain-text view of a chat-completion stream
 */
export async function* parseOpenAIStream(stream: AsyncIterable<string>): AsyncGenerator<ChatChunk> {
  for await (const delta of parseChatCompletionStream(stream)) {
    if (delta.content || delta.done) {
      yield { content: delta.content ?? '', done: delta.done };
    }
  }
}
