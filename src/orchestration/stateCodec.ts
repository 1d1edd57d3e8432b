/**
 * Conversation state codec.
 *
 * Each agent keeps its continuation token in the `state` of the assistant
 * messages it produced. The stored object is a tagged union, so a state written
 * for one agent is never mistaken for the other's.
 */

import { z } from 'zod';
import type { Message, Result } from '../types/index.js';
import { createErr, createOk } from '../types/index.js';
import { StateDecodeError } from '../shared/utils/errors.js';

const GPAStateSchema = z.object({
  agent: z.literal('GPA'),
  toolHistory: z.unknown(),
});

const UMSStateSchema = z.object({
  agent: z.literal('UMS'),
  conversationId: z.string().min(1),
});

export const ConversationStateSchema = z.discriminatedUnion('agent', [
  GPAStateSchema,
  UMSStateSchema,
]);

// Written by earlier releases, before states were tagged
const LegacyUMSStateSchema = z.object({
  ums_conversation_id: z.string().min(1),
});

export type GPAState = { agent: 'GPA'; toolHistory: unknown };
export type UMSState = z.infer<typeof UMSStateSchema>;
export type ConversationState = GPAState | UMSState;

export function gpaState(toolHistory: unknown): GPAState {
  return { agent: 'GPA', toolHistory };
}

export function umsState(conversationId: string): UMSState {
  return { agent: 'UMS', conversationId };
}

/**
 * Serialize for the response's `state` field
 */
export function encodeConversationState(state: ConversationState): Record<string, unknown> {
  return state.agent === 'GPA'
    ? { agent: 'GPA', toolHistory: state.toolHistory }
    : { agent: 'UMS', conversationId: state.conversationId };
}

/**
 * Decode a stored state object. Anything without exactly one recognised
 * marker is a StateDecodeError, never a silent miss.
 */
export function decodeConversationState(raw: unknown): Result<ConversationState, StateDecodeError> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return createErr(new StateDecodeError('State is not an object', 'not_an_object'));
  }

  const legacy = LegacyUMSStateSchema.safeParse(raw);
  if (legacy.success && !('agent' in raw)) {
    return createOk(umsState(legacy.data.ums_conversation_id));
  }

  if (!('agent' in raw)) {
    return createErr(new StateDecodeError('State carries no agent marker', 'unknown_marker'));
  }

  const parsed = ConversationStateSchema.safeParse(raw);
  if (!parsed.success) {
    const marker = raw.agent;
    const unknownMarker = marker !== 'GPA' && marker !== 'UMS';
    return createErr(
      new StateDecodeError(
        unknownMarker
          ? `Unrecognized state marker: ${String(marker)}`
          : `Invalid ${String(marker)} state: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
        unknownMarker ? 'unknown_marker' : 'invalid_payload'
      )
    );
  }

  return createOk(
    parsed.data.agent === 'GPA' ? gpaState(parsed.data.toolHistory) : umsState(parsed.data.conversationId)
  );
}

/**
 * Decode the state attached to a message, if any
 */
export function readMessageState(
  message: Message
): Result<ConversationState, StateDecodeError> | null {
  const raw = message.customContent?.state;
  if (raw === undefined || raw === null) return null;
  return decodeConversationState(raw);
}
