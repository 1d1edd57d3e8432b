/**
 * Wire format of the chat-completion protocol spoken by the LLM endpoint and
 * the general-purpose agent (snake_case, `custom_content` on messages and
 * deltas), and conversions to the in-process types.
 */

import { z } from 'zod';
import type { Attachment, LLMMessage, Message, StageDelta } from '../../types/index.js';

export const WireAttachmentSchema = z
  .object({
    type: z.string().optional(),
    title: z.string().optional(),
    data: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

export const WireStageSchema = z.object({
  index: z.number().int().nonnegative(),
  name: z.string().optional(),
  // Agents may report a failed stage; for mirroring it is just a closed stage
  status: z
    .enum(['open', 'completed', 'failed'])
    .nullish()
    .transform((status) => (status === 'failed' ? 'completed' : (status ?? undefined))),
  content: z.string().nullish(),
  attachments: z.array(WireAttachmentSchema).nullish(),
});

export const WireCustomContentSchema = z.object({
  attachments: z.array(z.unknown()).nullish(),
  stages: z.array(z.unknown()).nullish(),
  state: z.unknown().optional(),
});

export const WireStreamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            custom_content: WireCustomContentSchema.nullish(),
          })
          .nullish(),
        finish_reason: z.string().nullish(),
      })
    )
    .optional(),
});

export type WireAttachment = z.infer<typeof WireAttachmentSchema>;

export interface WireCustomContent {
  attachments?: WireAttachment[];
  state?: unknown;
}

export interface WireMessage {
  role: string;
  content: string;
  custom_content?: WireCustomContent;
}

export function fromWireAttachment(wire: WireAttachment): Attachment {
  return {
    ...(wire.type !== undefined && { mimeType: wire.type }),
    ...(wire.title !== undefined && { title: wire.title }),
    ...(wire.data !== undefined && { inlineData: wire.data }),
    ...(wire.url !== undefined && { url: wire.url }),
  };
}

export function toWireAttachment(attachment: Attachment): WireAttachment {
  return {
    ...(attachment.mimeType !== undefined && { type: attachment.mimeType }),
    ...(attachment.title !== undefined && { title: attachment.title }),
    ...(attachment.inlineData !== undefined && { data: attachment.inlineData }),
    ...(attachment.url !== undefined && { url: attachment.url }),
  };
}

/**
 * Parse a list of wire attachments, dropping entries that are not objects
 */
export function parseWireAttachments(raw: readonly unknown[] | null | undefined): Attachment[] {
  if (!raw) return [];
  const attachments: Attachment[] = [];
  for (const item of raw) {
    const parsed = WireAttachmentSchema.safeParse(item);
    if (parsed.success) {
      attachments.push(fromWireAttachment(parsed.data));
    }
  }
  return attachments;
}

/**
 * Parse a list of wire stage deltas, dropping entries without a valid index
 */
export function parseWireStages(raw: readonly unknown[] | null | undefined): StageDelta[] {
  if (!raw) return [];
  const stages: StageDelta[] = [];
  for (const item of raw) {
    const parsed = WireStageSchema.safeParse(item);
    if (!parsed.success) continue;

    const { index, name, status, content, attachments } = parsed.data;
    const delta: StageDelta = { index };
    if (name !== undefined) delta.name = name;
    if (status !== undefined) delta.status = status;
    if (content) delta.content = content;
    if (attachments && attachments.length > 0) {
      delta.attachments = attachments.map(fromWireAttachment);
    }
    stages.push(delta);
  }
  return stages;
}

/**
 * Plain role/content view of a message; custom content never reaches the
 * routing or synthesis model
 */
export function toLLMMessage(message: Message): LLMMessage {
  return { role: message.role, content: message.content };
}

export function toWireMessage(message: Message, state?: unknown): WireMessage {
  const wire: WireMessage = { role: message.role, content: message.content };
  const customContent: WireCustomContent = {};

  const attachments = message.customContent?.attachments;
  if (attachments && attachments.length > 0) {
    customContent.attachments = attachments.map(toWireAttachment);
  }
  if (state !== undefined) {
    customContent.state = state;
  }

  if (Object.keys(customContent).length > 0) {
    wire.custom_content = customContent;
  }
  return wire;
}
