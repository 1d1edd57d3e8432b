/**
 * Routing decision produced by the coordination model, and its explicit decode
 * step from the model's raw JSON reply.
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Result } from '../types/index.js';
import { createErr, createOk } from '../types/index.js';
import { DecisionParseError } from '../shared/utils/errors.js';
import { AGENT_IDS, DEFAULT_AGENT, type AgentId } from './agents.js';
import type { ResponseFormat } from '../providers/ILLMProvider.js';

/**
 * Wire schema; the descriptions are part of the prompt the model sees
 */
export const CoordinationRequestSchema = z.object({
  agent_name: z
    .enum(AGENT_IDS)
    .describe(
      'Agent that handles the request. GPA: general-purpose agent for web search, ' +
        'document analysis (RAG), calculations, code execution and image generation. ' +
        'UMS: users management service agent for searching, creating, updating and ' +
        'deleting users.'
    ),
  additional_instructions: z
    .string()
    .optional()
    .describe('Optional clarifications for the chosen agent about what the user wants.'),
});

export interface CoordinationDecision {
  agentId: AgentId;
  additionalInstructions?: string;
}

export const FALLBACK_DECISION: CoordinationDecision = Object.freeze({ agentId: DEFAULT_AGENT });

export function coordinationResponseFormat(): ResponseFormat {
  return {
    type: 'json_schema',
    json_schema: {
      name: 'response',
      schema: zodToJsonSchema(CoordinationRequestSchema, { $refStrategy: 'none' }),
    },
  };
}

/**
 * Decode the model's reply into a decision, or say precisely why it is not one
 */
export function parseCoordinationDecision(
  raw: string | null | undefined
): Result<CoordinationDecision, DecisionParseError> {
  if (!raw || !raw.trim()) {
    return createErr(new DecisionParseError('Empty coordination response', 'empty_response'));
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    return createErr(
      new DecisionParseError(
        `Coordination response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        'invalid_json'
      )
    );
  }

  const parsed = CoordinationRequestSchema.safeParse(data);
  if (!parsed.success) {
    return createErr(
      new DecisionParseError(
        `Coordination response does not match the schema: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ')}`,
        'schema_violation'
      )
    );
  }

  const instructions = parsed.data.additional_instructions?.trim();
  return createOk({
    agentId: parsed.data.agent_name,
    ...(instructions ? { additionalInstructions: instructions } : {}),
  });
}

export function describeDecision(decision: CoordinationDecision): string {
  return (
    `Routing to: **${decision.agentId}**\n` +
    `Instructions: ${decision.additionalInstructions ?? 'None'}`
  );
}
