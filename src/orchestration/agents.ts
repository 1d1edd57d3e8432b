/**
 * Agents the coordinator can delegate to
 */

export const AGENT_IDS = ['GPA', 'UMS'] as const;

/**
 * - GPA: general-purpose agent (web search, document RAG, code execution,
 *   image generation); stateless, replays its tool history every turn
 * - UMS: users management service agent; stateful, addressed by conversation id
 */
export type AgentId = (typeof AGENT_IDS)[number];

export const DEFAULT_AGENT: AgentId = 'GPA';

export const AGENT_LABELS: Record<AgentId, string> = {
  GPA: 'General-purpose',
  UMS: 'Users Management',
};
