/**
 * Configuration schemas with Zod validation
 */

import { z } from 'zod';

/**
 * LLM used for routing decisions and final synthesis
 */
export const LLMConfigSchema = z.object({
  endpoint: z.string().url().default('http://localhost:8080'),
  deployment: z.string().min(1).default('gpt-4o'),
  apiVersion: z.string().default('2025-01-01-preview'),
  apiKey: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  timeoutMs: z.number().int().positive().default(60000),
});

/**
 * General-purpose agent: stateless, restores its tool history from the
 * conversation on every turn
 */
export const GPAConfigSchema = z.object({
  endpoint: z.string().url().default('http://localhost:8080'),
  deployment: z.string().min(1).default('general-purpose-agent'),
  apiVersion: z.string().default('2025-01-01-preview'),
  apiKey: z.string().optional(),
  timeoutMs: z.number().int().positive().default(120000),
  // Most recent resumable turns replayed to the agent; unbounded when unset
  maxRestoredTurns: z.number().int().positive().optional(),
});

/**
 * Users management service agent: keeps its own conversation by id
 */
export const UMSConfigSchema = z.object({
  endpoint: z.string().url().default('http://localhost:8042'),
  timeoutMs: z.number().int().positive().default(120000),
});

export const AgentsConfigSchema = z.object({
  gpa: GPAConfigSchema.default({}),
  ums: UMSConfigSchema.default({}),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  dir: z.string().default('.switchboard/logs'),
  console: z.boolean().default(true),
});

/**
 * Main Configuration Schema
 */
export const ConfigSchema = z.object({
  llm: LLMConfigSchema.default({}),
  agents: AgentsConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// Type exports
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type GPAConfig = z.infer<typeof GPAConfigSchema>;
export type UMSConfig = z.infer<typeof UMSConfigSchema>;
export type AgentsConfig = z.infer<typeof AgentsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config as written in YAML files, env or overrides.
 * Defaults are not applied here so a partial layer never resets a lower one.
 */
export const ConfigOverridesSchema = z.object({
  llm: LLMConfigSchema.partial().optional(),
  agents: z
    .object({
      gpa: GPAConfigSchema.partial().optional(),
      ums: UMSConfigSchema.partial().optional(),
    })
    .optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;
