/**
 * Main entry point for agent-switchboard
 * Exports public API
 */

export * from './types/index.js';
export * from './orchestration/index.js';

export type { ILLMProvider, ChatOptions, ResponseFormat } from './providers/ILLMProvider.js';
export { ChatCompletionsProvider } from './providers/ChatCompletionsProvider.js';
export * from './shared/config/ConfigLoader.js';
export * from './shared/config/schemas.js';
export * from './platform/index.js';
export * from './shared/utils/logger.js';
export * from './shared/utils/errors.js';
