export { Choice, Stage, closeStageSafely, foldStageDeltas } from './Choice.js';
export type { ChoiceOptions, ChoiceSink } from './Choice.js';
export { StageTracker } from './StageTracker.js';
export { Router, type RouterOptions } from './Router.js';
export {
  Coordinator,
  delegationErrorMessage,
  type CoordinationResult,
  type CoordinationStatus,
  type CoordinatorOptions,
  type CoordinatorPhase,
} from './Coordinator.js';
export {
  complete,
  createCoordinator,
  type CompleteOptions,
  type CompletionResult,
} from './completion.js';
export {
  CoordinationRequestSchema,
  FALLBACK_DECISION,
  coordinationResponseFormat,
  describeDecision,
  parseCoordinationDecision,
  type CoordinationDecision,
} from './CoordinationDecision.js';
export * from './stateCodec.js';
export * from './agents.js';
export * from './prompts.js';
export * from './gateways/index.js';
