export { EmployerReplyAssistant, createAssistant, createSink, IncomingMessageSchema } from './agents/assistant.js';
export type { IncomingMessage, HandledMessage, EmployerReplyAssistantOptions } from './agents/assistant.js';
export { runRevisionLoop, selectBestRound } from './agents/revision-controller.js';
export type { RevisionControllerConfig, RevisionControllerDeps } from './agents/revision-controller.js';
export {
  evaluate,
  checkGate,
  computeOverallScore,
  buildAssessment,
  formatRevisionFeedback,
} from './agents/quality-gate.js';
export {
  TelegramSink,
  LogSink,
  CompositeSink,
  dispatchNotification,
  priorityForEscalation,
  formatNotification,
} from './agents/escalation.js';
export { commitApprovedActions, createDefaultActionHandlers } from './agents/action-commit.js';
export type { ActionHandlers, ActionResult } from './agents/action-commit.js';
export { LlmResponseGenerator } from './agents/responder.js';
export { LlmResponseScorer, parseEvaluatorOutput } from './agents/evaluator.js';
export { loadProfile } from './agents/profile.js';
export { loadConfig } from './lib/config.js';
export type { AppConfig } from './lib/config.js';
export {
  MalformedAssessmentError,
  GenerationFailure,
  EvaluationFailure,
  ServiceTimeoutError,
  ConfigError,
} from './lib/errors.js';
export * from './agents/types.js';
