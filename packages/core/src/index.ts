// Types
export * from './types.js';

// Intent classification
export {
  IntentClassifier,
  createIntentClassifier,
  classifyIntent,
  DEFAULT_APPROVE_TOKENS,
  DEFAULT_REJECT_TOKENS,
  DEFAULT_QUERY_KEYWORDS,
  type Intent,
  type IntentType,
  type IntentClassifierOptions,
} from './intent-classifier.js';

// Target registry
export { TargetRegistry, createTargetRegistry, type TargetRegistryConfig } from './target-registry.js';

// Approval ledger
export {
  ApprovalLedger,
  createApprovalLedger,
  isTerminal,
  VALID_TRANSITIONS,
  type ApprovalLedgerConfig,
} from './approval-ledger.js';

// Message log
export { MessageLog, createMessageLog, type MessageLogConfig } from './message-log.js';

// Directive dispatch
export {
  DirectiveDispatcher,
  createDirectiveDispatcher,
  type DirectiveDispatcherConfig,
  type DispatchRequest,
  type DispatchResult,
  type DispatchSuccess,
  type DispatchFailure,
} from './dispatcher.js';

// Overseer
export {
  Overseer,
  createOverseer,
  DEFAULT_OVERSEER_CONFIG,
  OVERSEER_ROLE,
  USAGE_HINT,
  NO_PENDING_REQUEST,
  type OverseerCallbacks,
  type OverseerConfig,
  type ReportQuery,
  type RestoreResult,
} from './overseer.js';

// Events
export * from './events/index.js';

// Persistence
export * from './persistence/index.js';
