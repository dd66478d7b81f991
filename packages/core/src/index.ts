// Messages & envelope
export {
  Performative,
  isPerformative,
  newAgentId,
  newMessageId,
  createMessage,
  withConversationId,
  withReplyTo,
  withReceiver,
  copyForReceiver,
  MessageBuilder,
} from './messages.js';
export type {
  AgentId,
  MessageId,
  Message,
  MessageInit,
  MessageTemplate,
} from './messages.js';

// Results & errors
export { ok, err } from './result.js';
export type { Result } from './result.js';
export {
  UnknownAgentError,
  MailboxFullError,
  MailboxClosedError,
  CancelledError,
  ReplyTimeoutError,
  ProtocolError,
  InvalidStateTransitionError,
  AgentAlreadyRegisteredError,
  MessageBuildError,
  ConfigError,
} from './errors.js';
export type { MailboxError, RoutingError } from './errors.js';

// Logging
export { createConsoleLogger, noopLogger, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel, ConsoleLoggerOptions } from './logger.js';

// Configuration
export { DEFAULT_FABRIC_CONFIG, OVERFLOW_POLICIES } from './config.js';
export type {
  FabricConfig,
  MailboxConfig,
  HistoryConfig,
  RequestReplyConfig,
  LoggingConfig,
  OverflowPolicy,
} from './config.js';

// Configuration validator
export {
  validateFabricConfig,
  validateFabricConfigObject,
  loadFabricConfig,
} from './config-validator.js';
export type {
  ConfigValidationError,
  ConfigValidationResult,
} from './config-validator.js';
export { applyEnvOverrides } from './config-env-overlay.js';

// Utilities
export { generateId, now, isRecord } from './utils.js';
