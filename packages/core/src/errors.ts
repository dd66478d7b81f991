import type { AgentId, MessageId } from './messages.js';

/** Routing target is not registered. The message was not delivered anywhere. */
export class UnknownAgentError extends Error {
  readonly code = 'UNKNOWN_AGENT';

  constructor(public readonly agentId: AgentId) {
    super(`Unknown agent: "${agentId}"`);
    this.name = 'UnknownAgentError';
  }
}

/** Bounded mailbox rejected the message. Safe to retry. */
export class MailboxFullError extends Error {
  readonly code = 'MAILBOX_FULL';

  constructor(public readonly capacity: number) {
    super(`Mailbox full (capacity ${capacity})`);
    this.name = 'MailboxFullError';
  }
}

/** The mailbox was closed before the message could be accepted. */
export class MailboxClosedError extends Error {
  readonly code = 'MAILBOX_CLOSED';

  constructor() {
    super('Mailbox is closed');
    this.name = 'MailboxClosedError';
  }
}

/** A suspending operation was aborted by its caller. */
export class CancelledError extends Error {
  readonly code = 'CANCELLED';

  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/** No correlated reply arrived before the deadline. The request is not retracted. */
export class ReplyTimeoutError extends Error {
  readonly code = 'REPLY_TIMEOUT';

  constructor(
    public readonly conversationId: string,
    public readonly requestId: MessageId,
    public readonly timeoutMs: number,
  ) {
    super(`No reply for conversation ${conversationId} within ${timeoutMs}ms`);
    this.name = 'ReplyTimeoutError';
  }
}

/** A request or reply does not belong to the exchange it was handed to. */
export class ProtocolError extends Error {
  readonly code = 'PROTOCOL_VIOLATION';

  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/** Thrown when an invalid exchange state transition is attempted. */
export class InvalidStateTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Invalid state transition: ${from} → ${to}`);
    this.name = 'InvalidStateTransitionError';
  }
}

/** Thrown when a second, different mailbox is supplied for a registered agent. */
export class AgentAlreadyRegisteredError extends Error {
  constructor(public readonly agentId: AgentId) {
    super(`Agent already registered with a different mailbox: "${agentId}"`);
    this.name = 'AgentAlreadyRegisteredError';
  }
}

/** Thrown when a message is built without its required fields. */
export class MessageBuildError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Cannot build message, missing: ${missing.join(', ')}`);
    this.name = 'MessageBuildError';
    this.missing = missing;
  }
}

/** Thrown when a configuration file cannot be read or fails validation. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly problems: string[] = [],
    cause?: unknown,
  ) {
    super(message);
    this.name = 'ConfigError';
    this.cause = cause;
  }
}

/** Failures a mailbox can report for a send. */
export type MailboxError = MailboxFullError | MailboxClosedError | CancelledError;

/** Failures the router can report for a delivery. */
export type RoutingError = UnknownAgentError | MailboxError;
