import { MessageBuildError } from './errors.js';
import { generateId, now } from './utils.js';

/** Opaque identifier of a participant. */
export type AgentId = string;

/** Opaque identifier of one message instance. */
export type MessageId = string;

/** Speech-act kind. The fabric never branches on it. */
export enum Performative {
  INFORM = 'INFORM',
  REQUEST = 'REQUEST',
  QUERY = 'QUERY',
  PROPOSE = 'PROPOSE',
  ACCEPT = 'ACCEPT',
  REJECT = 'REJECT',
  CONFIRM = 'CONFIRM',
  DISCONFIRM = 'DISCONFIRM',
  SUBSCRIBE = 'SUBSCRIBE',
  CFP = 'CFP',
  REFUSE = 'REFUSE',
  AGREE = 'AGREE',
}

const PERFORMATIVES = new Set<string>(Object.values(Performative));

export function isPerformative(value: unknown): value is Performative {
  return typeof value === 'string' && PERFORMATIVES.has(value);
}

/**
 * The unit of communication. Frozen once constructed.
 *
 * `conversationId` links a request to its replies; `inReplyTo` links a reply
 * to the exact request message it answers.
 */
export interface Message {
  readonly id: MessageId;
  readonly sender: AgentId;
  readonly receiver: AgentId;
  readonly performative: Performative;
  readonly content: string;
  readonly conversationId?: string;
  readonly inReplyTo?: MessageId;
  /** Set on copies fanned out by topic publish. */
  readonly topic?: string;
  /** RFC 3339 */
  readonly createdAt: string;
}

/** Fields a caller supplies; id and timestamp are assigned. */
export interface MessageInit {
  sender: AgentId;
  receiver: AgentId;
  performative: Performative;
  content: string;
  conversationId?: string;
  inReplyTo?: MessageId;
  topic?: string;
}

/** A message without a receiver, used for broadcast and publish. */
export type MessageTemplate = Omit<MessageInit, 'receiver'>;

export function newAgentId(): AgentId {
  return generateId();
}

export function newMessageId(): MessageId {
  return generateId();
}

export function createMessage(init: MessageInit): Message {
  return freeze({
    id: newMessageId(),
    sender: init.sender,
    receiver: init.receiver,
    performative: init.performative,
    content: init.content,
    conversationId: init.conversationId,
    inReplyTo: init.inReplyTo,
    topic: init.topic,
    createdAt: now(),
  });
}

/** Same message (same id) tagged with a conversation. */
export function withConversationId(message: Message, conversationId: string): Message {
  return freeze({ ...message, conversationId });
}

/** Same message (same id) marked as the answer to `requestId`. */
export function withReplyTo(message: Message, requestId: MessageId): Message {
  return freeze({ ...message, inReplyTo: requestId });
}

/** A distinct message (new id) addressed to another receiver. */
export function withReceiver(message: Message, receiver: AgentId): Message {
  return freeze({ ...message, id: newMessageId(), receiver });
}

/** Materialize a template for one receiver. */
export function copyForReceiver(template: MessageTemplate, receiver: AgentId): Message {
  return createMessage({ ...template, receiver });
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

const OPTIONAL_FIELDS = ['conversationId', 'inReplyTo', 'topic'] as const;

/** Drop unset optional fields so copies compare cleanly, then freeze. */
function freeze(message: Message): Message {
  const copy: Mutable<Message> = { ...message };
  for (const key of OPTIONAL_FIELDS) {
    if (copy[key] === undefined) delete copy[key];
  }
  return Object.freeze(copy);
}

/** Fluent construction with validation of the required fields. */
export class MessageBuilder {
  private fields: Partial<MessageInit> = {};

  sender(sender: AgentId): this {
    this.fields.sender = sender;
    return this;
  }

  receiver(receiver: AgentId): this {
    this.fields.receiver = receiver;
    return this;
  }

  performative(performative: Performative): this {
    this.fields.performative = performative;
    return this;
  }

  content(content: string): this {
    this.fields.content = content;
    return this;
  }

  conversationId(conversationId: string): this {
    this.fields.conversationId = conversationId;
    return this;
  }

  inReplyTo(requestId: MessageId): this {
    this.fields.inReplyTo = requestId;
    return this;
  }

  topic(topic: string): this {
    this.fields.topic = topic;
    return this;
  }

  /** @throws MessageBuildError naming every missing required field. */
  build(): Message {
    const { sender, receiver, performative, content } = this.fields;
    if (sender === undefined || receiver === undefined || performative === undefined || content === undefined) {
      const missing: string[] = [];
      if (sender === undefined) missing.push('sender');
      if (receiver === undefined) missing.push('receiver');
      if (performative === undefined) missing.push('performative');
      if (content === undefined) missing.push('content');
      throw new MessageBuildError(missing);
    }
    return createMessage({ ...this.fields, sender, receiver, performative, content });
  }
}
