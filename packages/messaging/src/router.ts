import type {
  AgentId,
  Logger,
  Message,
  MessageId,
  MessageTemplate,
  Result,
  RoutingError,
} from '@parley/core';
import {
  AgentAlreadyRegisteredError,
  UnknownAgentError,
  copyForReceiver,
  err,
  noopLogger,
  ok,
} from '@parley/core';
import { DeliveryHistory } from './delivery-history.js';
import type { DeliveryHistoryOptions } from './delivery-history.js';
import { Mailbox } from './mailbox.js';
import type { MailboxOptions, WaitOptions } from './mailbox.js';
import { TopicRegistry } from './topic-registry.js';

/** Options for the Router. */
export interface RouterOptions {
  /** Applied to mailboxes the router creates on registration. */
  mailbox?: Omit<MailboxOptions, 'logger'>;
  history?: DeliveryHistoryOptions;
  logger?: Logger;
}

export type RouteResult = Result<void, RoutingError>;

/** Outcome of one target of a broadcast or publish. */
export interface BroadcastResult {
  agentId: AgentId;
  /** Id of the copy addressed to this agent. */
  messageId: MessageId;
  result: RouteResult;
}

/**
 * Registry of agent mailboxes plus direct, broadcast and topic delivery.
 *
 * Every operation body runs to completion before another starts, so the
 * registry and history need no locking. The only suspension inside `route`
 * is a send parked on a full 'block' mailbox, and the registry is not held
 * across it: a deregistration in the meantime fails that send with
 * MailboxClosedError.
 */
export class Router {
  private readonly mailboxes = new Map<AgentId, Mailbox>();
  private readonly history: DeliveryHistory;
  private readonly topics = new TopicRegistry();
  private readonly mailboxDefaults: Omit<MailboxOptions, 'logger'>;
  private readonly logger: Logger;

  constructor(options: RouterOptions = {}) {
    this.mailboxDefaults = options.mailbox ?? {};
    this.history = new DeliveryHistory(options.history);
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Create (or attach) the mailbox for an agent. Idempotent: a registered id
   * always gets its existing mailbox back.
   *
   * @throws AgentAlreadyRegisteredError if `mailbox` differs from the one
   *   already registered for `agentId`.
   */
  register(agentId: AgentId, mailbox?: Mailbox): Mailbox {
    const existing = this.mailboxes.get(agentId);
    if (existing) {
      if (mailbox && mailbox !== existing) {
        throw new AgentAlreadyRegisteredError(agentId);
      }
      return existing;
    }

    const attached = mailbox ?? new Mailbox({ ...this.mailboxDefaults, logger: this.logger });
    this.mailboxes.set(agentId, attached);
    this.logger.debug(`Registered agent "${agentId}"`);
    return attached;
  }

  /**
   * Remove an agent, its topic memberships and its mailbox. Returns the
   * messages the mailbox still held; they are not delivered anywhere else.
   */
  deregister(agentId: AgentId): Message[] {
    const mailbox = this.mailboxes.get(agentId);
    if (!mailbox) return [];

    this.mailboxes.delete(agentId);
    this.topics.removeAgent(agentId);
    const undelivered = mailbox.close();

    if (undelivered.length > 0) {
      this.logger.warn(`Deregistered agent "${agentId}" with ${undelivered.length} undelivered message(s)`);
    } else {
      this.logger.debug(`Deregistered agent "${agentId}"`);
    }
    return undelivered;
  }

  /**
   * Deliver to `message.receiver`. On success the id is recorded before the
   * promise resolves, so `hasRouted` is true for anyone who observed it.
   */
  async route(message: Message, options: WaitOptions = {}): Promise<RouteResult> {
    const mailbox = this.mailboxes.get(message.receiver);
    if (!mailbox) {
      this.logger.warn(`Cannot route ${message.id}: unknown agent "${message.receiver}"`);
      return err(new UnknownAgentError(message.receiver));
    }

    const sent = await mailbox.send(message, options);
    if (!sent.ok) return sent;

    this.history.record(message.id);
    return ok(undefined);
  }

  /** Whether a route of this id succeeded recently (see DeliveryHistory). */
  hasRouted(messageId: MessageId): boolean {
    return this.history.has(messageId);
  }

  /**
   * Route one copy of `template` to each agent. Every copy has its own id.
   * Targets succeed or fail independently; results follow `agentIds` order.
   */
  broadcast(
    template: MessageTemplate,
    agentIds: AgentId[],
    options: WaitOptions = {},
  ): Promise<BroadcastResult[]> {
    return Promise.all(
      agentIds.map(async (agentId) => {
        const copy = copyForReceiver(template, agentId);
        return { agentId, messageId: copy.id, result: await this.route(copy, options) };
      }),
    );
  }

  /**
   * @throws UnknownAgentError when the agent is not registered.
   */
  subscribe(agentId: AgentId, topic: string): void {
    if (!this.mailboxes.has(agentId)) {
      throw new UnknownAgentError(agentId);
    }
    this.topics.subscribe(agentId, topic);
  }

  /** Returns whether the agent was subscribed. */
  unsubscribe(agentId: AgentId, topic: string): boolean {
    return this.topics.unsubscribe(agentId, topic);
  }

  subscribers(topic: string): AgentId[] {
    return this.topics.subscribers(topic);
  }

  /** Broadcast to the topic's current subscribers; each copy carries `topic`. */
  publish(
    topic: string,
    template: MessageTemplate,
    options: WaitOptions = {},
  ): Promise<BroadcastResult[]> {
    return this.broadcast({ ...template, topic }, this.topics.subscribers(topic), options);
  }

  agentCount(): number {
    return this.mailboxes.size;
  }

  isRegistered(agentId: AgentId): boolean {
    return this.mailboxes.has(agentId);
  }

  getMailbox(agentId: AgentId): Mailbox | undefined {
    return this.mailboxes.get(agentId);
  }

  agents(): AgentId[] {
    return [...this.mailboxes.keys()];
  }

  /** Deregister every agent. */
  close(): void {
    for (const agentId of this.agents()) {
      this.deregister(agentId);
    }
  }
}
