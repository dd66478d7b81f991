import type { AgentId, Logger, Message, Result, RoutingError } from '@parley/core';
import {
  InvalidStateTransitionError,
  ProtocolError,
  ReplyTimeoutError,
  generateId,
  noopLogger,
  ok,
  withConversationId,
  withReplyTo,
} from '@parley/core';
import type { MessageFilter, ReceiveOutcome, WaitOptions } from './mailbox.js';
import type { Router } from './router.js';

export type ExchangeState = 'idle' | 'request-sent' | 'replied' | 'timed-out' | 'cancelled';

const VALID_TRANSITIONS: Record<ExchangeState, ExchangeState[]> = {
  'idle': ['request-sent'],
  'request-sent': ['replied', 'timed-out', 'cancelled'],
  'replied': [],
  'timed-out': [],
  'cancelled': [],
};

/** One request and the wait for its correlated reply. Resolves exactly once. */
export class Exchange {
  readonly conversationId: string;
  readonly request: Message;
  private current: ExchangeState = 'idle';
  private sentAt = 0;
  private waiting = false;

  constructor(request: Message, conversationId: string) {
    this.request = request;
    this.conversationId = conversationId;
  }

  get state(): ExchangeState {
    return this.current;
  }

  /** Epoch ms at which the default reply deadline elapses. */
  deadline(timeoutMs: number): number {
    return this.sentAt + timeoutMs;
  }

  /** Whether `message` is the reply to this exchange's request. */
  readonly isReply: MessageFilter = (message) =>
    message.conversationId === this.conversationId && message.inReplyTo === this.request.id;

  /** @internal */
  transition(to: ExchangeState): void {
    if (!VALID_TRANSITIONS[this.current].includes(to)) {
      throw new InvalidStateTransitionError(this.current, to);
    }
    if (to === 'request-sent') this.sentAt = Date.now();
    this.current = to;
  }

  /** @internal Marks a receiveReply in progress; only one at a time. */
  beginWait(): void {
    if (this.waiting) {
      throw new ProtocolError(`Already awaiting the reply for conversation "${this.conversationId}"`);
    }
    this.waiting = true;
  }

  /** @internal */
  endWait(): void {
    this.waiting = false;
  }
}

/** Options for a RequestReply protocol instance. */
export interface RequestReplyOptions {
  router: Router;
  requester: AgentId;
  responder: AgentId;
  /** Default reply deadline, counted from when the request was routed. Default: 30000. */
  timeoutMs?: number;
  logger?: Logger;
}

export interface ReceiveRequestOptions extends WaitOptions {
  /** Messages this rejects are handed back as 'unmatched', never discarded. */
  match?: MessageFilter;
}

export type RequestOutcome =
  | ReceiveOutcome
  | { status: 'unmatched'; message: Message };

export type ReplyOutcome =
  | { status: 'replied'; message: Message }
  | { status: 'timed-out'; error: ReplyTimeoutError }
  | { status: 'cancelled' }
  | { status: 'closed' };

const DEFAULT_REPLY_TIMEOUT_MS = 30_000;

/**
 * Synchronous request/reply on top of asynchronous delivery between one
 * requester and one responder.
 *
 * The requester waits with a selective receive: only the message carrying
 * the exchange's conversation id and `inReplyTo` of the request is taken.
 * All other traffic stays in the requester's mailbox in its original
 * order, and a reply arriving after a timeout stays there too.
 */
export class RequestReply {
  readonly requester: AgentId;
  readonly responder: AgentId;
  private readonly router: Router;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly exchanges = new Map<string, Exchange>();
  /** Conversation ids whose request is still being routed. */
  private readonly reserved = new Set<string>();

  constructor(options: RequestReplyOptions) {
    this.router = options.router;
    this.requester = options.requester;
    this.responder = options.responder;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REPLY_TIMEOUT_MS;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Route a request, assigning a conversation id when it has none. The
   * exchange is listed by `pending` only after delivery; on a routing
   * failure none is recorded.
   *
   * @throws ProtocolError when the message is not from requester to
   *   responder, or its conversation is already outstanding.
   */
  async sendRequest(message: Message, options: WaitOptions = {}): Promise<Result<Exchange, RoutingError>> {
    if (message.sender !== this.requester || message.receiver !== this.responder) {
      throw new ProtocolError(
        `Request must be sent from "${this.requester}" to "${this.responder}", `
        + `got "${message.sender}" → "${message.receiver}"`,
      );
    }

    const conversationId = message.conversationId ?? generateId();
    if (this.exchanges.has(conversationId) || this.reserved.has(conversationId)) {
      throw new ProtocolError(`Conversation "${conversationId}" already has an outstanding request`);
    }

    const request = message.conversationId ? message : withConversationId(message, conversationId);
    const exchange = new Exchange(request, conversationId);

    // A send parked on a full responder mailbox holds only the id; the
    // exchange becomes visible once the request is delivered.
    this.reserved.add(conversationId);
    let routed: Result<void, RoutingError>;
    try {
      routed = await this.router.route(request, options);
    } finally {
      this.reserved.delete(conversationId);
    }
    if (!routed.ok) return routed;

    exchange.transition('request-sent');
    this.exchanges.set(conversationId, exchange);
    this.logger.debug(`Request ${request.id} sent in conversation ${conversationId}`);
    return ok(exchange);
  }

  /** Responder side: the next message in the responder's mailbox. */
  async receiveRequest(options: ReceiveRequestOptions = {}): Promise<RequestOutcome> {
    const mailbox = this.router.getMailbox(this.responder);
    if (!mailbox) return { status: 'closed' };

    const { match, ...wait } = options;
    const outcome = await mailbox.receive(wait);
    if (outcome.status === 'received' && match && !match(outcome.message)) {
      return { status: 'unmatched', message: outcome.message };
    }
    return outcome;
  }

  /**
   * Responder side: answer `request`. The reply gets the request's
   * conversation id and `inReplyTo = request.id` before it is routed.
   *
   * @throws ProtocolError when request and reply do not belong to this pair.
   */
  async sendReply(request: Message, reply: Message, options: WaitOptions = {}): Promise<Result<Message, RoutingError>> {
    if (request.sender !== this.requester || request.receiver !== this.responder) {
      throw new ProtocolError(`Message ${request.id} is not a request from "${this.requester}" to "${this.responder}"`);
    }
    if (reply.sender !== this.responder || reply.receiver !== this.requester) {
      throw new ProtocolError(
        `Reply must be sent from "${this.responder}" to "${this.requester}", `
        + `got "${reply.sender}" → "${reply.receiver}"`,
      );
    }
    if (request.conversationId === undefined) {
      throw new ProtocolError(`Request ${request.id} has no conversation id`);
    }

    const correlated = withReplyTo(withConversationId(reply, request.conversationId), request.id);
    const routed = await this.router.route(correlated, options);
    return routed.ok ? ok(correlated) : routed;
  }

  /**
   * Requester side: wait for the reply to an outstanding exchange. Without a
   * conversation id the single outstanding exchange is used. The deadline is
   * `timeoutMs` from now when given, else the instance timeout counted from
   * when the request was sent.
   *
   * @throws ProtocolError when the exchange is unknown or ambiguous.
   */
  async receiveReply(conversationId?: string, options: WaitOptions = {}): Promise<ReplyOutcome> {
    const exchange = this.findExchange(conversationId);
    if (exchange.state !== 'request-sent') {
      throw new InvalidStateTransitionError(exchange.state, 'replied');
    }

    const mailbox = this.router.getMailbox(this.requester);
    if (!mailbox) {
      this.finish(exchange, 'cancelled');
      return { status: 'closed' };
    }

    const timeoutMs = options.timeoutMs
      ?? Math.max(0, exchange.deadline(this.timeoutMs) - Date.now());

    exchange.beginWait();
    let outcome: ReceiveOutcome;
    try {
      outcome = await mailbox.receiveMatching(exchange.isReply, { signal: options.signal, timeoutMs });
    } finally {
      exchange.endWait();
    }

    switch (outcome.status) {
      case 'received':
        this.finish(exchange, 'replied');
        return { status: 'replied', message: outcome.message };
      case 'timed-out': {
        this.finish(exchange, 'timed-out');
        const error = new ReplyTimeoutError(exchange.conversationId, exchange.request.id, timeoutMs);
        this.logger.warn(error.message);
        return { status: 'timed-out', error };
      }
      case 'cancelled':
        this.finish(exchange, 'cancelled');
        return { status: 'cancelled' };
      case 'closed':
        this.finish(exchange, 'cancelled');
        return { status: 'closed' };
    }
  }

  /**
   * `sendRequest` then `receiveReply`. A routing failure is reported as
   * 'undeliverable'.
   */
  async request(
    message: Message,
    options: WaitOptions = {},
  ): Promise<ReplyOutcome | { status: 'undeliverable'; error: RoutingError }> {
    const sent = await this.sendRequest(message, { signal: options.signal });
    if (!sent.ok) return { status: 'undeliverable', error: sent.error };
    return this.receiveReply(sent.value.conversationId, options);
  }

  /** Conversation ids of exchanges still awaiting a reply. */
  pending(): string[] {
    return [...this.exchanges.keys()];
  }

  private findExchange(conversationId: string | undefined): Exchange {
    if (conversationId !== undefined) {
      const exchange = this.exchanges.get(conversationId);
      if (!exchange) {
        throw new ProtocolError(`No outstanding request in conversation "${conversationId}"`);
      }
      return exchange;
    }

    const outstanding = [...this.exchanges.values()];
    const [only] = outstanding;
    if (outstanding.length !== 1 || !only) {
      throw new ProtocolError(
        `Expected exactly one outstanding request, found ${outstanding.length}; pass a conversation id`,
      );
    }
    return only;
  }

  private finish(exchange: Exchange, to: ExchangeState): void {
    exchange.transition(to);
    this.exchanges.delete(exchange.conversationId);
  }
}
