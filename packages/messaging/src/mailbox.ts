import type { Logger, MailboxError, Message, OverflowPolicy, Result } from '@parley/core';
import {
  CancelledError,
  MailboxClosedError,
  MailboxFullError,
  err,
  noopLogger,
  ok,
} from '@parley/core';

/** Options for a Mailbox. */
export interface MailboxOptions {
  /** Maximum queued messages. Omit for an unbounded mailbox. */
  capacity?: number;
  /** Applied only when bounded. Default: 'reject'. */
  overflow?: OverflowPolicy;
  logger?: Logger;
}

/** Deadline and cancellation for any suspending call. */
export interface WaitOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface SendReceipt {
  /** Head message evicted under the 'drop-oldest' policy. */
  dropped?: Message;
}

export type SendResult = Result<SendReceipt, MailboxError>;

export type ReceiveOutcome =
  | { status: 'received'; message: Message }
  | { status: 'timed-out' }
  | { status: 'cancelled' }
  | { status: 'closed' };

export type MessageFilter = (message: Message) => boolean;

interface Waiter {
  accepts?: MessageFilter;
  settle(outcome: ReceiveOutcome): void;
}

interface BlockedSender {
  message: Message;
  settle(result: SendResult): void;
}

/**
 * Per-agent FIFO queue with suspending receive.
 *
 * Messages go straight to the longest-waiting receiver that accepts them,
 * otherwise to the tail of the queue. Each message reaches exactly one
 * receiver. Under the 'block' policy senders that find the queue full park
 * in arrival order and are admitted as space frees up.
 */
export class Mailbox implements AsyncIterable<Message> {
  readonly capacity: number | undefined;
  readonly overflow: OverflowPolicy;
  private readonly logger: Logger;
  private readonly queue: Message[] = [];
  private readonly waiters: Waiter[] = [];
  private readonly blocked: BlockedSender[] = [];
  private isClosed = false;

  constructor(options: MailboxOptions = {}) {
    if (options.capacity !== undefined
      && (!Number.isInteger(options.capacity) || options.capacity < 1)) {
      throw new RangeError(`Mailbox capacity must be a positive integer, got ${options.capacity}`);
    }
    this.capacity = options.capacity;
    this.overflow = options.overflow ?? 'reject';
    this.logger = options.logger ?? noopLogger;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Receive calls currently suspended on this mailbox. */
  get waitingReceivers(): number {
    return this.waiters.length;
  }

  /** Senders parked under the 'block' policy. */
  get blockedSenders(): number {
    return this.blocked.length;
  }

  /** Queued message count. A snapshot; may change as soon as it is read. */
  size(): number {
    return this.queue.length;
  }

  isEmpty(): boolean {
    return this.queue.length === 0;
  }

  /**
   * Enqueue without suspending. Under 'block' a full mailbox fails with
   * MailboxFullError instead of parking the caller.
   */
  trySend(message: Message): SendResult {
    if (this.isClosed) return err(new MailboxClosedError());

    // With senders parked the queue is full, so only selective receivers
    // can be waiting, and every parked message has already failed their
    // filters. Handing this one over overtakes nobody.
    if (this.handToWaiter(message)) return ok({});

    // Otherwise parked senders are ahead of this message.
    if (this.blocked.length === 0 && !this.isFull()) {
      this.queue.push(message);
      return ok({});
    }

    if (this.overflow === 'drop-oldest') {
      const dropped = this.queue.shift();
      this.queue.push(message);
      this.logger.debug(`Mailbox full, dropped oldest message ${dropped?.id ?? '(none)'}`);
      return ok(dropped ? { dropped } : {});
    }

    return err(new MailboxFullError(this.capacity ?? 0));
  }

  /**
   * Enqueue at the tail. Only the 'block' policy suspends: the sender waits
   * for space until the signal aborts (CancelledError) or the timeout
   * elapses (MailboxFullError).
   */
  send(message: Message, options: WaitOptions = {}): Promise<SendResult> {
    const immediate = this.trySend(message);
    if (immediate.ok || this.overflow !== 'block' || !(immediate.error instanceof MailboxFullError)) {
      return Promise.resolve(immediate);
    }
    if (options.signal?.aborted) {
      return Promise.resolve(err(new CancelledError('Send cancelled')));
    }

    return suspend<SendResult>(
      options,
      (settle) => {
        const entry: BlockedSender = { message, settle };
        this.blocked.push(entry);
        return () => remove(this.blocked, entry);
      },
      () => err(new MailboxFullError(this.capacity ?? 0)),
      () => err(new CancelledError('Send cancelled')),
    );
  }

  /** Remove and return the head message, suspending while the mailbox is empty. */
  receive(options: WaitOptions = {}): Promise<ReceiveOutcome> {
    return this.receiveWhere(undefined, options);
  }

  /**
   * Selective receive: remove and return the oldest message accepted by
   * `filter`. Every other message stays queued in its original order.
   */
  receiveMatching(filter: MessageFilter, options: WaitOptions = {}): Promise<ReceiveOutcome> {
    return this.receiveWhere(filter, options);
  }

  /** Non-suspending receive. */
  tryReceive(): Message | undefined {
    return this.take(undefined);
  }

  /** Remove and return every queued message. */
  drain(): Message[] {
    const drained = this.queue.splice(0);
    this.admitBlocked();
    return drained;
  }

  /**
   * Close for good. Suspended receivers see 'closed', parked senders fail
   * with MailboxClosedError. Returns the messages that were never received.
   */
  close(): Message[] {
    if (this.isClosed) return [];
    this.isClosed = true;

    const undelivered = this.queue.splice(0);
    for (const waiter of this.waiters.splice(0)) {
      waiter.settle({ status: 'closed' });
    }
    for (const sender of this.blocked.splice(0)) {
      sender.settle(err(new MailboxClosedError()));
    }
    return undelivered;
  }

  /** Yields messages until the mailbox is closed. */
  async *[Symbol.asyncIterator](): AsyncGenerator<Message> {
    for (;;) {
      const outcome = await this.receive();
      if (outcome.status !== 'received') return;
      yield outcome.message;
    }
  }

  // ── Private helpers ──────────────────────────────────────────────────

  private receiveWhere(filter: MessageFilter | undefined, options: WaitOptions): Promise<ReceiveOutcome> {
    if (options.signal?.aborted) {
      return Promise.resolve({ status: 'cancelled' });
    }

    const message = this.take(filter);
    if (message) return Promise.resolve({ status: 'received', message });
    if (this.isClosed) return Promise.resolve({ status: 'closed' });
    if (options.timeoutMs !== undefined && options.timeoutMs <= 0) {
      return Promise.resolve({ status: 'timed-out' });
    }

    return suspend<ReceiveOutcome>(
      options,
      (settle) => {
        const waiter: Waiter = { accepts: filter, settle };
        this.waiters.push(waiter);
        return () => remove(this.waiters, waiter);
      },
      () => ({ status: 'timed-out' }),
      () => ({ status: 'cancelled' }),
    );
  }

  /**
   * Remove the first acceptable message. A filtered receive may also take a
   * parked sender's message directly, so a full mailbox of unrelated traffic
   * cannot hold back the one the caller is waiting for.
   */
  private take(filter: MessageFilter | undefined): Message | undefined {
    const index = filter ? this.queue.findIndex(filter) : (this.queue.length > 0 ? 0 : -1);
    if (index >= 0) {
      const [message] = this.queue.splice(index, 1);
      this.admitBlocked();
      return message;
    }

    if (filter) {
      const parked = this.blocked.findIndex((entry) => filter(entry.message));
      if (parked >= 0) {
        const [entry] = this.blocked.splice(parked, 1);
        entry?.settle(ok({}));
        return entry?.message;
      }
    }
    return undefined;
  }

  /** Move parked senders into freed space, oldest first. */
  private admitBlocked(): void {
    while (this.blocked.length > 0 && !this.isFull()) {
      const entry = this.blocked.shift();
      if (!entry) return;
      if (!this.handToWaiter(entry.message)) {
        this.queue.push(entry.message);
      }
      entry.settle(ok({}));
    }
  }

  private handToWaiter(message: Message): boolean {
    const index = this.waiters.findIndex((w) => !w.accepts || w.accepts(message));
    if (index < 0) return false;
    const [waiter] = this.waiters.splice(index, 1);
    waiter?.settle({ status: 'received', message });
    return waiter !== undefined;
  }

  private isFull(): boolean {
    return this.capacity !== undefined && this.queue.length >= this.capacity;
  }
}

/**
 * Park a caller until `settle` is invoked, the signal aborts or the timeout
 * elapses. `park` adds the caller to a wait list and returns its removal.
 */
function suspend<T>(
  options: WaitOptions,
  park: (settle: (value: T) => void) => () => void,
  onTimeout: () => T,
  onCancel: () => T,
): Promise<T> {
  return new Promise<T>((resolve) => {
    const { signal, timeoutMs } = options;
    let timer: ReturnType<typeof setTimeout> | undefined;
    let settled = false;

    function finish(value: T): void {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve(value);
    }

    const unpark = park(finish);

    function onAbort(): void {
      unpark();
      finish(onCancel());
    }

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        unpark();
        finish(onTimeout());
      }, timeoutMs);
    }
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function remove<T>(list: T[], item: T): void {
  const index = list.indexOf(item);
  if (index >= 0) list.splice(index, 1);
}
