import type { MessageId } from '@parley/core';

export interface DeliveryHistoryOptions {
  /** Most recent ids kept. Default: 10000. */
  capacity?: number;
  /** Entries older than this read as absent. Default: no expiry. */
  ttlMs?: number;
}

const DEFAULT_CAPACITY = 10_000;

/**
 * Recent-delivery membership set behind `Router.hasRouted`.
 *
 * Bounded: once `capacity` ids are held the oldest is evicted, and with a
 * TTL, expired ids are pruned lazily. Either way `has` turns false for that
 * id. This is a recency check, not an audit log.
 */
export class DeliveryHistory {
  readonly capacity: number;
  readonly ttlMs: number | undefined;
  /** Insertion order doubles as age order, since re-recording moves an id to the end. */
  private readonly entries = new Map<MessageId, number>();

  constructor(options: DeliveryHistoryOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    if (options.ttlMs !== undefined && !(options.ttlMs > 0)) {
      throw new RangeError(`History ttlMs must be positive, got ${options.ttlMs}`);
    }
    this.capacity = capacity;
    this.ttlMs = options.ttlMs;
  }

  record(id: MessageId): void {
    this.entries.delete(id);
    this.entries.set(id, Date.now());

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  has(id: MessageId): boolean {
    const recordedAt = this.entries.get(id);
    if (recordedAt === undefined) return false;
    if (this.isExpired(recordedAt, Date.now())) {
      this.prune();
      return false;
    }
    return true;
  }

  get size(): number {
    this.prune();
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  /** Drop expired entries from the old end. */
  private prune(): void {
    if (this.ttlMs === undefined) return;
    const nowMs = Date.now();
    for (const [id, recordedAt] of this.entries) {
      if (!this.isExpired(recordedAt, nowMs)) break;
      this.entries.delete(id);
    }
  }

  private isExpired(recordedAt: number, nowMs: number): boolean {
    return this.ttlMs !== undefined && nowMs - recordedAt >= this.ttlMs;
  }
}
