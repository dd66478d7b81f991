import type { LogLevel } from './logger.js';

/** What a bounded mailbox does with a send that finds it full. */
export type OverflowPolicy = 'block' | 'drop-oldest' | 'reject';

export const OVERFLOW_POLICIES: readonly OverflowPolicy[] = ['block', 'drop-oldest', 'reject'];

/** Top-level configuration schema for a messaging fabric. */
export interface FabricConfig {
  mailbox: MailboxConfig;
  history: HistoryConfig;
  requestReply: RequestReplyConfig;
  logging: LoggingConfig;
}

/** Defaults for mailboxes the router creates on registration. */
export interface MailboxConfig {
  /** Omit for an unbounded mailbox. */
  capacity?: number;
  overflow: OverflowPolicy;
}

export interface HistoryConfig {
  /** Most recent routed ids kept for `hasRouted`. */
  capacity: number;
  /** Entries older than this read as absent. Omit to keep until evicted. */
  ttlMs?: number;
}

export interface RequestReplyConfig {
  timeoutMs: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export const DEFAULT_FABRIC_CONFIG: FabricConfig = {
  mailbox: { overflow: 'reject' },
  history: { capacity: 10_000 },
  requestReply: { timeoutMs: 30_000 },
  logging: { level: 'info' },
};
