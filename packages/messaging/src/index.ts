// Mailbox
export { Mailbox } from './mailbox.js';
export type {
  MailboxOptions,
  WaitOptions,
  SendReceipt,
  SendResult,
  ReceiveOutcome,
  MessageFilter,
} from './mailbox.js';

// Router
export { Router } from './router.js';
export type { RouterOptions, RouteResult, BroadcastResult } from './router.js';
export { DeliveryHistory } from './delivery-history.js';
export type { DeliveryHistoryOptions } from './delivery-history.js';
export { TopicRegistry } from './topic-registry.js';

// Request/reply
export { RequestReply, Exchange } from './request-reply.js';
export type {
  RequestReplyOptions,
  ReceiveRequestOptions,
  RequestOutcome,
  ReplyOutcome,
  ExchangeState,
} from './request-reply.js';

// Fabric
export { Fabric, createFabric } from './fabric.js';
export type { FabricOptions } from './fabric.js';
