import type { AgentId, FabricConfig, Logger } from '@parley/core';
import { DEFAULT_FABRIC_CONFIG, createConsoleLogger } from '@parley/core';
import { RequestReply } from './request-reply.js';
import { Router } from './router.js';

export interface FabricOptions {
  /** Typically from `loadFabricConfig`. Default: DEFAULT_FABRIC_CONFIG. */
  config?: FabricConfig;
  /** Default: console logger at `config.logging.level`. */
  logger?: Logger;
}

/**
 * One independent delivery fabric: a router configured from FabricConfig
 * and the logger its parts share. Fabrics never see each other's agents.
 */
export class Fabric {
  readonly config: FabricConfig;
  readonly logger: Logger;
  readonly router: Router;

  constructor(options: FabricOptions = {}) {
    this.config = options.config ?? DEFAULT_FABRIC_CONFIG;
    this.logger = options.logger ?? createConsoleLogger({ level: this.config.logging.level });
    this.router = new Router({
      mailbox: this.config.mailbox,
      history: this.config.history,
      logger: this.logger,
    });
  }

  /** Request/reply between two agents of this fabric. */
  requestReply(
    requester: AgentId,
    responder: AgentId,
    timeoutMs: number = this.config.requestReply.timeoutMs,
  ): RequestReply {
    return new RequestReply({
      router: this.router,
      requester,
      responder,
      timeoutMs,
      logger: this.logger,
    });
  }

  /** Deregister every agent; suspended receivers see 'closed'. */
  shutdown(): void {
    this.router.close();
    this.logger.info('Fabric shut down');
  }
}

export function createFabric(options: FabricOptions = {}): Fabric {
  return new Fabric(options);
}
