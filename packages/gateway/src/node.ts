/**
 * Relay Node
 *
 * One router and one hub for a single local network, with the router's
 * inbound edge wired into the hub's dispatcher.
 */

import type { Caller, NetworkId } from './boundaries/invariants.js';
import { WardRegistry } from './boundaries/authority.js';
import type { TimeoutConfig } from './execution/timeout.js';
import { MultiAdapter } from './multi-adapter/multi-adapter.js';
import type { VoteStore } from './multi-adapter/persistence.js';
import type { TenantResolver } from './multi-adapter/types.js';
import { Gateway } from './hub/gateway.js';
import type { FailedMessageStore } from './hub/failures.js';
import type { GasService } from './hub/gas.js';
import type { HeldBatchStore } from './hub/held.js';
import type { SubsidyStore } from './hub/subsidy.js';
import type { MessageHandler } from './hub/types.js';
import type { Logger } from './utils/logger.js';
import { SilentLogger } from './utils/logger.js';
import type { RelayMetrics } from './observability/metrics.js';

export interface RelayNodeOptions {
  localNetwork: NetworkId;
  wards: Iterable<Caller>;
  messageHandler?: MessageHandler;
  tenantResolver?: TenantResolver;
  voteStore?: VoteStore;
  subsidy?: SubsidyStore;
  held?: HeldBatchStore;
  failures?: FailedMessageStore;
  gas?: GasService;
  maxBatchGasLimit?: bigint;
  defaultRefund?: string;
  timeouts?: TimeoutConfig;
  logger?: Logger;
  metrics?: RelayMetrics;
  now?: () => number;
}

export interface RelayNode {
  network: NetworkId;
  wards: WardRegistry;
  router: MultiAdapter;
  gateway: Gateway;
}

export function createRelayNode(options: RelayNodeOptions): RelayNode {
  const wards = new WardRegistry(options.wards);
  const logger = (options.logger ?? new SilentLogger()).child({ local: options.localNetwork });

  const router = new MultiAdapter({
    localNetwork: options.localNetwork,
    wards,
    store: options.voteStore,
    tenantResolver: options.tenantResolver,
    timeouts: options.timeouts,
    logger,
    metrics: options.metrics,
    now: options.now,
  });

  const gateway = new Gateway({
    router,
    wards,
    subsidy: options.subsidy,
    gas: options.gas,
    held: options.held,
    failures: options.failures,
    maxBatchGasLimit: options.maxBatchGasLimit,
    defaultRefund: options.defaultRefund,
    logger,
    metrics: options.metrics,
    now: options.now,
  });

  router.setInboundHandler((source, messages) => gateway.handleBatch(source, messages));
  if (options.messageHandler) {
    gateway.setMessageHandler(options.messageHandler);
  }

  return { network: options.localNetwork, wards, router, gateway };
}
