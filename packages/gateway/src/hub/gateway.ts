/**
 * Outbound Hub
 *
 * Assembles domain sub-messages into network-bound batches, pays for relaying
 * from per-tenant subsidy, and dispatches quorum-confirmed inbound batches to
 * the domain handler.
 *
 * Invariants:
 * 1. A call to `withBatch` sends all of its batches or none of them
 * 2. Subsidy is debited by exactly the quote after a send succeeded, or by the
 *    legs already sent when it failed part way
 * 3. One failing inbound sub-message never stops its siblings
 *
 * Pending batch lifecycle:
 *   ACCUMULATING -> QUOTED -> FUNDED -> SENT
 *                      \         \
 *                       +---------+--> HELD (released by an operator)
 *
 * Not re-entrant: `withBatch`, `send`, `deposit`, `withdraw` and `releaseHeld` share one
 * serial lock, so calling any of them from inside a `withBatch` callback
 * deadlocks. Use the scope instead.
 */

import { ZeroAddress, getAddress, isAddress } from 'ethers';
import { v4 as uuidv4 } from 'uuid';
import type { Caller, NetworkId, TenantId } from '../boundaries/invariants.js';
import { InvariantViolation, assertPositiveAmount } from '../boundaries/invariants.js';
import {
  AdapterSendError,
  BatchGasLimitError,
  ConfigurationError,
  InsufficientSubsidyError,
  OutgoingBlockedError,
  UnknownDestinationError,
} from '../boundaries/errors.js';
import type { WardRegistry } from '../boundaries/authority.js';
import { assertSubMessage, pack } from '../codec/codec.js';
import { SerialQueue } from '../execution/serial-queue.js';
import type { OutboundRouter, RelayQuote, SendReceipt } from '../multi-adapter/types.js';
import type { Logger } from '../utils/logger.js';
import { SilentLogger } from '../utils/logger.js';
import type { HeldReason, RelayMetrics } from '../observability/metrics.js';
import { NoOpMetrics } from '../observability/metrics.js';
import type { FailedMessageStore } from './failures.js';
import { InMemoryFailedMessageStore } from './failures.js';
import type { GasService } from './gas.js';
import { DEFAULT_MAX_BATCH_GAS_LIMIT, DEFAULT_MESSAGE_GAS, FlatGasService } from './gas.js';
import type { HeldBatchStore } from './held.js';
import { InMemoryHeldBatchStore } from './held.js';
import type { SubsidyAccount, SubsidyStore } from './subsidy.js';
import { InMemorySubsidyStore } from './subsidy.js';
import type {
  BatchResult,
  BatchScope,
  FailedMessage,
  FlushReceipt,
  HeldBatch,
  MessageHandler,
  PendingBatch,
  RetryResult,
} from './types.js';

// =============================================================================
// OPTIONS
// =============================================================================

export interface GatewayOptions {
  router: OutboundRouter;
  wards: WardRegistry;
  subsidy?: SubsidyStore;
  gas?: GasService;
  held?: HeldBatchStore;
  failures?: FailedMessageStore;
  maxBatchGasLimit?: bigint;
  /** Refund address for tenants that never set one */
  defaultRefund?: string;
  logger?: Logger;
  metrics?: RelayMetrics;
  now?: () => number;
}

/**
 * A packed batch on its way out. `heldId` is set when it comes from the
 * held store, so holding it again keeps its id.
 */
interface OutgoingBatch {
  destination: NetworkId;
  tenant: TenantId;
  batch: Uint8Array;
  messageCount: number;
  gasLimit: bigint;
  heldId?: string;
}

const OUTBOUND_LOCK = 'outbound';

// =============================================================================
// GATEWAY
// =============================================================================

export class Gateway {
  private router: OutboundRouter;
  private wards: WardRegistry;
  private subsidy: SubsidyStore;
  private gas: GasService;
  private held: HeldBatchStore;
  private failures: FailedMessageStore;
  private maxBatchGasLimit: bigint;
  private defaultRefund: string;
  private logger: Logger;
  private metrics: RelayMetrics;
  private now: () => number;

  private queue: SerialQueue = new SerialQueue();
  private blocked: Set<string> = new Set();
  private messageHandler: MessageHandler | null = null;

  constructor(options: GatewayOptions) {
    this.router = options.router;
    this.wards = options.wards;
    this.subsidy = options.subsidy ?? new InMemorySubsidyStore();
    this.gas = options.gas ?? new FlatGasService(DEFAULT_MESSAGE_GAS);
    this.held = options.held ?? new InMemoryHeldBatchStore();
    this.failures = options.failures ?? new InMemoryFailedMessageStore();
    this.maxBatchGasLimit = options.maxBatchGasLimit ?? DEFAULT_MAX_BATCH_GAS_LIMIT;
    this.defaultRefund = options.defaultRefund ?? ZeroAddress;
    this.logger = (options.logger ?? new SilentLogger()).child({ component: 'gateway' });
    this.metrics = options.metrics ?? new NoOpMetrics();
    this.now = options.now ?? Date.now;
  }

  // ===========================================================================
  // OUTBOUND
  // ===========================================================================

  /**
   * Run `fn` with a batching scope, then quote, fund and send every batch it
   * produced, in first-use order. Nothing is sent if `fn` throws.
   */
  async withBatch<T>(fn: (scope: BatchScope) => Promise<T>): Promise<BatchResult<T>> {
    return this.queue.run(OUTBOUND_LOCK, async () => {
      const pending = new Map<string, PendingBatch>();
      let open = true;

      const scope: BatchScope = {
        send: (destination, tenant, message) => {
          if (!open) {
            throw new ConfigurationError('BATCH_CLOSED', 'Batch scope used after its callback settled');
          }
          this.accumulate(pending, destination, tenant, message);
        },
      };

      let value: T;
      try {
        value = await fn(scope);
      } finally {
        open = false;
      }

      const outgoing = Array.from(pending.values()).map((batch) => ({
        destination: batch.destination,
        tenant: batch.tenant,
        batch: pack(batch.messages),
        messageCount: batch.messages.length,
        gasLimit: batch.gasLimit,
      }));

      const receipts = await this.fundAndSend(outgoing);
      return { value, receipts };
    });
  }

  /**
   * Eager single-message batch.
   */
  async send(destination: NetworkId, tenant: TenantId, message: Uint8Array): Promise<FlushReceipt> {
    const { receipts } = await this.withBatch(async (scope) => {
      scope.send(destination, tenant, message);
    });
    const [receipt] = receipts;
    if (!receipt) {
      throw new InvariantViolation('EAGER_SEND', 'Single-message batch produced no receipt');
    }
    return receipt;
  }

  async heldBatches(): Promise<HeldBatch[]> {
    return this.held.list();
  }

  /**
   * Re-quote, re-fund and re-send a held batch. On failure it is held again
   * under the same id.
   */
  async releaseHeld(id: string): Promise<FlushReceipt> {
    return this.queue.run(OUTBOUND_LOCK, async () => {
      const held = await this.held.get(id);
      if (!held) {
        throw new ConfigurationError('UNKNOWN_HELD_BATCH', `No held batch ${id}`);
      }
      if (this.isOutgoingBlocked(held.destination, held.tenant)) {
        throw new OutgoingBlockedError(held.destination, held.tenant);
      }

      await this.held.remove(id);
      this.logger.info({ network: held.destination, heldId: id, reason: held.reason }, 'Releasing held batch');

      const [receipt] = await this.fundAndSend([
        {
          destination: held.destination,
          tenant: held.tenant,
          batch: held.batch,
          messageCount: held.messageCount,
          gasLimit: held.gasLimit,
          heldId: id,
        },
      ]);
      if (!receipt) {
        throw new InvariantViolation('RELEASE_HELD', `Held batch ${id} produced no receipt`);
      }
      return receipt;
    });
  }

  blockOutgoing(by: Caller, destination: NetworkId, tenant: TenantId, blocked: boolean): void {
    this.wards.requireWard(by, 'block outgoing messages');
    const key = routeKey(destination, tenant);
    if (blocked) {
      this.blocked.add(key);
    } else {
      this.blocked.delete(key);
    }
    this.logger.info({ network: destination, tenant, blocked }, 'Outgoing block updated');
  }

  isOutgoingBlocked(destination: NetworkId, tenant: TenantId): boolean {
    return this.blocked.has(routeKey(destination, tenant));
  }

  // ===========================================================================
  // SUBSIDY
  // ===========================================================================

  /**
   * Open to anyone. Returns the new balance.
   */
  async deposit(tenant: TenantId, amount: bigint): Promise<bigint> {
    assertPositiveAmount(amount, 'Deposit');

    return this.queue.run(OUTBOUND_LOCK, async () => {
      const balance = await this.subsidy.credit(tenant, amount);
      this.logger.info({ tenant, amount, balance }, 'Subsidy deposited');
      return balance;
    });
  }

  async withdraw(by: Caller, tenant: TenantId, amount: bigint): Promise<bigint> {
    this.wards.requireWard(by, 'withdraw subsidy');
    assertPositiveAmount(amount, 'Withdrawal');

    return this.queue.run(OUTBOUND_LOCK, async () => {
      const balance = await this.subsidy.debit(tenant, amount);
      if (balance === null) {
        const account = await this.subsidy.account(tenant);
        throw new InsufficientSubsidyError(tenant, amount, account.balance);
      }
      this.logger.info({ tenant, amount, balance, by }, 'Subsidy withdrawn');
      return balance;
    });
  }

  async setRefundAddress(by: Caller, tenant: TenantId, address: string): Promise<void> {
    this.wards.requireWard(by, 'set refund address');
    if (!isAddress(address)) {
      throw new ConfigurationError('INVALID_REFUND_ADDRESS', `Not an address: ${address}`);
    }
    await this.subsidy.setRefund(tenant, getAddress(address));
  }

  async balance(tenant: TenantId): Promise<bigint> {
    const account = await this.subsidy.account(tenant);
    return account.balance;
  }

  async account(tenant: TenantId): Promise<SubsidyAccount> {
    return this.subsidy.account(tenant);
  }

  // ===========================================================================
  // INBOUND
  // ===========================================================================

  setMessageHandler(handler: MessageHandler): void {
    this.messageHandler = handler;
  }

  /**
   * Dispatch a quorum-confirmed batch, one sub-message at a time, in order.
   */
  async handleBatch(source: NetworkId, messages: readonly Uint8Array[]): Promise<void> {
    for (const message of messages) {
      await this.dispatch(source, message);
    }
  }

  /**
   * Re-dispatch a sub-message that failed before.
   */
  async retry(source: NetworkId, message: Uint8Array): Promise<RetryResult> {
    const failure = await this.failures.get(source, message);
    if (!failure) {
      throw new ConfigurationError('NO_FAILED_MESSAGE', `No recorded failure for this message from network ${source}`);
    }

    try {
      await this.invokeHandler(source, message);
    } catch (error) {
      await this.failures.record(source, message, describe(error), this.now());
      const remaining = await this.failures.resolve(source, message);
      this.metrics.messageRetried(source, false);
      this.logger.warn({ network: source, messageHash: failure.hash, error }, 'Retry failed');
      return { succeeded: false, remaining };
    }

    const remaining = await this.failures.resolve(source, message);
    this.metrics.messageRetried(source, true);
    this.logger.info({ network: source, messageHash: failure.hash, remaining }, 'Retry succeeded');
    return { succeeded: true, remaining };
  }

  async failedCount(source: NetworkId, message: Uint8Array): Promise<number> {
    const failure = await this.failures.get(source, message);
    return failure?.count ?? 0;
  }

  async failedMessages(): Promise<FailedMessage[]> {
    return this.failures.list();
  }

  // ===========================================================================
  // PRIVATE: Accumulation
  // ===========================================================================

  private accumulate(
    pending: Map<string, PendingBatch>,
    destination: NetworkId,
    tenant: TenantId,
    message: Uint8Array
  ): void {
    assertSubMessage(message);

    if (this.isOutgoingBlocked(destination, tenant)) {
      throw new OutgoingBlockedError(destination, tenant);
    }
    if (!this.router.hasRoute(destination, tenant)) {
      throw new UnknownDestinationError(destination, tenant);
    }

    const key = routeKey(destination, tenant);
    const batch = pending.get(key) ?? { destination, tenant, messages: [], gasLimit: 0n };
    const gasLimit = batch.gasLimit + this.gas.messageGas(destination, message);
    if (gasLimit > this.maxBatchGasLimit) {
      throw new BatchGasLimitError(destination, gasLimit, this.maxBatchGasLimit);
    }

    batch.messages.push(message.slice());
    batch.gasLimit = gasLimit;
    pending.set(key, batch);

    this.metrics.messageQueued(destination);
  }

  // ===========================================================================
  // PRIVATE: Flush (always under the outbound lock)
  // ===========================================================================

  private async fundAndSend(batches: OutgoingBatch[]): Promise<FlushReceipt[]> {
    if (batches.length === 0) return [];

    // QUOTED
    const quotes: RelayQuote[] = [];
    try {
      for (const item of batches) {
        quotes.push(await this.router.quote(item.destination, item.tenant, item.batch, item.gasLimit));
      }
    } catch (error) {
      await this.holdAll(batches, 'QUOTE_FAILED');
      throw error;
    }

    // FUNDED: every tenant must cover its whole share, or nothing goes out
    const required = new Map<TenantId, bigint>();
    for (const quote of quotes) {
      required.set(quote.tenant, (required.get(quote.tenant) ?? 0n) + quote.total);
    }

    const accounts = new Map<TenantId, SubsidyAccount>();
    for (const [tenant, amount] of required) {
      const account = await this.subsidy.account(tenant);
      accounts.set(tenant, account);
      if (account.balance < amount) {
        const heldIds = await this.holdAll(batches, 'UNDERFUNDED');
        this.logger.warn(
          { tenant, required: amount, available: account.balance, held: heldIds.length },
          'Insufficient subsidy, batches held'
        );
        throw new InsufficientSubsidyError(tenant, amount, account.balance, heldIds);
      }
    }

    // SENT
    const receipts: FlushReceipt[] = [];
    for (const [index, item] of batches.entries()) {
      const quote = quotes[index];
      if (!quote) {
        throw new InvariantViolation('QUOTE_PER_BATCH', `Missing quote for batch ${index}`);
      }
      const refund = accounts.get(item.tenant)?.refund ?? this.defaultRefund;

      let sent: SendReceipt;
      try {
        sent = await this.router.sendQuoted(quote, refund);
      } catch (error) {
        await this.holdAll(batches.slice(index), 'SEND_FAILED');
        await this.chargeDeliveredLegs(quote, error);
        throw error;
      }

      const balance = await this.subsidy.debit(item.tenant, quote.total);
      if (balance === null) {
        await this.holdAll(batches.slice(index + 1), 'SEND_FAILED');
        throw new InvariantViolation(
          'SUBSIDY_CONSERVATION',
          `Tenant ${item.tenant} could not be debited ${quote.total} after a funded send`
        );
      }

      this.metrics.batchSent(item.destination, item.messageCount, quote.total);
      this.metrics.subsidyDebited(item.tenant, quote.total);
      this.logger.info(
        { network: item.destination, hash: quote.hash, tenant: item.tenant, cost: quote.total, balance },
        'Batch sent'
      );

      receipts.push({
        destination: item.destination,
        tenant: item.tenant,
        hash: quote.hash,
        messageCount: item.messageCount,
        cost: quote.total,
        receipts: sent.receipts,
      });
    }

    return receipts;
  }

  /**
   * Legs that went out before a send failed were paid for; charge the tenant
   * for them. A later release pays every leg again.
   */
  private async chargeDeliveredLegs(quote: RelayQuote, error: unknown): Promise<void> {
    if (!(error instanceof AdapterSendError)) return;

    const delivered = new Set(error.delivered);
    const spent = quote.legs
      .filter((leg) => delivered.has(leg.adapter.id))
      .reduce((sum, leg) => sum + leg.cost, 0n);
    if (spent === 0n) return;

    const balance = await this.subsidy.debit(quote.tenant, spent);
    if (balance === null) {
      throw new InvariantViolation(
        'SUBSIDY_CONSERVATION',
        `Tenant ${quote.tenant} could not be debited ${spent} for legs already sent`
      );
    }

    this.metrics.subsidyDebited(quote.tenant, spent);
    this.logger.warn(
      { network: quote.destination, hash: quote.hash, tenant: quote.tenant, cost: spent, balance, sent: error.delivered },
      'Partial send charged'
    );
  }

  private async holdAll(batches: OutgoingBatch[], reason: HeldReason): Promise<string[]> {
    const ids: string[] = [];
    for (const item of batches) {
      const id = item.heldId ?? uuidv4();
      await this.held.add({
        id,
        destination: item.destination,
        tenant: item.tenant,
        batch: item.batch,
        messageCount: item.messageCount,
        gasLimit: item.gasLimit,
        reason,
        createdAt: this.now(),
      });
      this.metrics.batchHeld(item.destination, reason);
      ids.push(id);
    }
    return ids;
  }

  // ===========================================================================
  // PRIVATE: Dispatch
  // ===========================================================================

  private async dispatch(source: NetworkId, message: Uint8Array): Promise<void> {
    try {
      await this.invokeHandler(source, message);
      this.metrics.messageDispatched(source);
    } catch (error) {
      const count = await this.failures.record(source, message, describe(error), this.now());
      this.metrics.messageFailed(source);
      this.logger.warn({ network: source, failures: count, error }, 'Message handler failed');
    }
  }

  private async invokeHandler(source: NetworkId, message: Uint8Array): Promise<void> {
    if (!this.messageHandler) {
      throw new ConfigurationError('NO_MESSAGE_HANDLER', 'No message handler registered');
    }
    await this.messageHandler(source, message);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function routeKey(destination: NetworkId, tenant: TenantId): string {
  return `${destination}:${tenant}`;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
