/**
 * Quorum Router
 *
 * Fans outbound batches across a set of independent adapters and forwards an
 * inbound batch only once enough of them agree on its hash.
 *
 * Invariants:
 * 1. A (source, hash) is forwarded at most once; `delivered` is terminal
 * 2. Forwarding requires `threshold` distinct registered voters AND the payload
 * 3. Each adapter votes at most once per hash
 * 4. Vote order across adapters does not matter
 * 5. Recovery supplies payload, never a vote
 * 6. Deliveries reach the inbound handler in the order quorum was reached
 *
 * Critical:
 * - Adapter identity comes from the receiver closure bound at attach time,
 *   never from inbound bytes
 * - The inbound handler MUST NOT call back into `handle` for the same source
 */

import type { AdapterId, Caller, NetworkId, PayloadHash, TenantId } from '../boundaries/invariants.js';
import { GLOBAL_TENANT } from '../boundaries/invariants.js';
import {
  AdapterSendError,
  ConfigurationError,
  UnauthorizedAdapterError,
  UnknownDestinationError,
} from '../boundaries/errors.js';
import type { WardRegistry } from '../boundaries/authority.js';
import type { AdapterReceipt, RelayAdapter } from '../adapters/types.js';
import { batchHash, decodeFrame, packProof, unpack } from '../codec/codec.js';
import { SerialQueue } from '../execution/serial-queue.js';
import type { TimeoutConfig } from '../execution/timeout.js';
import { DEFAULT_TIMEOUT_CONFIG, getAdapterTimeout, withTimeout } from '../execution/timeout.js';
import type { Logger } from '../utils/logger.js';
import { SilentLogger } from '../utils/logger.js';
import type { RelayMetrics } from '../observability/metrics.js';
import { NoOpMetrics } from '../observability/metrics.js';
import type { VoteStore } from './persistence.js';
import { InMemoryVoteStore } from './persistence.js';
import type {
  AdapterRegistration,
  HandleOutcome,
  InboundBatchHandler,
  OutboundRouter,
  QuoteLeg,
  RegistrationParams,
  RelayQuote,
  SendReceipt,
  TenantResolver,
  VoteRecord,
  VoteView,
} from './types.js';
import { MAX_ADAPTER_COUNT } from './types.js';

// =============================================================================
// OPTIONS
// =============================================================================

export interface MultiAdapterOptions {
  /** Network this router lives on */
  localNetwork: NetworkId;
  wards: WardRegistry;
  store?: VoteStore;
  /** Tenant whose registration judges an inbound batch. Default: global. */
  tenantResolver?: TenantResolver;
  timeouts?: TimeoutConfig;
  logger?: Logger;
  metrics?: RelayMetrics;
  now?: () => number;
}

interface RecordResult {
  outcome: HandleOutcome;
  delivery: Promise<void> | null;
}

const globalTenant: TenantResolver = () => GLOBAL_TENANT;

// =============================================================================
// MULTI ADAPTER
// =============================================================================

export class MultiAdapter implements OutboundRouter {
  readonly localNetwork: NetworkId;
  private wards: WardRegistry;
  private store: VoteStore;
  private tenantResolver: TenantResolver;
  private timeouts: TimeoutConfig;
  private logger: Logger;
  private metrics: RelayMetrics;
  private now: () => number;

  private registrations: Map<string, AdapterRegistration> = new Map();
  private attached: Map<AdapterId, RelayAdapter> = new Map();
  private nextSessionId: number = 1;
  private inboundHandler: InboundBatchHandler | null = null;
  private queue: SerialQueue = new SerialQueue();
  private deliveries: Promise<void> = Promise.resolve();

  constructor(options: MultiAdapterOptions) {
    this.localNetwork = options.localNetwork;
    this.wards = options.wards;
    this.store = options.store ?? new InMemoryVoteStore();
    this.tenantResolver = options.tenantResolver ?? globalTenant;
    this.timeouts = options.timeouts ?? DEFAULT_TIMEOUT_CONFIG;
    this.logger = (options.logger ?? new SilentLogger()).child({
      component: 'multi-adapter',
      local: options.localNetwork,
    });
    this.metrics = options.metrics ?? new NoOpMetrics();
    this.now = options.now ?? Date.now;
  }

  // ===========================================================================
  // REGISTRATION
  // ===========================================================================

  /**
   * Atomically replace the adapters serving (remote, tenant).
   */
  setAdapters(
    by: Caller,
    remote: NetworkId,
    tenant: TenantId,
    adapters: readonly RelayAdapter[],
    params: RegistrationParams
  ): AdapterRegistration {
    this.wards.requireWard(by, 'set adapters');

    if (remote === this.localNetwork) {
      throw new ConfigurationError('SELF_ROUTE', `Network ${remote} is the local network`);
    }
    if (adapters.length === 0 || adapters.length > MAX_ADAPTER_COUNT) {
      throw new ConfigurationError(
        'INVALID_ADAPTER_COUNT',
        `Expected 1 to ${MAX_ADAPTER_COUNT} adapters, got ${adapters.length}`
      );
    }

    const ids = new Set(adapters.map((adapter) => adapter.id));
    if (ids.size !== adapters.length) {
      throw new ConfigurationError('DUPLICATE_ADAPTER', 'Adapters in a registration must be distinct');
    }
    for (const adapter of adapters) {
      const existing = this.attached.get(adapter.id);
      if (existing && existing !== adapter) {
        throw new ConfigurationError(
          'ADAPTER_ID_CONFLICT',
          `Adapter id ${adapter.id} is already bound to a different adapter`
        );
      }
    }

    const recoveryIndex = params.recoveryIndex ?? adapters.length;
    const primaryIndex = params.primaryIndex ?? 0;
    const { threshold } = params;

    if (!Number.isInteger(recoveryIndex) || recoveryIndex < 1 || recoveryIndex > adapters.length) {
      throw new ConfigurationError(
        'INVALID_RECOVERY_INDEX',
        `Recovery index must be in [1, ${adapters.length}], got ${recoveryIndex}`
      );
    }
    if (!Number.isInteger(threshold) || threshold < 1 || threshold > recoveryIndex) {
      throw new ConfigurationError(
        'INVALID_THRESHOLD',
        `Threshold must be in [1, ${recoveryIndex}], got ${threshold}`
      );
    }
    if (!Number.isInteger(primaryIndex) || primaryIndex < 0 || primaryIndex >= recoveryIndex) {
      throw new ConfigurationError(
        'INVALID_PRIMARY_INDEX',
        `Primary index must be in [0, ${recoveryIndex - 1}], got ${primaryIndex}`
      );
    }

    const registration: AdapterRegistration = {
      remote,
      tenant,
      adapters: [...adapters],
      threshold,
      recoveryIndex,
      primaryIndex,
      sessionId: this.nextSessionId++,
    };

    for (const adapter of adapters) {
      if (!this.attached.has(adapter.id)) {
        this.attached.set(adapter.id, adapter);
        const id = adapter.id;
        adapter.attach(async (source, payload) => {
          await this.handle(id, source, payload);
        });
      }
    }

    this.registrations.set(registrationKey(remote, tenant), registration);

    this.logger.info(
      {
        remote,
        tenant,
        adapters: adapters.map((adapter) => adapter.id),
        threshold,
        recoveryIndex,
        sessionId: registration.sessionId,
      },
      'Adapters registered'
    );

    return registration;
  }

  /**
   * Drop the registration for (remote, tenant). Returns false if there was none.
   */
  removeAdapters(by: Caller, remote: NetworkId, tenant: TenantId): boolean {
    this.wards.requireWard(by, 'remove adapters');
    const removed = this.registrations.delete(registrationKey(remote, tenant));
    if (removed) {
      this.logger.info({ remote, tenant }, 'Adapters removed');
    }
    return removed;
  }

  /**
   * Exact registration for (remote, tenant), without fallback.
   */
  registration(remote: NetworkId, tenant: TenantId): AdapterRegistration | null {
    return this.registrations.get(registrationKey(remote, tenant)) ?? null;
  }

  /**
   * Registration that applies to (remote, tenant): the tenant's own, else the
   * global one.
   */
  resolve(remote: NetworkId, tenant: TenantId): AdapterRegistration | null {
    return this.registration(remote, tenant) ?? this.registration(remote, GLOBAL_TENANT);
  }

  hasRoute(destination: NetworkId, tenant: TenantId): boolean {
    return this.resolve(destination, tenant) !== null;
  }

  // ===========================================================================
  // OUTBOUND
  // ===========================================================================

  /**
   * Price a batch across every sending adapter. The primary leg carries the
   * batch; every other sending adapter carries its proof.
   */
  async quote(
    destination: NetworkId,
    tenant: TenantId,
    batch: Uint8Array,
    gasLimit: bigint
  ): Promise<RelayQuote> {
    const registration = this.resolve(destination, tenant);
    if (!registration) {
      throw new UnknownDestinationError(destination, tenant);
    }

    // Never hand a malformed batch to a transport
    unpack(batch);

    const hash = batchHash(batch);
    const proof = packProof(hash);
    const sending = sendingOrder(registration);

    const legs: QuoteLeg[] = await Promise.all(
      sending.map(async (adapter): Promise<QuoteLeg> => {
        const role = adapter === registration.adapters[registration.primaryIndex] ? 'payload' : 'proof';
        const frame = role === 'payload' ? batch : proof;
        const cost = await withTimeout(
          () => adapter.estimate(destination, frame, gasLimit),
          getAdapterTimeout(this.timeouts, 'estimate'),
          adapter.id,
          'estimate'
        );
        return { adapter, role, frame, cost };
      })
    );

    const total = legs.reduce((sum, leg) => sum + leg.cost, 0n);

    return {
      destination,
      tenant,
      hash,
      gasLimit,
      sessionId: registration.sessionId,
      legs,
      total,
    };
  }

  /**
   * Send exactly the legs of `quote`, primary first, paying each adapter its
   * quoted cost. Stops at the first failing leg.
   */
  async sendQuoted(quote: RelayQuote, refund: string): Promise<SendReceipt> {
    const registration = this.resolve(quote.destination, quote.tenant);
    if (!registration) {
      throw new UnknownDestinationError(quote.destination, quote.tenant);
    }
    if (registration.sessionId !== quote.sessionId) {
      throw new ConfigurationError(
        'STALE_QUOTE',
        `Registration for network ${quote.destination} changed since the quote was taken`
      );
    }

    const receipts: AdapterReceipt[] = [];
    for (const leg of quote.legs) {
      try {
        const receipt = await withTimeout(
          () =>
            leg.adapter.send({
              destination: quote.destination,
              payload: leg.frame,
              gasLimit: quote.gasLimit,
              refund,
              payment: leg.cost,
            }),
          getAdapterTimeout(this.timeouts, 'send'),
          leg.adapter.id,
          'send'
        );
        receipts.push(receipt);
      } catch (error) {
        this.logger.warn(
          { network: quote.destination, hash: quote.hash, adapter: leg.adapter.id, error },
          'Adapter send failed'
        );
        throw new AdapterSendError(
          leg.adapter.id,
          receipts.map((receipt) => receipt.adapter),
          error
        );
      }
    }

    this.logger.info(
      { network: quote.destination, hash: quote.hash, tenant: quote.tenant, cost: quote.total },
      'Batch relayed'
    );

    return {
      destination: quote.destination,
      tenant: quote.tenant,
      hash: quote.hash,
      cost: quote.total,
      receipts,
    };
  }

  async send(
    destination: NetworkId,
    tenant: TenantId,
    batch: Uint8Array,
    gasLimit: bigint,
    refund: string
  ): Promise<SendReceipt> {
    const quote = await this.quote(destination, tenant, batch, gasLimit);
    return this.sendQuoted(quote, refund);
  }

  // ===========================================================================
  // INBOUND
  // ===========================================================================

  setInboundHandler(handler: InboundBatchHandler): void {
    this.inboundHandler = handler;
  }

  /**
   * Count one adapter's frame (full batch or proof) toward quorum.
   *
   * Resolves once the vote is stored and, if it completed quorum, once the
   * batch has been forwarded.
   */
  async handle(adapter: AdapterId, source: NetworkId, bytes: Uint8Array): Promise<HandleOutcome> {
    const { outcome, delivery } = await this.queue.run(inboundKey(source), () =>
      this.recordVote(adapter, source, bytes)
    );
    if (delivery) {
      await delivery;
    }
    return outcome;
  }

  /**
   * Supply the payload of a batch whose payload leg was lost. Adds no vote:
   * delivery still requires quorum from adapters.
   */
  async recover(by: Caller, source: NetworkId, payload: Uint8Array): Promise<HandleOutcome> {
    this.wards.requireWard(by, 'recover payload');

    const { outcome, delivery } = await this.queue.run(inboundKey(source), () =>
      this.recordRecovery(source, payload)
    );
    if (delivery) {
      await delivery;
    }
    return outcome;
  }

  async votes(source: NetworkId, hash: PayloadHash): Promise<VoteView | null> {
    const record = await this.store.load(source, hash);
    return record ? this.toView(source, record) : null;
  }

  async pendingVotes(source: NetworkId): Promise<VoteView[]> {
    const records = await this.store.findUndelivered(source);
    return records.map((record) => this.toView(source, record));
  }

  // ===========================================================================
  // PRIVATE: Vote Accounting (always under the inbound lock)
  // ===========================================================================

  private async recordVote(adapter: AdapterId, source: NetworkId, bytes: Uint8Array): Promise<RecordResult> {
    this.requireInboundHandler();

    if (!this.isRegisteredFor(adapter, source)) {
      throw new UnauthorizedAdapterError(adapter, source);
    }

    const frame = decodeFrame(bytes);
    const existing = await this.store.load(source, frame.hash);

    if (existing?.status === 'delivered') {
      this.metrics.voteIgnored(source, 'delivered');
      this.logger.debug({ network: source, hash: frame.hash, adapter }, 'Vote after delivery ignored');
      return { outcome: { status: 'already_delivered', hash: frame.hash }, delivery: null };
    }

    const storedPayload = existing?.status === 'pending' ? existing.payload : null;
    const payload = storedPayload ?? (frame.kind === 'batch' ? frame.payload : null);
    const voters = existing?.voters ?? [];
    const alreadyVoted = voters.includes(adapter);

    if (alreadyVoted && payload === storedPayload) {
      this.metrics.voteIgnored(source, 'duplicate');
      return { outcome: { status: 'duplicate', hash: frame.hash }, delivery: null };
    }

    if (!alreadyVoted) {
      this.metrics.voteRecorded(source, adapter);
      this.logger.debug({ network: source, hash: frame.hash, adapter, kind: frame.kind }, 'Vote recorded');
    }

    return this.settle(
      source,
      frame.hash,
      alreadyVoted ? voters : [...voters, adapter],
      payload,
      existing?.firstSeenAt ?? this.now()
    );
  }

  private async recordRecovery(source: NetworkId, payload: Uint8Array): Promise<RecordResult> {
    this.requireInboundHandler();

    unpack(payload);
    const hash = batchHash(payload);
    const existing = await this.store.load(source, hash);

    if (existing?.status === 'delivered') {
      return { outcome: { status: 'already_delivered', hash }, delivery: null };
    }
    if (existing?.status === 'pending' && existing.payload) {
      return { outcome: { status: 'duplicate', hash }, delivery: null };
    }

    this.metrics.payloadRecovered(source);
    this.logger.info({ network: source, hash, votes: existing?.voters.length ?? 0 }, 'Payload recovered');

    return this.settle(source, hash, existing?.voters ?? [], payload.slice(), existing?.firstSeenAt ?? this.now());
  }

  /**
   * Store the new state of (source, hash) and, on quorum with payload, queue
   * the delivery behind every earlier one.
   */
  private async settle(
    source: NetworkId,
    hash: PayloadHash,
    voters: AdapterId[],
    payload: Uint8Array | null,
    firstSeenAt: number
  ): Promise<RecordResult> {
    const messages = payload ? unpack(payload) : null;
    const registration = this.judgingRegistration(source, messages);
    const counted = countVotes(voters, registration);
    const quorum = registration !== null && counted >= registration.threshold;

    if (!quorum) {
      await this.store.save(source, { status: 'pending', hash, voters, payload, firstSeenAt });
      return { outcome: { status: 'recorded', hash, countedVotes: counted }, delivery: null };
    }

    if (!messages) {
      await this.store.save(source, { status: 'awaiting_payload', hash, voters, firstSeenAt });
      this.logger.info({ network: source, hash, votes: counted }, 'Quorum reached, awaiting payload');
      return { outcome: { status: 'recorded', hash, countedVotes: counted }, delivery: null };
    }

    await this.store.save(source, {
      status: 'delivered',
      hash,
      voters,
      firstSeenAt,
      deliveredAt: this.now(),
    });

    this.metrics.batchDelivered(source, messages.length, counted);
    this.logger.info({ network: source, hash, votes: counted, messages: messages.length }, 'Batch delivered');

    const delivery = this.enqueueDelivery(source, hash, messages);
    return { outcome: { status: 'delivered', hash, messageCount: messages.length }, delivery };
  }

  private enqueueDelivery(source: NetworkId, hash: PayloadHash, messages: Uint8Array[]): Promise<void> {
    const handler = this.requireInboundHandler();
    const delivery = this.deliveries.then(() => handler(source, messages));
    this.deliveries = delivery.catch((error: unknown) => {
      this.logger.error({ network: source, hash, error }, 'Inbound handler failed');
    });
    return delivery;
  }

  private requireInboundHandler(): InboundBatchHandler {
    if (!this.inboundHandler) {
      throw new ConfigurationError('NO_INBOUND_HANDLER', 'No inbound handler registered');
    }
    return this.inboundHandler;
  }

  private isRegisteredFor(adapter: AdapterId, source: NetworkId): boolean {
    for (const registration of this.registrations.values()) {
      if (registration.remote === source && registration.adapters.some((a) => a.id === adapter)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Without a payload the tenant is unknown, so the global registration
   * decides whether a record is merely awaiting its payload.
   */
  private judgingRegistration(
    source: NetworkId,
    messages: readonly Uint8Array[] | null
  ): AdapterRegistration | null {
    const tenant = messages ? this.tenantResolver(source, messages) : GLOBAL_TENANT;
    return this.resolve(source, tenant);
  }

  private toView(source: NetworkId, record: VoteRecord): VoteView {
    const payload = record.status === 'pending' ? record.payload : null;
    const registration = this.judgingRegistration(source, payload ? unpack(payload) : null);

    return {
      source,
      hash: record.hash,
      status: record.status,
      voters: [...record.voters],
      countedVotes: countVotes(record.voters, registration),
      threshold: registration?.threshold ?? null,
      hasPayload: payload !== null,
      firstSeenAt: record.firstSeenAt,
      deliveredAt: record.status === 'delivered' ? record.deliveredAt : null,
    };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function registrationKey(remote: NetworkId, tenant: TenantId): string {
  return `${remote}:${tenant}`;
}

function inboundKey(source: NetworkId): string {
  return `inbound:${source}`;
}

/**
 * Sending adapters (index < recoveryIndex), primary first.
 */
function sendingOrder(registration: AdapterRegistration): RelayAdapter[] {
  const sending = registration.adapters.slice(0, registration.recoveryIndex);
  const primary = sending[registration.primaryIndex];
  return primary ? [primary, ...sending.filter((adapter) => adapter !== primary)] : sending;
}

function countVotes(voters: readonly AdapterId[], registration: AdapterRegistration | null): number {
  if (!registration) return 0;
  const members = new Set(registration.adapters.map((adapter) => adapter.id));
  return voters.filter((voter) => members.has(voter)).length;
}
