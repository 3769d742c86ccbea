/**
 * Operator HTTP API
 *
 * Thin controllers - validate input, call the router or the hub, return state.
 * No business logic here.
 *
 * Byte strings travel as 0x-prefixed hex; amounts and tenant ids as decimal
 * strings. Every POST except a subsidy deposit requires
 * `Authorization: Bearer <admin token>` and acts as the configured operator.
 */

import { timingSafeEqual } from 'crypto';
import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { getBytes, hexlify, isHexString } from 'ethers';
import type { Caller, NetworkId, TenantId } from '../boundaries/invariants.js';
import { InvariantViolation, networkId, payloadHash, tenantId } from '../boundaries/invariants.js';
import { isRelayError } from '../boundaries/errors.js';
import type { ErrorCategory } from '../boundaries/errors.js';
import type { MultiAdapter } from '../multi-adapter/multi-adapter.js';
import type { VoteView } from '../multi-adapter/types.js';
import type { Gateway } from '../hub/gateway.js';
import type { FlushReceipt, HeldBatch } from '../hub/types.js';
import type { Logger } from '../utils/logger.js';

// =============================================================================
// VALIDATION
// =============================================================================

class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

function validateDecimal(value: unknown, fieldName: string): bigint {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new ValidationError(`${fieldName} must be a decimal string`);
  }
  return BigInt(value);
}

function validateNetworkId(value: unknown, fieldName: string): NetworkId {
  if (typeof value === 'number') {
    return networkId(value);
  }
  return networkId(Number(validateDecimal(value, fieldName)));
}

function validateTenantId(value: unknown, fieldName: string): TenantId {
  return tenantId(validateDecimal(value, fieldName));
}

function validateBytes(value: unknown, fieldName: string): Uint8Array {
  if (typeof value !== 'string' || !isHexString(value) || value.length <= 2 || value.length % 2 !== 0) {
    throw new ValidationError(`${fieldName} must be non-empty 0x-prefixed hex`);
  }
  return getBytes(value);
}

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
}

// =============================================================================
// AUTH
// =============================================================================

function requireAdmin(adminToken: string) {
  const expected = Buffer.from(adminToken);

  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization ?? '';
    const presented = Buffer.from(header.startsWith('Bearer ') ? header.slice('Bearer '.length) : '');

    if (presented.length !== expected.length || !timingSafeEqual(presented, expected)) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };
}

// =============================================================================
// ROUTE FACTORY
// =============================================================================

export interface RouteDependencies {
  router: MultiAdapter;
  gateway: Gateway;
  /** Identity every authorized call is made as */
  operator: Caller;
  adminToken: string;
  logger: Logger;
}

export function createRoutes(deps: RouteDependencies): Router {
  const { router: multiAdapter, gateway, operator, logger } = deps;
  const router = Router();
  const admin = requireAdmin(deps.adminToken);

  // ===========================================================================
  // Health check
  // ===========================================================================
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', network: multiAdapter.localNetwork, timestamp: Date.now() });
  });

  // ===========================================================================
  // GET /votes/:source/:hash
  // Quorum state of one inbound batch
  // ===========================================================================
  router.get(
    '/votes/:source/:hash',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const source = validateNetworkId(req.params.source, 'source');
        const hash = payloadHash(String(req.params.hash));

        const view = await multiAdapter.votes(source, hash);
        if (!view) {
          res.status(404).json({ error: 'No votes recorded' });
          return;
        }

        res.json(toVoteResponse(view));
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // GET /votes/:source
  // Undelivered batches from a source network
  // ===========================================================================
  router.get(
    '/votes/:source',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const source = validateNetworkId(req.params.source, 'source');
        const views = await multiAdapter.pendingVotes(source);
        res.json({ votes: views.map(toVoteResponse), count: views.length });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // POST /recovery
  // Supply the payload of a stuck batch
  // ===========================================================================
  router.post(
    '/recovery',
    admin,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = bodyOf(req);
        const source = validateNetworkId(body.source, 'source');
        const payload = validateBytes(body.payload, 'payload');

        logger.info({ network: source, bytes: payload.length }, 'Recovery requested');
        const outcome = await multiAdapter.recover(operator, source, payload);

        res.json(outcome);
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // Subsidy
  // ===========================================================================
  router.get(
    '/subsidy/:tenant',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const tenant = validateTenantId(req.params.tenant, 'tenant');
        const account = await gateway.account(tenant);
        res.json({ tenant: tenant.toString(), balance: account.balance.toString(), refund: account.refund });
      } catch (error) {
        next(error);
      }
    }
  );

  router.post(
    '/subsidy/:tenant/deposit',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const tenant = validateTenantId(req.params.tenant, 'tenant');
        const amount = validateDecimal(bodyOf(req).amount, 'amount');

        const balance = await gateway.deposit(tenant, amount);
        res.json({ tenant: tenant.toString(), balance: balance.toString() });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // Held batches
  // ===========================================================================
  router.get(
    '/held',
    async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const batches = await gateway.heldBatches();
        res.json({ batches: batches.map(toHeldResponse), count: batches.length });
      } catch (error) {
        next(error);
      }
    }
  );

  router.post(
    '/held/:id/release',
    admin,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const receipt = await gateway.releaseHeld(String(req.params.id));
        res.json(toReceiptResponse(receipt));
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // POST /retry
  // Re-dispatch a failed inbound sub-message
  // ===========================================================================
  router.post(
    '/retry',
    admin,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = bodyOf(req);
        const source = validateNetworkId(body.source, 'source');
        const message = validateBytes(body.message, 'message');

        const result = await gateway.retry(source, message);
        res.json(result);
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}

// =============================================================================
// RESPONSE MAPPING
// =============================================================================

function toVoteResponse(view: VoteView) {
  return {
    source: view.source,
    hash: view.hash,
    status: view.status,
    voters: view.voters,
    counted_votes: view.countedVotes,
    threshold: view.threshold,
    has_payload: view.hasPayload,
    first_seen_at: view.firstSeenAt,
    delivered_at: view.deliveredAt,
  };
}

function toHeldResponse(batch: HeldBatch) {
  return {
    id: batch.id,
    destination: batch.destination,
    tenant: batch.tenant.toString(),
    batch: hexlify(batch.batch),
    message_count: batch.messageCount,
    gas_limit: batch.gasLimit.toString(),
    reason: batch.reason,
    created_at: batch.createdAt,
  };
}

function toReceiptResponse(receipt: FlushReceipt) {
  return {
    destination: receipt.destination,
    tenant: receipt.tenant.toString(),
    hash: receipt.hash,
    message_count: receipt.messageCount,
    cost: receipt.cost.toString(),
    receipts: receipt.receipts,
  };
}

// =============================================================================
// ERROR HANDLER
// =============================================================================

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  CONFIGURATION: 400,
  FRAMING: 400,
  FUNDING: 402,
  AUTHORIZATION: 403,
  TRANSPORT: 502,
};

export function errorHandler(logger: Logger) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      res.status(400).json({ error: err.message });
      return;
    }
    if (err instanceof InvariantViolation) {
      res.status(400).json({ error: err.details, code: err.invariant });
      return;
    }
    if (isRelayError(err)) {
      const status = STATUS_BY_CATEGORY[err.category];
      if (status >= 500) {
        logger.error({ error: err }, 'Relay operation failed');
      }
      res.status(status).json({ error: err.message, code: err.code });
      return;
    }

    logger.error({ error: err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  };
}
