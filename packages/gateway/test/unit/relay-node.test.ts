/**
 * Relay Node Tests
 *
 * Two nodes joined by three loopback transports. Proves:
 * - Sub-messages sent on one network reach the handler on the other, in order
 * - A lost payload leg leaves the batch stuck until an operator recovers it
 * - A corrupted payload leg never reaches the handler
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createRelayNode } from '../../src/node.js';
import type { RelayNode } from '../../src/node.js';
import { LoopbackAdapter } from '../../src/adapters/loopback-adapter.js';
import { batchHash, pack } from '../../src/codec/codec.js';
import { GLOBAL_TENANT, adapterId, caller, networkId } from '../../src/boundaries/invariants.js';
import type { NetworkId } from '../../src/boundaries/invariants.js';
import { bytes } from '../fakes.js';

const OP = caller('operator');
const NET_1 = networkId(1);
const NET_2 = networkId(2);

const M1 = bytes(7, 1);
const M2 = bytes(7, 2, 2);

let sender: RelayNode;
let receiver: RelayNode;
let outbound: LoopbackAdapter[];
let received: Array<[NetworkId, number[]]>;

beforeEach(async () => {
  received = [];
  sender = createRelayNode({ localNetwork: NET_1, wards: [OP] });
  receiver = createRelayNode({
    localNetwork: NET_2,
    wards: [OP],
    messageHandler: async (source, message) => {
      received.push([source, Array.from(message)]);
    },
  });

  outbound = [];
  const inbound: LoopbackAdapter[] = [];
  for (const name of ['alpha', 'beta', 'gamma']) {
    const out = new LoopbackAdapter(adapterId(name), NET_1, { baseFee: 1n });
    const back = new LoopbackAdapter(adapterId(name), NET_2);
    out.connect(back);
    outbound.push(out);
    inbound.push(back);
  }

  sender.router.setAdapters(OP, NET_2, GLOBAL_TENANT, outbound, { threshold: 2 });
  receiver.router.setAdapters(OP, NET_1, GLOBAL_TENANT, inbound, { threshold: 2 });
  await sender.gateway.deposit(GLOBAL_TENANT, 100n);

  await sender.gateway.withBatch(async (scope) => {
    scope.send(NET_2, GLOBAL_TENANT, M1);
    scope.send(NET_2, GLOBAL_TENANT, M2);
  });
});

function transport(index: number): LoopbackAdapter {
  const adapter = outbound[index];
  if (!adapter) throw new Error(`No transport ${index}`);
  return adapter;
}

describe('Relay node end to end', () => {
  it('should charge the sender one fee per transport', async () => {
    expect(await sender.gateway.balance(GLOBAL_TENANT)).toBe(97n);
    expect(outbound.map((adapter) => adapter.pending().length)).toEqual([1, 1, 1]);
  });

  it('should deliver the sub-messages once two transports agree', async () => {
    await transport(0).deliverAll();
    expect(received).toEqual([]);

    await transport(1).deliverAll();
    expect(received).toEqual([
      [NET_1, [7, 1]],
      [NET_1, [7, 2, 2]],
    ]);

    await transport(2).deliverAll();
    expect(received).toHaveLength(2);
  });

  it('should hold a batch whose payload leg was lost until it is recovered', async () => {
    transport(0).drop();
    await transport(1).deliverAll();
    await transport(2).deliverAll();
    expect(received).toEqual([]);

    const batch = pack([M1, M2]);
    const view = await receiver.router.votes(NET_1, batchHash(batch));
    expect(view).toMatchObject({ status: 'awaiting_payload', countedVotes: 2 });

    const outcome = await receiver.router.recover(OP, NET_1, batch);

    expect(outcome).toEqual({ status: 'delivered', hash: batchHash(batch), messageCount: 2 });
    expect(received).toHaveLength(2);
  });

  it('should never forward a corrupted payload', async () => {
    transport(0).corruptNext((payload) => {
      payload[payload.length - 1] = 0xee;
      return payload;
    });

    await transport(0).deliverAll();
    await transport(1).deliverAll();
    await transport(2).deliverAll();

    expect(received).toEqual([]);
    const pending = await receiver.router.pendingVotes(NET_1);
    expect(pending.map((view) => [view.status, view.countedVotes])).toEqual([
      ['pending', 1],
      ['awaiting_payload', 2],
    ]);
  });
});
