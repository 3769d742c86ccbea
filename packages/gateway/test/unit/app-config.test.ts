/**
 * Service Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { loadConfigFromEnv, parseAdaptersFile } from '../../src/app.js';

function configCode(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') return error.code;
    throw error;
  }
  throw new Error('Expected a coded error');
}

describe('loadConfigFromEnv', () => {
  it('should apply defaults', () => {
    const config = loadConfigFromEnv({ ADMIN_TOKEN: 'test-secret' });

    expect(config).toEqual({
      port: 3000,
      host: '0.0.0.0',
      databaseUrl: null,
      localNetwork: 1,
      operator: 'operator',
      adminToken: 'test-secret',
      adaptersFile: null,
      relayerPrivateKey: null,
      adapterTimeoutMs: 60_000,
      maxBatchGasLimit: 10_000_000n,
      messageGas: 200_000n,
      logLevel: 'info',
    });
  });

  it('should read overrides', () => {
    const config = loadConfigFromEnv({
      ADMIN_TOKEN: 'test-secret',
      PORT: '8080',
      LOCAL_NETWORK_ID: '42',
      OPERATOR: 'Ops-Team',
      DATABASE_URL: 'postgres://localhost/test',
      MAX_BATCH_GAS_LIMIT: '500000',
      LOG_LEVEL: 'debug',
    });

    expect(config.port).toBe(8080);
    expect(config.localNetwork).toBe(42);
    expect(config.operator).toBe('ops-team');
    expect(config.databaseUrl).toBe('postgres://localhost/test');
    expect(config.maxBatchGasLimit).toBe(500_000n);
    expect(config.logLevel).toBe('debug');
  });

  it('should require an admin token', () => {
    expect(configCode(() => loadConfigFromEnv({}))).toBe('MISSING_ADMIN_TOKEN');
  });

  it('should reject an unknown log level', () => {
    expect(configCode(() => loadConfigFromEnv({ ADMIN_TOKEN: 'test-secret', LOG_LEVEL: 'loud' }))).toBe(
      'INVALID_LOG_LEVEL'
    );
  });
});

describe('parseAdaptersFile', () => {
  it('should parse the example file', () => {
    const raw: unknown = JSON.parse(
      readFileSync(new URL('../../config/adapters.example.json', import.meta.url), 'utf8')
    );

    const file = parseAdaptersFile(raw);

    expect(file.adapters.map((adapter) => adapter.id)).toEqual(['relay-a', 'relay-b', 'relay-c']);
    expect(file.gas?.baseCost).toBe(50_000n);
    expect(file.gas?.kinds.get(3)).toBe(1_200_000n);
    expect(file.routes).toEqual([
      {
        remote: 2,
        tenant: '0',
        adapters: ['relay-a', 'relay-b', 'relay-c'],
        threshold: 2,
        recoveryIndex: 3,
        primaryIndex: undefined,
      },
    ]);
  });

  it('should default the tenant to the global one', () => {
    const file = parseAdaptersFile({ adapters: [], routes: [{ remote: 3, adapters: ['x'], threshold: 1 }] });
    expect(file.routes[0]?.tenant).toBe('0');
  });

  it('should leave gas out when the file has no gas section', () => {
    expect(parseAdaptersFile({ adapters: [], routes: [] })).toEqual({ adapters: [], routes: [] });
  });

  it('should read gas amounts per message kind', () => {
    const file = parseAdaptersFile({
      adapters: [],
      routes: [],
      gas: { baseCost: '21000', kinds: { '1': 100000, '2': '300000' } },
    });

    expect(file.gas).toEqual({
      baseCost: 21_000n,
      defaultCost: undefined,
      kinds: new Map([
        [1, 100_000n],
        [2, 300_000n],
      ]),
    });
  });

  it('should reject malformed gas sections', () => {
    const parseGas = (gas: unknown) => () => parseAdaptersFile({ adapters: [], routes: [], gas });

    expect(configCode(parseGas(5))).toBe('INVALID_ADAPTERS_FILE');
    expect(configCode(parseGas({ kinds: {} }))).toBe('INVALID_ADAPTERS_FILE');
    expect(configCode(parseGas({ baseCost: -1 }))).toBe('INVALID_ADAPTERS_FILE');
    expect(configCode(parseGas({ baseCost: 0, kinds: { '256': 1 } }))).toBe('INVALID_ADAPTERS_FILE');
    expect(configCode(parseGas({ baseCost: 0, kinds: { transfer: 1 } }))).toBe('INVALID_ADAPTERS_FILE');
    expect(configCode(parseGas({ baseCost: 0, defaultCost: '1.5' }))).toBe('INVALID_ADAPTERS_FILE');
  });

  it('should reject malformed entries', () => {
    expect(configCode(() => parseAdaptersFile([]))).toBe('INVALID_ADAPTERS_FILE');
    expect(configCode(() => parseAdaptersFile({ adapters: [{ id: 'a' }], routes: [] }))).toBe(
      'INVALID_ADAPTERS_FILE'
    );
    expect(
      configCode(() => parseAdaptersFile({ adapters: [], routes: [{ remote: 2, adapters: [1], threshold: 1 }] }))
    ).toBe('INVALID_ADAPTERS_FILE');
    expect(
      configCode(() => parseAdaptersFile({ adapters: [], routes: [{ remote: '2', adapters: [], threshold: 1 }] }))
    ).toBe('INVALID_ADAPTERS_FILE');
  });
});
