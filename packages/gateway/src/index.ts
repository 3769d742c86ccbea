/**
 * crosslink - quorum-gated cross-network messaging
 */

export * from './boundaries/index.js';
export * from './codec/index.js';
export * from './adapters/index.js';
export * from './execution/index.js';
export * from './multi-adapter/index.js';
export * from './hub/index.js';
export * from './persistence/postgres/index.js';
export * from './observability/index.js';
export * from './utils/index.js';
export * from './http/index.js';

export type { RelayNode, RelayNodeOptions } from './node.js';
export { createRelayNode } from './node.js';

