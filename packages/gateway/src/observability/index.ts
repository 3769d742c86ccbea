/**
 * Observability Module
 */

// Type-only exports
export type { RelayMetrics, VoteIgnoredReason, HeldReason } from './metrics.js';

// Value exports
export { NoOpMetrics, ConsoleMetrics } from './metrics.js';
