/**
 * Execution Module
 */

export type { TimeoutConfig, AdapterOperation } from './timeout.js';

export {
  DEFAULT_TIMEOUT_CONFIG,
  getAdapterTimeout,
  withTimeout,
} from './timeout.js';

export { SerialQueue } from './serial-queue.js';
