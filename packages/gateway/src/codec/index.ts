/**
 * Wire codec for batch and proof frames.
 */

export type { InboundFrame } from './codec.js';

export {
  PROOF_MARKER,
  HASH_LENGTH,
  PROOF_FRAME_LENGTH,
  LENGTH_PREFIX_BYTES,
  MAX_MESSAGE_LENGTH,
  assertSubMessage,
  messageKind,
  pack,
  unpack,
  batchHash,
  isProofFrame,
  packProof,
  unpackProof,
  decodeFrame,
} from './codec.js';
