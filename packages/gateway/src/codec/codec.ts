/**
 * Wire Codec
 *
 * Batch frame:  (uint16 big-endian length, payload) repeated, one per sub-message.
 * Proof frame:  0xFF marker followed by the 32-byte keccak256 of a batch.
 *
 * A sub-message is capped at 0xFEFF bytes, so the first length prefix of a
 * batch can never start with the proof marker and the two frame kinds are
 * told apart by their first byte alone.
 *
 * Any change to this framing is a breaking protocol change for every adapter
 * on every network pair.
 */

import { getBytes, hexlify, keccak256 } from 'ethers';
import { PayloadHash, payloadHash } from '../boundaries/invariants.js';
import { FramingError } from '../boundaries/errors.js';

// =============================================================================
// CONSTANTS
// =============================================================================

export const PROOF_MARKER = 0xff;
export const HASH_LENGTH = 32;
export const PROOF_FRAME_LENGTH = 1 + HASH_LENGTH;
export const LENGTH_PREFIX_BYTES = 2;
export const MAX_MESSAGE_LENGTH = 0xfeff;

// =============================================================================
// FRAMES
// =============================================================================

export type InboundFrame =
  | { kind: 'proof'; hash: PayloadHash }
  | { kind: 'batch'; hash: PayloadHash; payload: Uint8Array; messages: Uint8Array[] };

// =============================================================================
// SUB-MESSAGES
// =============================================================================

/**
 * Validate a single sub-message before it is accepted for batching.
 */
export function assertSubMessage(message: Uint8Array): void {
  if (message.length === 0) {
    throw new FramingError('EMPTY_MESSAGE', 'Sub-message must not be empty');
  }
  if (message.length > MAX_MESSAGE_LENGTH) {
    throw new FramingError(
      'MESSAGE_TOO_LARGE',
      `Sub-message is ${message.length} bytes, maximum is ${MAX_MESSAGE_LENGTH}`
    );
  }
}

/**
 * Schema tag of a sub-message (its first byte).
 */
export function messageKind(message: Uint8Array): number {
  assertSubMessage(message);
  return message[0];
}

// =============================================================================
// BATCH FRAMES
// =============================================================================

export function pack(messages: readonly Uint8Array[]): Uint8Array {
  if (messages.length === 0) {
    throw new FramingError('EMPTY_BATCH', 'A batch needs at least one sub-message');
  }

  let total = 0;
  for (const message of messages) {
    assertSubMessage(message);
    total += LENGTH_PREFIX_BYTES + message.length;
  }

  const out = new Uint8Array(total);
  let offset = 0;
  for (const message of messages) {
    out[offset] = message.length >> 8;
    out[offset + 1] = message.length & 0xff;
    out.set(message, offset + LENGTH_PREFIX_BYTES);
    offset += LENGTH_PREFIX_BYTES + message.length;
  }
  return out;
}

/**
 * Decode a batch frame. Fails closed: any malformed prefix or truncation
 * rejects the whole frame.
 */
export function unpack(bytes: Uint8Array): Uint8Array[] {
  if (bytes.length === 0) {
    throw new FramingError('EMPTY_BATCH', 'Batch frame is empty');
  }
  if (isProofFrame(bytes)) {
    throw new FramingError('UNEXPECTED_PROOF', 'Expected a batch frame, got a proof frame');
  }

  const messages: Uint8Array[] = [];
  let offset = 0;
  while (offset < bytes.length) {
    if (offset + LENGTH_PREFIX_BYTES > bytes.length) {
      throw new FramingError('TRUNCATED_PREFIX', `Length prefix truncated at offset ${offset}`);
    }
    const length = (bytes[offset] << 8) | bytes[offset + 1];
    if (length === 0) {
      throw new FramingError('EMPTY_MESSAGE', `Zero-length sub-message at offset ${offset}`);
    }
    if (length > MAX_MESSAGE_LENGTH) {
      throw new FramingError('MESSAGE_TOO_LARGE', `Length prefix ${length} at offset ${offset} exceeds maximum`);
    }
    const start = offset + LENGTH_PREFIX_BYTES;
    const end = start + length;
    if (end > bytes.length) {
      throw new FramingError(
        'TRUNCATED_PAYLOAD',
        `Sub-message at offset ${offset} needs ${length} bytes, ${bytes.length - start} remain`
      );
    }
    messages.push(bytes.slice(start, end));
    offset = end;
  }
  return messages;
}

export function batchHash(bytes: Uint8Array): PayloadHash {
  return payloadHash(keccak256(bytes));
}

// =============================================================================
// PROOF FRAMES
// =============================================================================

export function isProofFrame(bytes: Uint8Array): boolean {
  return bytes.length > 0 && bytes[0] === PROOF_MARKER;
}

export function packProof(hash: PayloadHash): Uint8Array {
  const out = new Uint8Array(PROOF_FRAME_LENGTH);
  out[0] = PROOF_MARKER;
  out.set(getBytes(hash), 1);
  return out;
}

export function unpackProof(bytes: Uint8Array): PayloadHash {
  if (!isProofFrame(bytes) || bytes.length !== PROOF_FRAME_LENGTH) {
    throw new FramingError(
      'MALFORMED_PROOF',
      `Proof frame must be ${PROOF_FRAME_LENGTH} bytes starting with 0x${PROOF_MARKER.toString(16)}`
    );
  }
  return payloadHash(hexlify(bytes.subarray(1)));
}

// =============================================================================
// INBOUND ROUTING
// =============================================================================

/**
 * Classify raw inbound bytes. Batches are fully decoded here so nothing
 * downstream ever sees a partially valid frame.
 */
export function decodeFrame(bytes: Uint8Array): InboundFrame {
  if (isProofFrame(bytes)) {
    return { kind: 'proof', hash: unpackProof(bytes) };
  }
  const messages = unpack(bytes);
  return { kind: 'batch', hash: batchHash(bytes), payload: bytes.slice(), messages };
}
