/**
 * Wire Codec Tests
 *
 * Proves:
 * - Batches are length-prefixed big-endian, bit-exact
 * - unpack is the inverse of pack
 * - Malformed frames are rejected whole (fail closed)
 * - Proof frames are exactly 33 bytes and never carry payload
 */

import { describe, it, expect } from 'vitest';
import { keccak256 } from 'ethers';
import {
  MAX_MESSAGE_LENGTH,
  PROOF_FRAME_LENGTH,
  batchHash,
  decodeFrame,
  isProofFrame,
  messageKind,
  pack,
  packProof,
  unpack,
  unpackProof,
} from '../../src/codec/index.js';
import { FramingError } from '../../src/boundaries/errors.js';

function framingCode(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    if (error instanceof FramingError) return error.code;
    throw error;
  }
  throw new Error('Expected a FramingError');
}

describe('pack', () => {
  it('should prefix each sub-message with its big-endian uint16 length', () => {
    const batch = pack([Uint8Array.of(0x01, 0x02), Uint8Array.of(0x03)]);
    expect(Array.from(batch)).toEqual([0x00, 0x02, 0x01, 0x02, 0x00, 0x01, 0x03]);
  });

  it('should encode lengths above 255 in two bytes', () => {
    const batch = pack([new Uint8Array(0x0123).fill(7)]);
    expect(batch.length).toBe(2 + 0x0123);
    expect(batch[0]).toBe(0x01);
    expect(batch[1]).toBe(0x23);
  });

  it('should reject an empty sequence', () => {
    expect(framingCode(() => pack([]))).toBe('EMPTY_BATCH');
  });

  it('should reject an empty sub-message', () => {
    expect(framingCode(() => pack([Uint8Array.of(1), new Uint8Array(0)]))).toBe('EMPTY_MESSAGE');
  });

  it('should reject a sub-message longer than the maximum', () => {
    expect(framingCode(() => pack([new Uint8Array(MAX_MESSAGE_LENGTH + 1)]))).toBe('MESSAGE_TOO_LARGE');
  });

  it('should accept a sub-message of exactly the maximum length', () => {
    const batch = pack([new Uint8Array(MAX_MESSAGE_LENGTH).fill(1)]);
    expect(batch[0]).toBe(0xfe);
    expect(batch[1]).toBe(0xff);
  });

  it('should never produce a frame that looks like a proof', () => {
    const batch = pack([new Uint8Array(MAX_MESSAGE_LENGTH).fill(0xff)]);
    expect(isProofFrame(batch)).toBe(false);
  });
});

describe('unpack', () => {
  it('should return the original sub-messages in order', () => {
    const messages = [Uint8Array.of(0x10, 0x20, 0x30), Uint8Array.of(0x40), Uint8Array.of(0xff, 0x00)];
    expect(unpack(pack(messages))).toEqual(messages);
  });

  it('should return copies, not views into the frame', () => {
    const batch = pack([Uint8Array.of(5, 6)]);
    const [message] = unpack(batch);
    message[0] = 99;
    expect(batch[2]).toBe(5);
  });

  it('should reject empty input', () => {
    expect(framingCode(() => unpack(new Uint8Array(0)))).toBe('EMPTY_BATCH');
  });

  it('should reject a proof frame', () => {
    const proof = packProof(batchHash(pack([Uint8Array.of(1)])));
    expect(framingCode(() => unpack(proof))).toBe('UNEXPECTED_PROOF');
  });

  it('should reject a truncated length prefix', () => {
    expect(framingCode(() => unpack(Uint8Array.of(0x00, 0x01, 0x09, 0x00)))).toBe('TRUNCATED_PREFIX');
  });

  it('should reject a zero length prefix', () => {
    expect(framingCode(() => unpack(Uint8Array.of(0x00, 0x00)))).toBe('EMPTY_MESSAGE');
  });

  it('should reject a length prefix above the maximum', () => {
    // a leading 0xff would read as a proof, so the oversized prefix comes second
    expect(framingCode(() => unpack(Uint8Array.of(0x00, 0x01, 0xaa, 0xff, 0x00, 0x01)))).toBe('MESSAGE_TOO_LARGE');
  });

  it('should reject a truncated payload with no partial result', () => {
    // first sub-message is fine, second claims 3 bytes but has 1
    expect(framingCode(() => unpack(Uint8Array.of(0x00, 0x01, 0xaa, 0x00, 0x03, 0xbb)))).toBe('TRUNCATED_PAYLOAD');
  });
});

describe('proof frames', () => {
  const hash = batchHash(pack([Uint8Array.of(1, 2, 3)]));

  it('should be 0xFF followed by the 32-byte hash', () => {
    const proof = packProof(hash);
    expect(proof.length).toBe(PROOF_FRAME_LENGTH);
    expect(proof[0]).toBe(0xff);
    expect(unpackProof(proof)).toBe(hash);
  });

  it('should reject a proof of the wrong length', () => {
    const proof = packProof(hash);
    expect(framingCode(() => unpackProof(proof.subarray(0, 32)))).toBe('MALFORMED_PROOF');
    const long = new Uint8Array(34);
    long.set(proof);
    expect(framingCode(() => unpackProof(long))).toBe('MALFORMED_PROOF');
  });

  it('should reject bytes without the marker', () => {
    expect(framingCode(() => unpackProof(new Uint8Array(33)))).toBe('MALFORMED_PROOF');
  });
});

describe('batchHash', () => {
  it('should be the keccak256 of the batch bytes', () => {
    const batch = pack([Uint8Array.of(0xab)]);
    expect(batchHash(batch)).toBe(keccak256(batch));
  });
});

describe('decodeFrame', () => {
  it('should classify a proof frame', () => {
    const hash = batchHash(pack([Uint8Array.of(9)]));
    expect(decodeFrame(packProof(hash))).toEqual({ kind: 'proof', hash });
  });

  it('should decode a batch frame with its hash and messages', () => {
    const batch = pack([Uint8Array.of(1), Uint8Array.of(2, 3)]);
    const frame = decodeFrame(batch);
    expect(frame.kind).toBe('batch');
    expect(frame.hash).toBe(batchHash(batch));
    if (frame.kind === 'batch') {
      expect(frame.messages).toEqual([Uint8Array.of(1), Uint8Array.of(2, 3)]);
      expect(frame.payload).toEqual(batch);
    }
  });

  it('should fail closed on a malformed batch', () => {
    expect(framingCode(() => decodeFrame(Uint8Array.of(0x00, 0x05, 0x01)))).toBe('TRUNCATED_PAYLOAD');
  });
});

describe('messageKind', () => {
  it('should return the schema tag', () => {
    expect(messageKind(Uint8Array.of(0x42, 0x00))).toBe(0x42);
  });

  it('should reject an empty sub-message', () => {
    expect(framingCode(() => messageKind(new Uint8Array(0)))).toBe('EMPTY_MESSAGE');
  });
});
