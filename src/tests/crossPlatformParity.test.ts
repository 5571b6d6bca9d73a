import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { sha3_256 as nobleSha3, keccak_256 as nobleKeccak } from '@noble/hashes/sha3';
import { bytesToHex } from '@noble/hashes/utils';
import { bitsToBytes, bytesToBits, hexToBytes } from '../helpers/index.js';
import { keccak256, sha3_256 } from '../sha3.js';
import { testVectors } from './vectors.js';

// deterministic byte pattern, so failures reproduce
function patternBytes(length: number, seed: number): Uint8Array {
  const bytes = new Uint8Array(length);
  let state = seed;
  for (let i = 0; i < length; i++) {
    state = (state * 1103515245 + 12345) % 2 ** 31;
    bytes[i] = state & 0xff;
  }
  return bytes;
}

describe('Cross-Platform Parity Tests', () => {
  describe('test vectors agree with @noble/hashes', () => {
    testVectors.forEach(({ name, input_hex, sha3_256: expected }) => {
      it(`should agree for ${name}`, () => {
        assert.strictEqual(bytesToHex(nobleSha3(hexToBytes(input_hex))), expected);
      });
    });
  });

  describe('gadget agrees with @noble/hashes', () => {
    // lengths around the 136-byte rate boundary
    [0, 1, 55, 134, 135, 136, 137, 200, 271, 272, 300].forEach((length, i) => {
      it(`should match SHA3-256 and Keccak-256 for ${length} bytes`, () => {
        const message = patternBytes(length, i + 1);
        const bits = bytesToBits(message);

        assert.deepStrictEqual(bitsToBytes(sha3_256(bits)), nobleSha3(message));
        assert.deepStrictEqual(bitsToBytes(keccak256(bits)), nobleKeccak(message));
      });
    });
  });
});
