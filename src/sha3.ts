import { Bool, Bytes } from 'o1js';
import { DIGEST_LENGTH } from './constants.js';
import {
  bitsToUInt8,
  bytesToBits,
  uint8ToBits,
} from './helpers/index.js';
import { keccakPad, sha3Pad } from './padding.js';
import { absorb, squeeze } from './sponge.js';

export { sha3_256, keccak256, Sha3_256, Keccak256, Bytes32 };

class Bytes32 extends Bytes(32) {}

/**
 * SHA3-256 over boolean wires.
 *
 * `message` is a bit string in FIPS 202 order (see `bytesToBits` for the
 * byte convention). Returns exactly 256 wires, digest byte i being wires
 * 8i..8i+7 least-significant bit first.
 *
 * ```ts
 * const digest = sha3_256(stringToBits('abc'));
 * bitsToHex(digest); // '3a985da7...'
 * ```
 */
function sha3_256(message: Bool[]): Bool[] {
  return squeeze(absorb(sha3Pad(message)), DIGEST_LENGTH);
}

/**
 * Keccak-256 as used by Ethereum: the same sponge without the SHA-3 domain
 * suffix.
 */
function keccak256(message: Bool[]): Bool[] {
  return squeeze(absorb(keccakPad(message)), DIGEST_LENGTH);
}

type ByteMessage = Bytes | Uint8Array | string;

function toBits(message: ByteMessage): Bool[] {
  if (typeof message === 'string') {
    return bytesToBits(new TextEncoder().encode(message));
  }
  if (message instanceof Uint8Array) return bytesToBits(message);
  return uint8ToBits(message.bytes);
}

/**
 * Byte-level SHA3-256 for circuits written against o1js `Bytes`.
 */
const Sha3_256 = {
  hash(message: ByteMessage): Bytes32 {
    return Bytes32.from(bitsToUInt8(sha3_256(toBits(message))));
  },
};

const Keccak256 = {
  hash(message: ByteMessage): Bytes32 {
    return Bytes32.from(bitsToUInt8(keccak256(toBits(message))));
  },
};
