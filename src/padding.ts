import { Bool } from 'o1js';
import { RATE } from './constants.js';
import { assert, FALSE, TRUE } from './helpers/index.js';

export { pad101, zeroFillLength, sha3Pad, keccakPad, SHA3_SUFFIX };

/**
 * Domain separation bits appended to the message by SHA-3 (FIPS 202, 6.1)
 * before pad10*1. On byte-aligned input, suffix and padding together give the
 * familiar 0x06 ... 0x80 bytes.
 */
const SHA3_SUFFIX: readonly Bool[] = [FALSE, TRUE];

/**
 * Number of 0 bits pad10*1 puts between its two 1 bits for a message of
 * `length` bits.
 */
function zeroFillLength(length: number, rate = RATE): number {
  assert(
    Number.isInteger(length) && length >= 0,
    `invalid message length ${length}`
  );
  return mod(-(length + 2), rate);
}

/**
 * pad10*1: appends a 1, the fewest 0s that make the total length a multiple
 * of `rate` once the final 1 is appended, and that final 1.
 *
 * Only constant wires are added. When `length + 2` is already a multiple of
 * `rate` the two 1 bits are adjacent.
 */
function pad101(bits: Bool[], rate = RATE): Bool[] {
  const zeros = zeroFillLength(bits.length, rate);
  const padded = [...bits, TRUE, ...Array<Bool>(zeros).fill(FALSE), TRUE];
  assert(padded.length % rate === 0, 'padding did not reach a block boundary');
  return padded;
}

function sha3Pad(bits: Bool[]): Bool[] {
  return pad101([...bits, ...SHA3_SUFFIX]);
}

// Keccak as submitted to the SHA-3 competition, without domain separation
function keccakPad(bits: Bool[]): Bool[] {
  return pad101(bits);
}

function mod(n: number, m: number): number {
  return ((n % m) + m) % m;
}
