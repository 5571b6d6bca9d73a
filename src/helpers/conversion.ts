import { Bool, Field, Provable, UInt8 } from 'o1js';
import { assert } from './assert.js';
import { constant } from './wires.js';

export {
  bytesToBits,
  stringToBits,
  bitsToBytes,
  bitsToHex,
  hexToBytes,
  uint8ToBits,
  bitsToUInt8,
  witnessBits,
};

/*
 * Bit order at the byte boundary follows FIPS 202 (Appendix B.1): the bits of
 * each byte are taken least-significant first, so byte i of a message becomes
 * wires 8i..8i+7 and the same rule turns digest wires back into bytes.
 */

/**
 * Converts bytes to constant wires, least-significant bit of each byte first.
 */
function bytesToBits(bytes: Uint8Array): Bool[] {
  const bits: Bool[] = [];
  for (const byte of bytes) {
    for (let i = 0; i < 8; i++) {
      bits.push(constant(((byte >> i) & 1) === 1));
    }
  }
  return bits;
}

function stringToBits(text: string): Bool[] {
  return bytesToBits(new TextEncoder().encode(text));
}

/**
 * Reads wire values back into bytes.
 * Only valid on constant wires or inside `Provable.asProver`.
 */
function bitsToBytes(bits: Bool[]): Uint8Array {
  assert(
    bits.length % 8 === 0,
    `bit length ${bits.length} is not a multiple of 8`
  );
  const bytes = new Uint8Array(bits.length / 8);
  for (let i = 0; i < bytes.length; i++) {
    let byte = 0;
    for (let j = 0; j < 8; j++) {
      if (bits[8 * i + j].toBoolean()) byte |= 1 << j;
    }
    bytes[i] = byte;
  }
  return bytes;
}

function bitsToHex(bits: Bool[]): string {
  return Array.from(bitsToBytes(bits))
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

function hexToBytes(hex: string): Uint8Array {
  assert(
    hex.length % 2 === 0 && /^[0-9a-fA-F]*$/.test(hex),
    `invalid hex string: ${hex}`
  );
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(2 * i, 2 * i + 2), 16);
  }
  return bytes;
}

/**
 * Splits provable bytes into wires. Each byte costs the bit decomposition of
 * `Field.toBits`.
 */
function uint8ToBits(bytes: UInt8[]): Bool[] {
  return bytes.flatMap((byte) => byte.value.toBits(8));
}

/**
 * Packs wires into provable bytes, eight wires per byte.
 */
function bitsToUInt8(bits: Bool[]): UInt8[] {
  assert(
    bits.length % 8 === 0,
    `bit length ${bits.length} is not a multiple of 8`
  );
  const bytes: UInt8[] = [];
  for (let i = 0; i < bits.length; i += 8) {
    bytes.push(UInt8.from(Field.fromBits(bits.slice(i, i + 8))));
  }
  return bytes;
}

/**
 * Introduces private wires. o1js checks each witnessed `Bool` to be 0 or 1.
 */
function witnessBits(values: boolean[]): Bool[] {
  return values.map((value) => Provable.witness(Bool, () => Bool(value)));
}
