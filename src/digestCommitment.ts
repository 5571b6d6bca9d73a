import { Bool, Field, Struct } from 'o1js';
import { DIGEST_LENGTH } from './constants.js';
import { assert } from './helpers/index.js';

export { DigestCommitment };

/**
 * A 256-bit digest as two 128-bit Fields, so it fits public inputs and
 * on-chain state.
 *
 * Each half is the big-endian reading of 16 digest bytes, which makes
 * `high128 || low128` the usual hex spelling of the digest.
 */
class DigestCommitment extends Struct({
  high128: Field,
  low128: Field,
}) {
  static fromDigest(digest: Bool[]): DigestCommitment {
    assert(
      digest.length === DIGEST_LENGTH,
      `digest must have ${DIGEST_LENGTH} wires, got ${digest.length}`
    );
    return new DigestCommitment({
      high128: packBigEndian(digest.slice(0, 128)),
      low128: packBigEndian(digest.slice(128)),
    });
  }

  /**
   * Asserts that `digest` packs to this commitment.
   */
  assertMatches(digest: Bool[]) {
    const packed = DigestCommitment.fromDigest(digest);
    packed.high128.assertEquals(this.high128, 'digest does not match high128');
    packed.low128.assertEquals(this.low128, 'digest does not match low128');
  }

  /**
   * Converts the commitment to a hex string.
   */
  toHex(): string {
    return (
      this.high128.toBigInt().toString(16).padStart(32, '0') +
      this.low128.toBigInt().toString(16).padStart(32, '0')
    );
  }

  static fromHex(hex: string): DigestCommitment {
    assert(/^[0-9a-fA-F]{64}$/.test(hex), `invalid digest hex: ${hex}`);
    return new DigestCommitment({
      high128: Field(BigInt('0x' + hex.slice(0, 32))),
      low128: Field(BigInt('0x' + hex.slice(32))),
    });
  }
}

// Wires 8i..8i+7 are byte i, least-significant bit first. Field.fromBits
// reads least-significant first too, so the bytes go in reverse order.
function packBigEndian(wires: Bool[]): Field {
  const bits: Bool[] = [];
  for (let i = wires.length / 8 - 1; i >= 0; i--) {
    bits.push(...wires.slice(8 * i, 8 * i + 8));
  }
  return Field.fromBits(bits);
}
