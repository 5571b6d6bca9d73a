import { Bool } from 'o1js';
import { DIGEST_LENGTH, RATE } from './constants.js';
import { assert } from './helpers/index.js';
import { keccakF1600 } from './permutation.js';
import { KeccakState } from './state.js';

export { absorb, squeeze };

/**
 * Absorbs padded input block by block: XOR into the rate lanes, then
 * Keccak-f[1600]. Blocks are strictly sequential.
 *
 * `padded` must already be a multiple of the rate; the hash entry points
 * always pad first, so a violation here is a bug in the caller.
 */
function absorb(padded: Bool[], state = KeccakState.zeros()): KeccakState {
  assert(
    padded.length > 0 && padded.length % RATE === 0,
    `padded input must be a non-zero multiple of ${RATE} bits, got ${padded.length}`
  );
  for (let offset = 0; offset < padded.length; offset += RATE) {
    state = keccakF1600(state.xorBlock(padded.slice(offset, offset + RATE)));
  }
  return state;
}

/**
 * The first `length` wires of the state string: for 256 bits, lanes
 * (0,0), (1,0), (2,0) and (3,0) in that order. A single squeeze suffices
 * since the digest is shorter than the rate.
 */
function squeeze(state: KeccakState, length = DIGEST_LENGTH): Bool[] {
  assert(
    Number.isInteger(length) && length >= 0 && length <= RATE,
    `squeeze length must be in 0..${RATE}, got ${length}`
  );
  return state.toBits().slice(0, length);
}
