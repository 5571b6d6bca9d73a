import { Bool } from 'o1js';
import {
  LANE_LENGTH,
  ROTATION_OFFSETS,
  ROUND_CONSTANTS,
  ROUNDS,
} from './constants.js';
import { andNot, assert, constant, xor, xorAll } from './helpers/index.js';
import { KeccakState } from './state.js';

export { keccakF1600, round, theta, rho, pi, chi, iota };

/**
 * Keccak-f[1600]: 24 rounds over the full state, in order.
 */
function keccakF1600(state: KeccakState): KeccakState {
  for (let i = 0; i < ROUNDS; i++) {
    state = round(state, i);
  }
  return state;
}

// iota o chi o pi o rho o theta
function round(state: KeccakState, index: number): KeccakState {
  return iota(chi(pi(rho(theta(state)))), index);
}

/**
 * C[x][z] = A[x,0,z] xor A[x,1,z] xor ... xor A[x,4,z]
 * D[x][z] = C[x-1][z] xor C[x+1][z-1]
 * A'[x,y,z] = A[x,y,z] xor D[x][z]
 *
 * The column parities are computed once and shared by all five lanes of a
 * column.
 */
function theta(state: KeccakState): KeccakState {
  const parity = Array.from({ length: 5 }, (_, x) =>
    Array.from({ length: LANE_LENGTH }, (_, z) =>
      xorAll([0, 1, 2, 3, 4].map((y) => state.get(x, y, z)))
    )
  );
  const column = (x: number, z: number): Bool =>
    parity[mod(x, 5)][mod(z, LANE_LENGTH)];

  const effect = Array.from({ length: 5 }, (_, x) =>
    Array.from({ length: LANE_LENGTH }, (_, z) =>
      xor(column(x - 1, z), column(x + 1, z - 1))
    )
  );

  return KeccakState.build((x, y, z) => xor(state.get(x, y, z), effect[x][z]));
}

/**
 * Rotates lane (x, y) left by its offset. Output bit z is input bit
 * z - offset, so this only relabels wires.
 */
function rho(state: KeccakState): KeccakState {
  return KeccakState.build((x, y, z) =>
    state.get(x, y, z - ROTATION_OFFSETS[x][y])
  );
}

/**
 * Moves lane (x, y) to (y, 2x + 3y). Written from the output side:
 * A'[x, y] = A[x + 3y, x]. Relabeling only.
 */
function pi(state: KeccakState): KeccakState {
  return KeccakState.build((x, y, z) => state.get(x + 3 * y, x, z));
}

/**
 * A'[x,y,z] = A[x,y,z] xor ((not A[x+1,y,z]) and A[x+2,y,z])
 *
 * The only nonlinear step: one AND per wire.
 */
function chi(state: KeccakState): KeccakState {
  return KeccakState.build((x, y, z) =>
    xor(state.get(x, y, z), andNot(state.get(x + 1, y, z), state.get(x + 2, y, z)))
  );
}

/**
 * XORs the round constant into lane (0, 0). The constant is known at
 * compile time, so each bit is either kept or negated.
 */
function iota(state: KeccakState, index: number): KeccakState {
  assert(
    Number.isInteger(index) && index >= 0 && index < ROUNDS,
    `round index must be in 0..${ROUNDS - 1}, got ${index}`
  );
  const rc = ROUND_CONSTANTS[index];
  return KeccakState.build((x, y, z) => {
    const wire = state.get(x, y, z);
    if (x !== 0 || y !== 0) return wire;
    return xor(wire, constant(((rc >> BigInt(z)) & 1n) === 1n));
  });
}

function mod(n: number, m: number): number {
  return ((n % m) + m) % m;
}
