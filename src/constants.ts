export {
  LANE_LENGTH,
  LANE_COUNT,
  STATE_LENGTH,
  RATE,
  CAPACITY,
  DIGEST_LENGTH,
  RATE_LANES,
  ROUNDS,
  ROUND_CONSTANTS,
  ROTATION_OFFSETS,
};

const LANE_LENGTH = 64;
const LANE_COUNT = 25;
const STATE_LENGTH = LANE_COUNT * LANE_LENGTH; // 1600

// SHA3-256: capacity is twice the digest length
const DIGEST_LENGTH = 256;
const CAPACITY = 2 * DIGEST_LENGTH; // 512
const RATE = STATE_LENGTH - CAPACITY; // 1088
const RATE_LANES = RATE / LANE_LENGTH; // 17

const ROUNDS = 24;

/**
 * Round constants of Keccak-f[1600], one per round, XORed into lane (0, 0)
 * by the iota step.
 *
 * From https://keccak.team/keccak_specs_summary.html
 */
const ROUND_CONSTANTS: readonly bigint[] = [
  0x0000000000000001n,
  0x0000000000008082n,
  0x800000000000808an,
  0x8000000080008000n,
  0x000000000000808bn,
  0x0000000080000001n,
  0x8000000080008081n,
  0x8000000000008009n,
  0x000000000000008an,
  0x0000000000000088n,
  0x0000000080008009n,
  0x000000008000000an,
  0x000000008000808bn,
  0x800000000000008bn,
  0x8000000000008089n,
  0x8000000000008003n,
  0x8000000000008002n,
  0x8000000000000080n,
  0x000000000000800an,
  0x800000008000000an,
  0x8000000080008081n,
  0x8000000000008080n,
  0x0000000080000001n,
  0x8000000080008008n,
];

// Left-rotation offsets of the rho step, indexed [x][y]
//  | x \ y |  0 |  1 |  2 |  3 |  4 |
//  | ----- | -- | -- | -- | -- | -- |
//  | 0     |  0 | 36 |  3 | 41 | 18 |
//  | 1     |  1 | 44 | 10 | 45 |  2 |
//  | 2     | 62 |  6 | 43 | 15 | 61 |
//  | 3     | 28 | 55 | 25 | 21 | 56 |
//  | 4     | 27 | 20 | 39 |  8 | 14 |
const ROTATION_OFFSETS: readonly (readonly number[])[] = [
  [0, 36, 3, 41, 18],
  [1, 44, 10, 45, 2],
  [62, 6, 43, 15, 61],
  [28, 55, 25, 21, 56],
  [27, 20, 39, 8, 14],
];
