export {
  // Hash entry points
  sha3_256,
  keccak256,
  Sha3_256,
  Keccak256,
  Bytes32,
} from './sha3.js';

export {
  // Sponge stages
  pad101,
  zeroFillLength,
  sha3Pad,
  keccakPad,
  SHA3_SUFFIX,
} from './padding.js';
export { absorb, squeeze } from './sponge.js';
export { keccakF1600, round, theta, rho, pi, chi, iota } from './permutation.js';
export { KeccakState } from './state.js';

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
} from './constants.js';

export {
  // Wire algebra and bit/byte conversion
  assert,
  TRUE,
  FALSE,
  constant,
  xor,
  xorAll,
  and,
  andNot,
  not,
  bytesToBits,
  stringToBits,
  bitsToBytes,
  bitsToHex,
  hexToBytes,
  uint8ToBits,
  bitsToUInt8,
  witnessBits,
} from './helpers/index.js';

export { DigestCommitment } from './digestCommitment.js';
export { analyzeConstraints, countRows } from './analysis.js';
export type { ConstraintReport } from './analysis.js';
export { loadConfig } from './config.js';
export type { DemoConfig } from './config.js';
