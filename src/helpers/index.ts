export { assert } from './assert.js';

export {
  TRUE,
  FALSE,
  constant,
  xor,
  xorAll,
  and,
  andNot,
  not,
} from './wires.js';

export {
  bytesToBits,
  stringToBits,
  bitsToBytes,
  bitsToHex,
  hexToBytes,
  uint8ToBits,
  bitsToUInt8,
  witnessBits,
} from './conversion.js';
