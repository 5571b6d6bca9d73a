import { Bool } from 'o1js';
import {
  LANE_COUNT,
  LANE_LENGTH,
  RATE,
  STATE_LENGTH,
} from './constants.js';
import { assert, constant, FALSE, xor } from './helpers/index.js';

export { KeccakState };

const mod = (n: number, m: number) => ((n % m) + m) % m;

/**
 * The 1600-bit Keccak state as a flat arena of wires.
 *
 * Wire (x, y, z) lives at `64 * (x + 5y) + z`, which is the FIPS 202 mapping
 * from the state string to `S[x, y, z]`: reading the arena in index order
 * gives the state string, lane (x, y) is the 64 wires starting at
 * `64 * (x + 5y)`, and z is the bit position inside the 64-bit word,
 * least-significant first.
 *
 * States are immutable. Every step builds a new arena, either by relabeling
 * wires of the old one or by constraining new wires in terms of them.
 */
class KeccakState {
  private constructor(private readonly wires: readonly Bool[]) {}

  static laneIndex(x: number, y: number): number {
    return mod(x, 5) + 5 * mod(y, 5);
  }

  static position(x: number, y: number, z: number): number {
    return LANE_LENGTH * KeccakState.laneIndex(x, y) + mod(z, LANE_LENGTH);
  }

  static zeros(): KeccakState {
    return new KeccakState(Array<Bool>(STATE_LENGTH).fill(FALSE));
  }

  static fromBits(bits: Bool[]): KeccakState {
    assert(
      bits.length === STATE_LENGTH,
      `state must have ${STATE_LENGTH} wires, got ${bits.length}`
    );
    return new KeccakState([...bits]);
  }

  /**
   * Builds a state from 25 lanes given in `x + 5y` order.
   */
  static fromLanes(lanes: Bool[][]): KeccakState {
    assert(
      lanes.length === LANE_COUNT,
      `state must have ${LANE_COUNT} lanes, got ${lanes.length}`
    );
    lanes.forEach((lane, i) =>
      assert(
        lane.length === LANE_LENGTH,
        `lane ${i} must have ${LANE_LENGTH} wires, got ${lane.length}`
      )
    );
    return new KeccakState(lanes.flat());
  }

  /**
   * Constant state from 25 64-bit words in `x + 5y` order.
   */
  static fromLaneValues(values: bigint[]): KeccakState {
    assert(
      values.length === LANE_COUNT,
      `state must have ${LANE_COUNT} lanes, got ${values.length}`
    );
    return KeccakState.fromLanes(
      values.map((value) =>
        Array.from({ length: LANE_LENGTH }, (_, z) =>
          constant(((value >> BigInt(z)) & 1n) === 1n)
        )
      )
    );
  }

  /**
   * Builds a state wire by wire. `wire` is called once per (x, y, z), in
   * arena order.
   */
  static build(wire: (x: number, y: number, z: number) => Bool): KeccakState {
    const wires: Bool[] = [];
    for (let y = 0; y < 5; y++) {
      for (let x = 0; x < 5; x++) {
        for (let z = 0; z < LANE_LENGTH; z++) {
          wires.push(wire(x, y, z));
        }
      }
    }
    return new KeccakState(wires);
  }

  /**
   * Coordinates are taken modulo 5 (x, y) and 64 (z), so neighbours such as
   * `get(x - 1, y, z)` need no wrapping at the call site.
   */
  get(x: number, y: number, z: number): Bool {
    return this.wires[KeccakState.position(x, y, z)];
  }

  lane(x: number, y: number): Bool[] {
    const start = LANE_LENGTH * KeccakState.laneIndex(x, y);
    return this.wires.slice(start, start + LANE_LENGTH);
  }

  lanes(): Bool[][] {
    return Array.from({ length: LANE_COUNT }, (_, i) =>
      this.lane(i % 5, Math.floor(i / 5))
    );
  }

  toBits(): Bool[] {
    return [...this.wires];
  }

  /**
   * Reads the lanes as 64-bit words in `x + 5y` order.
   * Only valid on constant states or inside `Provable.asProver`.
   */
  toLaneValues(): bigint[] {
    return this.lanes().map((lane) =>
      lane.reduce(
        (word, bit, z) => (bit.toBoolean() ? word | (1n << BigInt(z)) : word),
        0n
      )
    );
  }

  /**
   * XORs a rate-sized block into the first 17 lanes. The 8 capacity lanes
   * keep their wires.
   */
  xorBlock(block: Bool[]): KeccakState {
    assert(
      block.length === RATE,
      `block must have ${RATE} wires, got ${block.length}`
    );
    return new KeccakState(
      this.wires.map((wire, i) => (i < RATE ? xor(wire, block[i]) : wire))
    );
  }
}
