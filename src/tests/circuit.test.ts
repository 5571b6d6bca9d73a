import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Bool, Provable } from 'o1js';
import { countRows } from '../analysis.js';
import { STATE_LENGTH } from '../constants.js';
import {
  bytesToBits,
  hexToBytes,
  stringToBits,
  witnessBits,
} from '../helpers/index.js';
import { sha3Pad } from '../padding.js';
import { chi, iota, pi, rho, round, theta } from '../permutation.js';
import { sha3_256 } from '../sha3.js';
import { KeccakState } from '../state.js';
import { absorbFirstBlock, referenceRound } from './reference.js';

const ABC_DIGEST =
  '3a985da74fe225b2045c172d6bd390bd855f086e3e9d525b46bfe24511431532';

const values = (bits: Bool[]) => bits.map((b) => b.toBoolean());

const abcBlock = values(sha3Pad(stringToBits('abc')));
const abcState = [
  ...abcBlock,
  ...Array<boolean>(STATE_LENGTH - abcBlock.length).fill(false),
];

const witnessState = () =>
  KeccakState.fromBits(witnessBits(Array<boolean>(STATE_LENGTH).fill(false)));

describe('SHA3-256 gadget in circuit', () => {
  describe('constraint cost', () => {
    it('should add no rows for rho, pi and iota', async () => {
      const base = await countRows(() => {
        witnessState();
      });
      const relabeled = await countRows(() => {
        iota(pi(rho(witnessState())), 3);
      });
      assert.strictEqual(relabeled, base);
      console.log(`✓ rho, pi, iota: 0 rows (state witness: ${base} rows)`);
    });

    it('should add rows for theta and chi', async () => {
      const base = await countRows(() => {
        witnessState();
      });
      const withTheta = await countRows(() => {
        theta(witnessState());
      });
      const withChi = await countRows(() => {
        chi(witnessState());
      });
      assert.ok(withTheta > base, `theta: ${withTheta} rows, baseline ${base}`);
      assert.ok(withChi > base, `chi: ${withChi} rows, baseline ${base}`);
      console.log(`✓ theta: ${withTheta - base} rows, chi: ${withChi - base} rows`);
    });

    it('should fold a constant message away entirely', async () => {
      const empty = await countRows(() => {});
      const hashed = await countRows(() => {
        sha3_256(stringToBits('abc'));
      });
      assert.strictEqual(hashed, empty);
    });
  });

  describe('satisfiability', () => {
    it('should satisfy one round on witnessed state', async () => {
      const expected = referenceRound(absorbFirstBlock(abcBlock), 0);
      await Provable.runAndCheck(() => {
        const next = round(KeccakState.fromBits(witnessBits(abcState)), 0);
        Provable.asProver(() => {
          assert.deepStrictEqual(next.toLaneValues(), expected);
        });
      });
    });

    it('should reject a wrong round output', async () => {
      await assert.rejects(async () => {
        await Provable.runAndCheck(() => {
          const next = round(KeccakState.fromBits(witnessBits(abcState)), 0);
          // lane (0, 0) after round 0 is not all zeros for this input
          next.lane(0, 0).forEach((bit) => bit.assertFalse());
        });
      });
    });

    it('should prove SHA3-256("abc") over witnessed wires', async () => {
      const message = values(stringToBits('abc'));
      const expected = values(bytesToBits(hexToBytes(ABC_DIGEST)));

      console.time('sha3_256 runAndCheck');
      await Provable.runAndCheck(() => {
        const digest = sha3_256(witnessBits(message));
        assert.strictEqual(digest.length, 256);
        digest.forEach((bit, i) => bit.assertEquals(expected[i]));
      });
      console.timeEnd('sha3_256 runAndCheck');
    });
  });
});
