import { Provable } from 'o1js';

export { analyzeConstraints, countRows };
export type { ConstraintReport };

type ConstraintReport = {
  name: string;
  rows: number;
  // number of gates of each kind, e.g. { Generic: 1200 }
  gates: Record<string, number>;
};

/**
 * Builds `circuit` in constraint-system mode (no witness values are computed)
 * and summarizes what it allocated.
 */
async function analyzeConstraints(
  name: string,
  circuit: () => void
): Promise<ConstraintReport> {
  const cs = await Provable.constraintSystem(circuit);
  const gates: Record<string, number> = {};
  for (const gate of cs.gates) {
    gates[gate.type] = (gates[gate.type] ?? 0) + 1;
  }
  return { name, rows: cs.rows, gates };
}

async function countRows(circuit: () => void): Promise<number> {
  const { rows } = await analyzeConstraints('rows', circuit);
  return rows;
}
