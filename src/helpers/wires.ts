import { Bool } from 'o1js';

export { TRUE, FALSE, constant, xor, xorAll, and, andNot, not };

// Wires are immutable, so the two constants can be shared by every state.
const TRUE = Bool(true);
const FALSE = Bool(false);

function constant(value: boolean): Bool {
  return value ? TRUE : FALSE;
}

/**
 * a xor b.
 *
 * Constant inputs are folded: xor with false is the other wire itself and
 * xor with true is its negation, which o1js expresses as the linear
 * combination 1 - a. Neither allocates a gate.
 *
 * For two variables the comparison is witnessed as a new wire, so outputs
 * stay a single variable deep and do not build up linear combinations from
 * one round to the next.
 */
function xor(a: Bool, b: Bool): Bool {
  if (a.isConstant() && b.isConstant()) {
    return constant(a.toBoolean() !== b.toBoolean());
  }
  if (a.isConstant()) return a.toBoolean() ? b.not() : b;
  if (b.isConstant()) return b.toBoolean() ? a.not() : a;

  return a.equals(b).not();
}

function xorAll(wires: Bool[]): Bool {
  return wires.reduce(xor, FALSE);
}

function and(a: Bool, b: Bool): Bool {
  if (a.isConstant()) return a.toBoolean() ? b : FALSE;
  if (b.isConstant()) return b.toBoolean() ? a : FALSE;
  return a.and(b);
}

// (not a) and b, the nonlinear term of chi
function andNot(a: Bool, b: Bool): Bool {
  return and(not(a), b);
}

function not(a: Bool): Bool {
  if (a.isConstant()) return constant(!a.toBoolean());
  return a.not();
}
