export { assert };

/**
 * Throws when a programming contract is broken (wrong block length, unpadded
 * input, out-of-range round index, ...). These are never recoverable.
 */
function assert(condition: boolean, message = 'Failed assertion'): asserts condition {
  if (!condition) {
    throw new Error(message);
  }
}
