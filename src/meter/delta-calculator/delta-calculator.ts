/**
 * Counter delta computation.
 *
 * OS byte counters only grow while an interface stays up. A reading lower than
 * the previous one means the counter was reset (interface restart, driver
 * reload), so the whole current value counts as new traffic. A wrap at the
 * 64-bit boundary is indistinguishable from a reset here and is reported the
 * same way.
 */

export interface CounterPair {
  upload: number;
  download: number;
}

export function delta(current: number, previous: number): number {
  return current >= previous ? current - previous : current;
}

/**
 * Applies delta() to both directions of a counter reading
 */
export function counterDeltas(current: CounterPair, previous: CounterPair): CounterPair {
  return {
    upload: delta(current.upload, previous.upload),
    download: delta(current.download, previous.download),
  };
}
