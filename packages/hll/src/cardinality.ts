/**
 * Calibration constant of the cardinality formula. A single scalar is used
 * for every register count; there is no per-`m` bias correction table.
 */
export const ALPHA = 0.79402;

/** `Σ 2^(-v)` over register values. */
export function inversePowerSum(values: Iterable<number>): number {
  let sum = 0;
  for (const v of values) {
    sum += Math.pow(2, -v);
  }
  return sum;
}

/**
 * `floor(ALPHA * m * m / sum)`, or `undefined` when `sum` is not positive
 * and no estimate can be made.
 */
export function estimateCardinality(m: number, sum: number): number | undefined {
  if (sum <= 0) {
    return undefined;
  }
  return Math.floor((ALPHA * m * m) / sum);
}

/**
 * A cardinality that never goes down. The raw estimate is not monotonic in
 * the register values, but once a count has been reported a lower one is
 * never reported after it.
 */
export class MonotonicCardinality {
  #value = 0;

  get value(): number {
    return this.#value;
  }

  /** Stores `raw` if it is strictly greater. Returns whether it did. */
  offer(raw: number): boolean {
    if (raw <= this.#value) {
      return false;
    }
    this.#value = raw;
    return true;
  }
}
