import type {LogContext} from '@rocicorp/logger';
import {assert} from '../../shared/src/asserts.ts';
import {
  bucketIndex,
  clampBits,
  formatBinary,
  leftmostOnePosition,
  toUint64,
  type HashOracle,
} from './bits.ts';
import {
  ALPHA,
  MonotonicCardinality,
  estimateCardinality,
  inversePowerSum,
} from './cardinality.ts';
import type {CardinalityEstimator} from './estimator.ts';

/**
 * HyperLogLog with one byte-wide register per bucket.
 *
 * Each key is hashed to 64 bits. The top `bits` bits (read in reverse order)
 * select one of `2^bits` registers, and the register keeps the largest
 * one-based position of the first set bit seen in the remaining bits.
 *
 * All methods are synchronous, so a call runs to completion before any other
 * caller can observe or modify the registers.
 *
 * @example
 * ```ts
 * const hll = new HyperLogLog(lc, 10, await loadKeyHasher());
 * for (const id of userIds) {
 *   hll.addElement(id);
 * }
 * hll.computeCardinality();
 * hll.getCardinality(); // ~ distinct user ids
 * ```
 */
export class HyperLogLog<K> implements CardinalityEstimator<K> {
  readonly #lc: LogContext;
  readonly #hash: HashOracle<K>;
  readonly #bits: number;
  // rho is at most 64, so a byte per register is enough.
  readonly #registers: Uint8Array;
  readonly #cardinality = new MonotonicCardinality();

  constructor(lc: LogContext, bits: number, hash: HashOracle<K>) {
    this.#bits = clampBits(bits);
    this.#lc = lc.withContext('hll', 'flat');
    this.#hash = hash;
    this.#registers = new Uint8Array(1 << this.#bits);
  }

  get bits(): number {
    return this.#bits;
  }

  get numRegisters(): number {
    return this.#registers.length;
  }

  addElement(key: K): void {
    const hash = toUint64(this.#hash(key));
    const bucket = bucketIndex(hash, this.#bits);
    const rho = leftmostOnePosition(hash, this.#bits);
    this.#lc.debug?.(
      `new elem: ${String(key)}, hash: ${hash}, binary: ${formatBinary(hash)}`,
    );

    if (rho <= this.#registers[bucket]) {
      return;
    }
    this.#registers[bucket] = rho;
    this.#lc.debug?.(`bucket updated, bucket: ${bucket}, current: ${rho}`);
  }

  computeCardinality(): void {
    const m = this.#registers.length;
    const sum = inversePowerSum(this.#registers);
    this.#lc.debug?.(`registers: ${this.#registers.join(' ')}, sum: ${sum}`);

    const cardinality = estimateCardinality(m, sum);
    if (cardinality === undefined) {
      return;
    }
    if (this.#cardinality.offer(cardinality)) {
      this.#lc.debug?.(
        `compute cardinality: ${ALPHA} * ${m} * ${m} / ${sum} = ${cardinality}`,
      );
    }
  }

  getCardinality(): number {
    return this.#cardinality.value;
  }

  getRegister(index: number): number {
    assert(
      Number.isInteger(index) && index >= 0 && index < this.#registers.length,
      () => `register index out of range: ${index}`,
    );
    return this.#registers[index];
  }

  /** A copy of the register values. */
  registers(): number[] {
    return Array.from(this.#registers);
  }
}
