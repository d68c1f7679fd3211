import type {LogContext} from '@rocicorp/logger';
import {assert} from '../../shared/src/asserts.ts';
import {
  bucketIndex,
  clampBits,
  formatBinary,
  rightmostOnePosition,
  toUint64,
  type HashOracle,
} from './bits.ts';
import {
  ALPHA,
  MonotonicCardinality,
  estimateCardinality,
} from './cardinality.ts';
import type {CardinalityEstimator} from './estimator.ts';

/** Width of a dense slot. */
export const DENSE_BUCKET_BITS = 4;
const DENSE_MASK = (1 << DENSE_BUCKET_BITS) - 1;
const MAX_BUCKET_VALUE = 0xffffffff;

/**
 * HyperLogLog with 4-bit registers.
 *
 * Two dense slots are packed into each byte, holding `value & 0xF`. The rare
 * buckets whose value reaches 16 keep the high bits (`value >> 4`) in a
 * sparse overflow map, so that
 *
 * ```
 * value(i) = dense(i) + (overflow.get(i) ?? 0) << 4
 * ```
 *
 * The per-bucket statistic is the zero-based position of the lowest set bit
 * of the hash below the `leadingBits` used for the bucket index, or
 * `64 - leadingBits` when those bits are all zero.
 *
 * Every method follows the same discipline as {@link HyperLogLog}: each call
 * is synchronous and runs to completion, and {@link computeCardinality} sums
 * the registers before it updates the cached estimate.
 */
export class PackedHyperLogLog<K> implements CardinalityEstimator<K> {
  readonly #lc: LogContext;
  readonly #hash: HashOracle<K>;
  readonly #bits: number;
  readonly #numRegisters: number;
  readonly #dense: Uint8Array;
  readonly #overflow = new Map<number, number>();
  readonly #cardinality = new MonotonicCardinality();

  constructor(lc: LogContext, leadingBits: number, hash: HashOracle<K>) {
    this.#bits = clampBits(leadingBits);
    this.#lc = lc.withContext('hll', 'packed');
    this.#hash = hash;
    this.#numRegisters = 1 << this.#bits;
    this.#dense = new Uint8Array(Math.ceil(this.#numRegisters / 2));
  }

  get bits(): number {
    return this.#bits;
  }

  get numRegisters(): number {
    return this.#numRegisters;
  }

  /** Number of buckets that have an overflow entry. */
  get overflowCount(): number {
    return this.#overflow.size;
  }

  addElement(key: K): void {
    const hash = toUint64(this.#hash(key));
    const bucket = bucketIndex(hash, this.#bits);
    const rmo = rightmostOnePosition(hash, this.#bits);
    this.#lc.debug?.(
      `new elem: ${String(key)}, hash: ${hash}, binary: ${formatBinary(hash)}, bucket_index: ${bucket}, rmo: ${rmo}`,
    );

    if (rmo > this.getBucketValue(bucket)) {
      this.setBucketValue(bucket, rmo);
    }
  }

  computeCardinality(): void {
    const m = this.#numRegisters;
    let sum = 0;
    for (let i = 0; i < m; i++) {
      sum += Math.pow(2, -this.getBucketValue(i));
    }

    const cardinality = estimateCardinality(m, sum);
    if (cardinality === undefined) {
      return;
    }
    this.#lc.debug?.(
      `cardinality = ${ALPHA} * ${m} * ${m} / ${sum} = ${cardinality}`,
    );
    if (this.#cardinality.offer(cardinality)) {
      this.#lc.debug?.(`new cardinality set: ${cardinality}`);
    }
  }

  getCardinality(): number {
    return this.#cardinality.value;
  }

  getBucketValue(index: number): number {
    this.#assertIndex(index);
    const dense = this.#readDense(index);
    const overflow = this.#overflow.get(index);
    if (overflow === undefined) {
      return dense;
    }
    return dense + overflow * (1 << DENSE_BUCKET_BITS);
  }

  /**
   * Stores `value`. The overflow entry is written only when `value` needs
   * more than 4 bits; a smaller value leaves an existing entry in place.
   * Registers never decrease, so that entry can never be stale.
   */
  setBucketValue(index: number, value: number): void {
    this.#assertIndex(index);
    assert(
      Number.isInteger(value) && value >= 0 && value <= MAX_BUCKET_VALUE,
      () => `bucket value out of range: ${value}`,
    );
    this.#writeDense(index, value & DENSE_MASK);

    const overflow = value >>> DENSE_BUCKET_BITS;
    if (overflow === 0) {
      return;
    }
    this.#overflow.set(index, overflow);
    this.#lc.debug?.(
      `index: ${index}, rmo: ${value}, dense: ${value & DENSE_MASK}, overflow: ${overflow}`,
    );
  }

  /** The 4-bit dense value of every bucket, unpacked. */
  getDenseBucket(): number[] {
    return Array.from({length: this.#numRegisters}, (_, i) =>
      this.#readDense(i),
    );
  }

  /** The overflow bits of a bucket, or `undefined` if it never overflowed. */
  getOverflowBucket(index: number): number | undefined {
    this.#assertIndex(index);
    return this.#overflow.get(index);
  }

  #readDense(index: number): number {
    const byte = this.#dense[index >>> 1];
    return index & 1 ? byte >>> DENSE_BUCKET_BITS : byte & DENSE_MASK;
  }

  #writeDense(index: number, nibble: number) {
    const i = index >>> 1;
    const byte = this.#dense[i];
    this.#dense[i] =
      index & 1
        ? (byte & DENSE_MASK) | (nibble << DENSE_BUCKET_BITS)
        : (byte & ~DENSE_MASK) | nibble;
  }

  #assertIndex(index: number) {
    assert(
      Number.isInteger(index) && index >= 0 && index < this.#numRegisters,
      () => `bucket index out of range: ${index}`,
    );
  }
}
