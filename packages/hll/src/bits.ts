import {assert} from '../../shared/src/asserts.ts';

/** Width of the hashes produced by a {@link HashOracle}. */
export const HASH_BITS = 64;

/** Largest supported register-count exponent. */
export const MAX_BITS = 30;

/** Deterministic 64-bit hash of a key. Values are read as unsigned. */
export type HashOracle<K> = (key: K) => bigint;

/**
 * Normalizes a register-count exponent. Negative exponents are clamped to
 * `0` (a single bucket).
 */
export function clampBits(bits: number): number {
  assert(Number.isInteger(bits), () => `bits must be an integer: ${bits}`);
  assert(
    bits <= MAX_BITS,
    () => `bits must be at most ${MAX_BITS}: ${bits}`,
  );
  return Math.max(0, bits);
}

export function toUint64(hash: bigint): bigint {
  return BigInt.asUintN(HASH_BITS, hash);
}

/**
 * Bucket index from the `bits` most significant bits of `hash`, with the bit
 * order reversed: hash bit 63 becomes index bit 0, hash bit 62 index bit 1,
 * and so on.
 */
export function bucketIndex(hash: bigint, bits: number): number {
  let index = 0;
  for (let j = 0; j < bits; j++) {
    if ((hash >> BigInt(HASH_BITS - 1 - j)) & 1n) {
      index |= 1 << j;
    }
  }
  return index;
}

/**
 * One-based position of the first `1` in the low `64 - bits` bits of `hash`,
 * scanning down from the most significant end of that range. Returns `0` if
 * the range is all zeros.
 */
export function leftmostOnePosition(hash: bigint, bits: number): number {
  const rest = BigInt.asUintN(HASH_BITS - bits, hash);
  if (rest === 0n) {
    return 0;
  }
  return clz64(rest) - bits + 1;
}

/**
 * Zero-based position of the first `1` in the low `64 - bits` bits of
 * `hash`, scanning up from bit 0. Returns `64 - bits` if the range is all
 * zeros.
 */
export function rightmostOnePosition(hash: bigint, bits: number): number {
  const rest = BigInt.asUintN(HASH_BITS - bits, hash);
  if (rest === 0n) {
    return HASH_BITS - bits;
  }
  return ctz64(rest);
}

/** The 64-character binary rendering of a hash, most significant bit first. */
export function formatBinary(hash: bigint): string {
  return toUint64(hash).toString(2).padStart(HASH_BITS, '0');
}

function clz64(x: bigint): number {
  const hi = Number(x >> 32n);
  return hi !== 0 ? Math.clz32(hi) : 32 + Math.clz32(Number(x & 0xffffffffn));
}

function ctz64(x: bigint): number {
  const lo = Number(x & 0xffffffffn);
  return lo !== 0 ? ctz32(lo) : 32 + ctz32(Number(x >> 32n));
}

function ctz32(x: number): number {
  return 31 - Math.clz32(x & -x);
}
