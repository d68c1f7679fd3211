import {loadXXHash64} from '../../shared/src/xxhash.ts';
import type {HashOracle} from './bits.ts';

/** Keys accepted by the default hash oracle: strings and 64-bit integers. */
export type Key = string | bigint;

/**
 * Loads an xxHash64-backed oracle. Strings are hashed as UTF-8. Integers are
 * hashed as the 8 little-endian bytes of their signed 64-bit two's-complement
 * value, so keys that are equal modulo `2^64` hash alike.
 */
export async function loadKeyHasher(seed = 0n): Promise<HashOracle<Key>> {
  const {h64, h64Raw} = await loadXXHash64(seed);
  const buf = new DataView(new ArrayBuffer(8));
  const bytes = new Uint8Array(buf.buffer);

  return key => {
    if (typeof key === 'string') {
      return h64(key);
    }
    buf.setBigInt64(0, BigInt.asIntN(64, key), true);
    return h64Raw(bytes);
  };
}
