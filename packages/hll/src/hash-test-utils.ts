/** Deterministic xorshift64 sequence for feeding estimators in tests. */
export function* pseudoRandomHashes(
  count: number,
  seed = 0x9e3779b97f4a7c15n,
): Generator<bigint> {
  let x = seed;
  for (let i = 0; i < count; i++) {
    x ^= BigInt.asUintN(64, x << 13n);
    x ^= x >> 7n;
    x ^= BigInt.asUintN(64, x << 17n);
    yield x;
  }
}
