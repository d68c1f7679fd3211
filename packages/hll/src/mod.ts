export {
  HASH_BITS,
  MAX_BITS,
  bucketIndex,
  clampBits,
  leftmostOnePosition,
  rightmostOnePosition,
  type HashOracle,
} from './bits.ts';
export {ALPHA, MonotonicCardinality} from './cardinality.ts';
export {
  createEstimator,
  type CardinalityEstimator,
  type EstimatorKind,
} from './estimator.ts';
export {loadKeyHasher, type Key} from './hash.ts';
export {HyperLogLog} from './hyperloglog.ts';
export {DENSE_BUCKET_BITS, PackedHyperLogLog} from './packed-hyperloglog.ts';
