import type {LogContext} from '@rocicorp/logger';
import {unreachable} from '../../shared/src/asserts.ts';
import type {HashOracle} from './bits.ts';
import {HyperLogLog} from './hyperloglog.ts';
import {PackedHyperLogLog} from './packed-hyperloglog.ts';

/**
 * Operations shared by both register layouts. Each estimator is fed one key
 * at a time and keeps a cached, never-decreasing estimate that is refreshed
 * by {@link computeCardinality}.
 */
export interface CardinalityEstimator<K> {
  /** Register-count exponent after clamping. */
  readonly bits: number;
  readonly numRegisters: number;

  addElement(key: K): void;
  computeCardinality(): void;
  getCardinality(): number;
}

export type EstimatorKind = 'flat' | 'packed';

export function createEstimator<K>(
  lc: LogContext,
  kind: EstimatorKind,
  bits: number,
  hash: HashOracle<K>,
): CardinalityEstimator<K> {
  switch (kind) {
    case 'flat':
      return new HyperLogLog(lc, bits, hash);
    case 'packed':
      return new PackedHyperLogLog(lc, bits, hash);
    default:
      unreachable(kind);
  }
}
