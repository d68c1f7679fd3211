import {createReadStream} from 'node:fs';
import {createInterface} from 'node:readline';
import type {Readable} from 'node:stream';
import type {LogContext} from '@rocicorp/logger';
import type {LineWriter} from '../../shared/src/logging.ts';
import type {HashOracle} from './bits.ts';
import type {HLLConfig} from './config.ts';
import {createEstimator} from './estimator.ts';

const STDIN = '-';

/**
 * Feeds every non-empty line of `lines` to a new estimator and writes the
 * estimate to `out`. With `reportEvery > 0`, a `<keys>\t<estimate>` line is
 * also written after every `reportEvery` keys.
 *
 * Returns the final estimate.
 */
export async function countDistinct(
  lc: LogContext,
  config: Pick<HLLConfig, 'kind' | 'bits' | 'reportEvery'>,
  lines: AsyncIterable<string>,
  hash: HashOracle<string>,
  out: LineWriter,
): Promise<number> {
  const {kind, bits, reportEvery} = config;
  const estimator = createEstimator(lc, kind, bits, hash);
  lc.info?.(
    `counting with ${kind} estimator, ${estimator.numRegisters} registers`,
  );

  let keys = 0;
  for await (const line of lines) {
    if (line.length === 0) {
      continue;
    }
    estimator.addElement(line);
    keys++;
    if (reportEvery > 0 && keys % reportEvery === 0) {
      estimator.computeCardinality();
      out.write(`${keys}\t${estimator.getCardinality()}\n`);
    }
  }

  estimator.computeCardinality();
  const estimate = estimator.getCardinality();
  out.write(`${estimate}\n`);
  lc.info?.(`read ${keys} keys, estimated ${estimate} distinct`);
  return estimate;
}

/**
 * Lines of each file in turn, or of `stdin` when no files are given. A file
 * named `-` also reads `stdin`.
 */
export async function* readLines(
  files: readonly string[],
  stdin?: Readable,
): AsyncGenerator<string> {
  const inputs = files.length === 0 ? [STDIN] : files;
  for (const input of inputs) {
    const rl = createInterface({
      input:
        input === STDIN ? (stdin ?? process.stdin) : createReadStream(input),
      crlfDelay: Infinity,
    });
    try {
      yield* rl;
    } finally {
      rl.close();
    }
  }
}
