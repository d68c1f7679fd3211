import {logFormatSchema, logLevelSchema} from '../../shared/src/logging.ts';
import type {OptionDocs} from '../../shared/src/options.ts';
import * as v from '../../shared/src/valita.ts';

export const ENV_VAR_PREFIX = 'HLL_';

const integer = (name: string) =>
  v.number().assert(Number.isInteger, `${name} must be an integer`);

function isUint64(value: string): boolean {
  return /^\d+$/.test(value) && BigInt(value) < 1n << 64n;
}

export const hllOptions = {
  kind: v.union(v.literal('flat'), v.literal('packed')).default('flat'),
  bits: integer('bits').default(14),
  seed: v
    .string()
    .assert(isUint64, 'seed must be an unsigned 64-bit integer')
    .default('0'),
  reportEvery: integer('reportEvery').default(0),
  logLevel: logLevelSchema.default('info'),
  logFormat: logFormatSchema.default('text'),
};

const hllConfigSchema = v.object(hllOptions);

export type HLLConfig = v.Infer<typeof hllConfigSchema>;

export const hllOptionDocs: OptionDocs = {
  kind: {
    desc: [
      `Register layout: flat keeps one byte per register, packed keeps`,
      `4 bits per register plus an overflow map for values of 16 and up.`,
    ],
    alias: 'k',
  },
  bits: {
    desc: [
      `Register-count exponent. The estimator keeps 2^bits registers.`,
      `Negative values are treated as 0 (a single register).`,
    ],
    alias: 'b',
  },
  seed: {
    desc: [`Seed for the xxHash64 key hash, 0 to 2^64-1.`],
  },
  reportEvery: {
    desc: [
      `Print the running estimate after every N keys. 0 prints only the`,
      `final estimate.`,
    ],
    alias: 'n',
  },
  logLevel: {
    desc: [`debug, info, warn or error. Logs are written to stderr.`],
  },
  logFormat: {
    desc: [`text or json.`],
  },
};
