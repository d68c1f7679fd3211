import {
  LogContext,
  type Context,
  type LogLevel,
  type LogSink,
} from '@rocicorp/logger';
import * as v from './valita.ts';

export const logLevelSchema = v.union(
  v.literal('debug'),
  v.literal('info'),
  v.literal('warn'),
  v.literal('error'),
);

export const logFormatSchema = v.union(v.literal('text'), v.literal('json'));

export type LogConfig = {
  level: LogLevel;
  format: v.Infer<typeof logFormatSchema>;
};

/** Anything with a `write(line)` method, e.g. `process.stderr`. */
export type LineWriter = {
  write(chunk: string): unknown;
};

export function createLogContext(
  {log}: {log: LogConfig},
  context: Context,
  sink: LogSink = getLogSink(log),
): LogContext {
  return new LogContext(log.level, context, sink);
}

export function getLogSink(
  config: LogConfig,
  out: LineWriter = process.stderr,
): LogSink {
  return config.format === 'json'
    ? new JSONLogSink(out)
    : new TextLogSink(out);
}

/**
 * Writes `LEVEL key=value ... message` lines. Stdout is left to the
 * program's own output.
 */
export class TextLogSink implements LogSink {
  readonly #out: LineWriter;

  constructor(out: LineWriter) {
    this.#out = out;
  }

  log(level: LogLevel, context: Context | undefined, ...args: unknown[]) {
    const prefix = [level.toUpperCase()];
    for (const [k, val] of Object.entries(context ?? {})) {
      prefix.push(`${k}=${stringify(val)}`);
    }
    this.#out.write(
      [...prefix, ...args.map(stringify)].join(' ') + '\n',
    );
  }
}

/** One JSON object per line, for log collectors. */
export class JSONLogSink implements LogSink {
  readonly #out: LineWriter;

  constructor(out: LineWriter) {
    this.#out = out;
  }

  log(level: LogLevel, context: Context | undefined, ...args: unknown[]) {
    this.#out.write(
      JSON.stringify(
        {
          level: level.toUpperCase(),
          ...context,
          message: args.map(stringify).join(' '),
        },
        bigintReplacer,
      ) + '\n',
    );
  }
}

function stringify(val: unknown): string {
  switch (typeof val) {
    case 'string':
      return val;
    case 'bigint':
      return `${val}n`;
    case 'object':
      if (val instanceof Error) {
        return val.stack ?? val.message;
      }
      return JSON.stringify(val, bigintReplacer);
    default:
      return String(val);
  }
}

function bigintReplacer(_key: string, val: unknown): unknown {
  return typeof val === 'bigint' ? `${val}n` : val;
}
