import {describe, expect, test} from 'vitest';
import {
  envName,
  flagName,
  parseOptions,
  parseOptionsWithArgs,
  usage,
  wantsHelp,
} from './options.ts';
import * as v from './valita.ts';

const options = {
  port: v.number().default(4848),
  mode: v.union(v.literal('fast'), v.literal('slow')).default('fast'),
  replicaFile: v.string().optional(),
  verbose: v.boolean().default(false),
};

const docs = {
  port: {desc: ['Port to listen on.'], alias: 'p'},
  mode: {desc: ['fast or slow.']},
};

test('names', () => {
  expect(flagName('replicaFile')).toBe('replica-file');
  expect(envName('replicaFile', 'APP_')).toBe('APP_REPLICA_FILE');
  expect(envName('port', '')).toBe('PORT');
});

describe('parseOptions', () => {
  test('applies defaults', () => {
    expect(parseOptions(options, [], 'APP_', {})).toEqual({
      port: 4848,
      mode: 'fast',
      replicaFile: undefined,
      verbose: false,
    });
  });

  test('reads environment variables', () => {
    const config = parseOptions(options, [], 'APP_', {
      ['APP_PORT']: '9000',
      ['APP_MODE']: 'slow',
      ['APP_REPLICA_FILE']: '/tmp/replica.db',
      ['APP_VERBOSE']: 'true',
    });
    expect(config).toEqual({
      port: 9000,
      mode: 'slow',
      replicaFile: '/tmp/replica.db',
      verbose: true,
    });
  });

  test('flags take precedence over the environment', () => {
    const config = parseOptions(
      options,
      ['--port', '7000', '--replica-file=/data/r.db'],
      'APP_',
      {['APP_PORT']: '9000'},
    );
    expect(config.port).toBe(7000);
    expect(config.replicaFile).toBe('/data/r.db');
  });

  test('a flag without a value is true', () => {
    expect(parseOptions(options, ['--verbose'], 'APP_', {}).verbose).toBe(
      true,
    );
  });

  test('string options keep numeric-looking values', () => {
    expect(
      parseOptions(options, ['--replica-file', '123'], 'APP_', {}).replicaFile,
    ).toBe('123');
  });

  test('short aliases', () => {
    expect(parseOptions(options, ['-p', '1234'], 'APP_', {}, docs).port).toBe(
      1234,
    );
  });

  test('rejects invalid values', () => {
    expect(() => parseOptions(options, ['--mode', 'medium'], 'APP_', {})).toThrow(
      'Invalid value for --mode (APP_MODE): "medium"',
    );
    expect(() => parseOptions(options, [], 'APP_', {['APP_PORT']: 'x'})).toThrow(
      'Invalid value for --port (APP_PORT): "x"',
    );
  });

  test('rejects unknown flags', () => {
    expect(() => parseOptions(options, ['--colour', 'red'], 'APP_', {})).toThrow(
      'Unknown option: --colour',
    );
  });

  test('rejects a non-boolean flag without a value', () => {
    expect(() => parseOptions(options, ['--port'], 'APP_', {})).toThrow(
      'Missing value for --port (APP_PORT)',
    );
    expect(() =>
      parseOptions(options, ['--port', '--verbose'], 'APP_', {}),
    ).toThrow('Missing value for --port (APP_PORT)');
  });

  test('negative numbers are values', () => {
    expect(parseOptions(options, ['-p', '-1'], 'APP_', {}, docs).port).toBe(
      -1,
    );
  });
});

test('parseOptionsWithArgs returns positional arguments', () => {
  const {config, args} = parseOptionsWithArgs(
    options,
    ['a.txt', '--port', '1', 'b.txt'],
    'APP_',
    {},
  );
  expect(config.port).toBe(1);
  expect(args).toEqual(['a.txt', 'b.txt']);
});

test('wantsHelp', () => {
  expect(wantsHelp(['--help'])).toBe(true);
  expect(wantsHelp(['-h'])).toBe(true);
  expect(wantsHelp(['--port', '1'])).toBe(false);
});

describe('usage', () => {
  const guide = usage(options, 'APP_', docs, [
    {header: 'app [options]', content: 'Runs the app.'},
  ]);

  test('lists every flag with its alias', () => {
    expect(guide).toContain('app [options]');
    expect(guide).toContain('Runs the app.');
    expect(guide).toContain('--port');
    expect(guide).toContain('-p');
    expect(guide).toContain('--replica-file');
    expect(guide).toContain('--help');
  });

  test('shows env vars and defaults', () => {
    expect(guide).toContain('Port to listen on.');
    expect(guide).toContain('APP_PORT');
    expect(guide).toContain('Default:');
    expect(guide).toContain('4848');
    expect(guide).toContain('APP_REPLICA_FILE');
  });
});
