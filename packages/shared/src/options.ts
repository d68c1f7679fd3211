import commandLineArgs from 'command-line-args';
import commandLineUsage from 'command-line-usage';
import * as v from './valita.ts';

export type OptionType =
  | v.Type<string>
  | v.Type<number>
  | v.Type<boolean>
  | v.Optional<string>
  | v.Optional<number>
  | v.Optional<boolean>;

/**
 * # Options
 *
 * A flat set of configuration values parsed from environment variables
 * and/or command line flags. Each option is a `valita` schema keyed by its
 * camelCase name:
 *
 * ```ts
 * {
 *   bits: v.number().default(14),
 *   logLevel: v.union(v.literal('debug'), v.literal('info'), ...),
 * }
 * ```
 *
 * | Option    | Flag         | Env (prefix `HLL_`) |
 * | --------- | ------------ | ------------------- |
 * | bits      | --bits       | HLL_BITS            |
 * | logLevel  | --log-level  | HLL_LOG_LEVEL       |
 *
 * Flags take precedence over environment variables, which take precedence
 * over schema defaults. Tokenizing is done by `command-line-args`, and the
 * `--help` guide is rendered by `command-line-usage`, showing each option's
 * env var and default.
 */
export type Options = Record<string, OptionType>;

export type OptionDoc = {
  /** Lines displayed in --help. */
  desc?: string[];
  /** One-character alias for getopt-style short flags, e.g. -b */
  alias?: string;
};

export type OptionDocs = Record<string, OptionDoc>;

export type UsageSection = commandLineUsage.Section;

// Name under which command-line-args collects the positional arguments.
const ARGS = '_args';

export function flagName(option: string): string {
  return option.replace(/[A-Z]/g, c => `-${c.toLowerCase()}`);
}

export function envName(option: string, envPrefix: string): string {
  return envPrefix + option.replace(/[A-Z]/g, c => `_${c}`).toUpperCase();
}

const helpDefinition: commandLineArgs.OptionDefinition = {
  name: 'help',
  alias: 'h',
  type: Boolean,
};

export function wantsHelp(argv: readonly string[]): boolean {
  const parsed: Record<string, unknown> = commandLineArgs([helpDefinition], {
    argv: [...argv],
    partial: true,
  });
  return parsed.help === true;
}

/**
 * Parses `argv` and `env` into a config object typed by `options`, and
 * returns the non-flag arguments alongside it.
 *
 * Every flag is read as a string and then coerced against its schema, so a
 * numeric flag and its env var fail with the same message. A flag given
 * without a value is `true` for boolean options and an error otherwise.
 */
export function parseOptionsWithArgs<O extends Options>(
  options: O,
  argv: readonly string[],
  envPrefix: string,
  env: NodeJS.ProcessEnv = process.env,
  docs: OptionDocs = {},
) {
  const parsed = tokenize(definitions(options, docs), argv);
  const raw: Record<string, unknown> = {};

  for (const [name, type] of Object.entries(options)) {
    const flag = flagName(name);
    const envVar = envName(name, envPrefix);
    const flagValue = parsed[flag];
    if (flagValue === null) {
      if (!type.try(true).ok) {
        throw new TypeError(`Missing value for --${flag} (${envVar})`);
      }
      raw[name] = true;
      continue;
    }
    const value = typeof flagValue === 'string' ? flagValue : env[envVar];
    raw[name] =
      value === undefined
        ? undefined
        : coerce(
            type,
            value,
            () => `Invalid value for --${flag} (${envVar}): "${value}"`,
          );
  }

  const positional = parsed[ARGS];
  const args = Array.isArray(positional)
    ? positional.filter((arg): arg is string => typeof arg === 'string')
    : [];
  return {config: v.parse(raw, v.object(options), 'strict'), args};
}

export function parseOptions<O extends Options>(
  options: O,
  argv: readonly string[],
  envPrefix: string,
  env: NodeJS.ProcessEnv = process.env,
  docs: OptionDocs = {},
) {
  return parseOptionsWithArgs(options, argv, envPrefix, env, docs).config;
}

/**
 * Renders the `--help` guide: `sections` followed by an "Options" table
 * listing each flag with its alias, description, env var and default.
 */
export function usage<O extends Options>(
  options: O,
  envPrefix: string,
  docs: OptionDocs = {},
  sections: UsageSection[] = [],
): string {
  const optionList: commandLineUsage.OptionDefinition[] = Object.entries(
    options,
  ).map(([name, type]) => {
    const doc = docs[name];
    const defaultValue = getDefault(type);
    const description = [
      ...(doc?.desc ?? []),
      `Env: ${envName(name, envPrefix)}.`,
      ...(defaultValue === undefined ? [] : [`Default: ${defaultValue}.`]),
    ].join(' ');
    return {
      name: flagName(name),
      ...(doc?.alias ? {alias: doc.alias} : {}),
      typeLabel: type.try(true).ok ? '' : 'value',
      description,
    };
  });
  optionList.push({
    name: 'help',
    alias: 'h',
    typeLabel: '',
    description: 'Print this guide.',
  });
  return commandLineUsage([...sections, {header: 'Options', optionList}]);
}

function definitions(
  options: Options,
  docs: OptionDocs,
): commandLineArgs.OptionDefinition[] {
  return [
    ...Object.keys(options).map(name => {
      const alias = docs[name]?.alias;
      return {name: flagName(name), ...(alias ? {alias} : {}), type: String};
    }),
    helpDefinition,
    {name: ARGS, type: String, multiple: true, defaultOption: true},
  ];
}

function tokenize(
  defs: commandLineArgs.OptionDefinition[],
  argv: readonly string[],
): Record<string, unknown> {
  try {
    return commandLineArgs(defs, {argv: [...argv]});
  } catch (e) {
    if (e instanceof Error && e.name === 'UNKNOWN_OPTION') {
      const option =
        'optionName' in e && typeof e.optionName === 'string'
          ? e.optionName
          : e.message;
      throw new TypeError(`Unknown option: ${option}`);
    }
    throw e;
  }
}

function getDefault(type: OptionType): string | undefined {
  const result = type.try(undefined);
  return result.ok && result.value !== undefined
    ? String(result.value)
    : undefined;
}

function coerce(
  type: OptionType,
  value: string,
  errorMessage: () => string,
): unknown {
  const candidates: unknown[] = [value];
  if (value.trim() !== '' && !Number.isNaN(Number(value))) {
    candidates.push(Number(value));
  }
  if (value === 'true' || value === 'false') {
    candidates.push(value === 'true');
  }
  for (const candidate of candidates) {
    if (type.try(candidate).ok) {
      return candidate;
    }
  }
  throw new TypeError(errorMessage());
}
