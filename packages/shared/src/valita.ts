import * as v from '@badrap/valita';

export * from '@badrap/valita';

export type ParseMode = 'passthrough' | 'strict' | 'strip';

/**
 * Parses `value` against `schema`, throwing a `TypeError` that names the
 * failing path when it does not match.
 */
export function parse<T>(
  value: unknown,
  schema: v.Type<T>,
  mode: ParseMode = 'strict',
): T {
  const result = schema.try(value, {mode});
  if (!result.ok) {
    throw new TypeError(result.message);
  }
  return result.value;
}
