import type { ParseOptions, ParseOptionsInput } from '@csvjson/core';
import { OptionsError, resolveParseOptions } from '@csvjson/core';

/** Query string parameters, named as they appear in the URL. */
const QUERY_PARAMETERS = {
  delimiter: 'delimiter',
  quote: 'quote',
  extraFields: 'extra-fields',
} as const satisfies Record<keyof ParseOptionsInput, string>;

/**
 * Build parse options from a parsed query string (`?delimiter=%09&quote=%27&extra-fields=index`).
 *
 * @throws {OptionsError} when a parameter is repeated, nested, or invalid.
 */
export function parseQueryOptions(query: Readonly<Record<string, unknown>>): ParseOptions {
  return resolveParseOptions({
    delimiter: readParameter(query, 'delimiter'),
    quote: readParameter(query, 'quote'),
    extraFields: readParameter(query, 'extraFields'),
  });
}

function readParameter(query: Readonly<Record<string, unknown>>, option: keyof ParseOptionsInput): string | undefined {
  const name = QUERY_PARAMETERS[option];
  const value = query[name];
  if (value === undefined || typeof value === 'string') return value;
  throw new OptionsError(`${name} must be given once as a plain value`, option);
}
