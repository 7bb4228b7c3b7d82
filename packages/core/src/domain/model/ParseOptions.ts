import { OptionsError } from '../errors/ConversionError.js';

export const DEFAULT_DELIMITER = ',';
export const DEFAULT_QUOTE = '"';

/**
 * What to do with values beyond the header's width.
 *
 * - `'drop'`: discard them and report a `row:truncated` event.
 * - `'reject'`: fail the conversion with a `MALFORMED` decode error.
 * - `'index'`: keep them under synthetic keys named after their 0-based column position.
 */
export type ExtraFieldsPolicy = 'drop' | 'reject' | 'index';

export const EXTRA_FIELDS_POLICIES: readonly ExtraFieldsPolicy[] = ['drop', 'reject', 'index'];

/** Fully resolved CSV parse configuration. Built once per conversion and never mutated. */
export interface ParseOptions {
  /** Field separator. Single ASCII character. Default: `','`. */
  readonly delimiter: string;
  /** Quote character. Single ASCII character. Default: `'"'`. */
  readonly quote: string;
  /** Policy for rows wider than the header. Default: `'drop'`. */
  readonly extraFields: ExtraFieldsPolicy;
}

/** Unvalidated options as received from a caller (query string, config file, etc.). */
export interface ParseOptionsInput {
  readonly delimiter?: string;
  readonly quote?: string;
  readonly extraFields?: string;
}

/**
 * Validate caller-supplied options and fill in defaults.
 *
 * @throws {OptionsError} when a character option is not exactly one ASCII character,
 *   is a line break, when delimiter and quote collide, or when the policy is unknown.
 */
export function resolveParseOptions(input: ParseOptionsInput = {}): ParseOptions {
  const delimiter = checkCharacter('delimiter', input.delimiter ?? DEFAULT_DELIMITER);
  const quote = checkCharacter('quote', input.quote ?? DEFAULT_QUOTE);

  if (delimiter === quote) {
    throw new OptionsError(`delimiter and quote must differ (both are ${JSON.stringify(delimiter)})`, 'quote');
  }

  const extraFields = input.extraFields ?? 'drop';
  if (!isExtraFieldsPolicy(extraFields)) {
    throw new OptionsError(
      `extraFields must be one of ${EXTRA_FIELDS_POLICIES.join(', ')} (got ${JSON.stringify(extraFields)})`,
      'extraFields',
    );
  }

  return Object.freeze({ delimiter, quote, extraFields });
}

function checkCharacter(option: string, value: string): string {
  if (value.length !== 1) {
    throw new OptionsError(`${option} must be a single character (got ${JSON.stringify(value)})`, option);
  }
  const code = value.charCodeAt(0);
  if (code > 0x7f) {
    throw new OptionsError(`${option} must be an ASCII character (got ${JSON.stringify(value)})`, option);
  }
  if (value === '\n' || value === '\r') {
    throw new OptionsError(`${option} cannot be a line break`, option);
  }
  return value;
}

function isExtraFieldsPolicy(value: string): value is ExtraFieldsPolicy {
  return (EXTRA_FIELDS_POLICIES as readonly string[]).includes(value);
}
