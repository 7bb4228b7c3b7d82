import type { CsvRecord } from '../model/CsvRecord.js';
import type { Header } from '../model/Header.js';
import type { ExtraFieldsPolicy } from '../model/ParseOptions.js';

/** Outcome of fitting one row of values to the header. */
export type ShapeOutcome =
  | {
      readonly kind: 'record';
      readonly record: CsvRecord;
      /** Number of values discarded under the `'drop'` policy. */
      readonly dropped: number;
    }
  | {
      readonly kind: 'rejected';
      /** Number of values beyond the header's width. */
      readonly extra: number;
    };

/**
 * Fit a row to the header. This is the single place where row width is decided.
 *
 * Short rows carry only the keys that received a value. Long rows follow `policy`.
 * A repeated header name keeps its first position and takes the later column's value.
 */
export function shapeRecord(header: Header, values: readonly string[], policy: ExtraFieldsPolicy): ShapeOutcome {
  const width = header.names.length;
  const extra = Math.max(0, values.length - width);

  if (extra > 0 && policy === 'reject') {
    return { kind: 'rejected', extra };
  }

  const record = new Map<string, string>();
  const named = Math.min(width, values.length);
  for (let i = 0; i < named; i++) {
    record.set(header.names[i] ?? '', values[i] ?? '');
  }

  if (extra > 0 && policy === 'index') {
    for (let i = width; i < values.length; i++) {
      record.set(syntheticKey(header, i), values[i] ?? '');
    }
    return { kind: 'record', record, dropped: 0 };
  }

  return { kind: 'record', record, dropped: extra };
}

/** Key for an extra value: its column index, prefixed with `_` until it no longer collides with a header name. */
export function syntheticKey(header: Header, column: number): string {
  let key = String(column);
  while (header.nameSet.has(key)) {
    key = `_${key}`;
  }
  return key;
}
