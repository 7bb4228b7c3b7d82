/**
 * One decoded data row, keyed by header name.
 *
 * A `Map` rather than a plain object: iteration follows header order even for
 * integer-like names such as `"2024"`, which object key ordering would move to the front.
 */
export type CsvRecord = ReadonlyMap<string, string>;

/** Serialize a record as a JSON object whose keys appear in the record's iteration order. */
export function serializeRecord(record: CsvRecord): string {
  let json = '{';
  let first = true;
  for (const [name, value] of record) {
    if (!first) json += ',';
    json += `${JSON.stringify(name)}:${JSON.stringify(value)}`;
    first = false;
  }
  return json + '}';
}

