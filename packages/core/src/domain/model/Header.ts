/** Ordered field names taken from the first row. */
export interface Header {
  readonly names: readonly string[];
  readonly nameSet: ReadonlySet<string>;
}

export function createHeader(names: readonly string[]): Header {
  return { names: [...names], nameSet: new Set(names) };
}
