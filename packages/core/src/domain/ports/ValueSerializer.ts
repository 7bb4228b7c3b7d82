/**
 * Turns one element of the output array into JSON text.
 *
 * Must return a string; `undefined` (what `JSON.stringify` returns for functions
 * and `undefined`) and thrown errors both fail the conversion with an `EncodeError`.
 */
export type ValueSerializer<T> = (value: T) => string | undefined;

/** Default serializer: plain `JSON.stringify`. */
export const jsonSerializer: ValueSerializer<unknown> = (value) => JSON.stringify(value);
