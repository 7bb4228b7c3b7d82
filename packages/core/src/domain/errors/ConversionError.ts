/** Machine-readable codes for every failure the conversion core can raise. */
export type ConversionErrorCode = 'INVALID_OPTIONS' | 'ENCODING' | 'MALFORMED' | 'ENCODE';

/** Base class for errors raised by the conversion core. Transport errors are never wrapped in it. */
export abstract class ConversionError extends Error {
  abstract readonly code: ConversionErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Parse configuration rejected before a conversion starts. */
export class OptionsError extends ConversionError {
  readonly code = 'INVALID_OPTIONS';

  constructor(
    message: string,
    /** Name of the offending option (`'delimiter'`, `'quote'`, `'extraFields'`). */
    readonly option: string,
  ) {
    super(message);
  }
}

/** Input that cannot be decoded into records. Fatal to the conversion. */
export class DecodeError extends ConversionError {
  constructor(
    readonly code: 'ENCODING' | 'MALFORMED',
    message: string,
    readonly position: {
      /** Byte offset of the chunk in which the failure was found. */
      readonly byteOffset?: number;
      /** 1-based physical line on which the failing row started. */
      readonly line?: number;
    } = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A value the encoder could not serialize. Fatal to the conversion. */
export class EncodeError extends ConversionError {
  readonly code = 'ENCODE';

  constructor(
    message: string,
    /** Zero-based index of the element that failed. */
    readonly index: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Narrow an unknown thrown value to a core error. */
export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}
