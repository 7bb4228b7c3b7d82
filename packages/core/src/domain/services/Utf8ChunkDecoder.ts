import { DecodeError } from '../errors/ConversionError.js';

/** Text decoded from one chunk, plus the error that stopped decoding inside it, if any. */
export interface DecodedChunk {
  readonly text: string;
  readonly error?: DecodeError;
}

const EMPTY = new Uint8Array(0);

/**
 * Streaming UTF-8 validator and decoder.
 *
 * A multi-byte sequence split across chunks is held back until it completes.
 * When a chunk contains an invalid sequence, the text before it is still
 * returned, together with a `DecodeError('ENCODING')` whose `byteOffset` is the
 * absolute position of the byte where decoding failed. A leading byte-order
 * mark is dropped.
 */
export class Utf8ChunkDecoder {
  private readonly decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  /** Bytes of an incomplete sequence at the end of the previous chunk. */
  private held: Uint8Array = EMPTY;
  private consumed = 0;
  private atStart = true;

  write(chunk: Uint8Array): DecodedChunk {
    let text: string;
    try {
      text = this.decoder.decode(chunk, { stream: true });
    } catch (error) {
      return this.salvage(chunk, error);
    }
    this.hold(chunk, text);
    return { text: this.stripBom(text) };
  }

  /**
   * Signal end of input.
   *
   * @throws {DecodeError} `ENCODING` when the input ends inside a multi-byte sequence.
   */
  end(): string {
    try {
      return this.stripBom(this.decoder.decode());
    } catch (error) {
      throw invalidAt(this.consumed - this.held.length, error);
    }
  }

  /** Keep the trailing bytes the decoder did not turn into text. Valid UTF-8 re-encodes to exactly its input. */
  private hold(chunk: Uint8Array, text: string): void {
    const count = this.held.length + chunk.length - Buffer.byteLength(text, 'utf8');
    if (count === 0) {
      this.held = EMPTY;
    } else if (count <= chunk.length) {
      this.held = Uint8Array.from(chunk.subarray(chunk.length - count));
    } else {
      const joined = Buffer.concat([this.held, chunk]);
      this.held = Uint8Array.from(joined.subarray(joined.length - count));
    }
    this.consumed += chunk.length;
  }

  /** Decode what precedes the invalid sequence in a chunk that failed as a whole. */
  private salvage(chunk: Uint8Array, cause: unknown): DecodedChunk {
    const bytes = this.held.length === 0 ? chunk : Buffer.concat([this.held, chunk]);
    const valid = validPrefixLength(bytes);
    const text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes.subarray(0, valid), {
      stream: true,
    });
    return {
      text: this.stripBom(text),
      error: invalidAt(this.consumed - this.held.length + valid, cause),
    };
  }

  private stripBom(text: string): string {
    if (!this.atStart || text.length === 0) return text;
    this.atStart = false;
    return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  }
}

function invalidAt(byteOffset: number, cause: unknown): DecodeError {
  return new DecodeError(
    'ENCODING',
    `input is not valid UTF-8 at byte offset ${String(byteOffset)}`,
    { byteOffset },
    { cause },
  );
}

/**
 * Length of the longest prefix that streams without error. `bytes` as a whole is
 * known to fail, and validity of prefixes is monotone, so a binary search finds it.
 */
function validPrefixLength(bytes: Uint8Array): number {
  let low = 0;
  let high = bytes.length;
  while (high - low > 1) {
    const mid = (low + high) >>> 1;
    if (isValidPrefix(bytes.subarray(0, mid))) {
      low = mid;
    } else {
      high = mid;
    }
  }
  return low;
}

function isValidPrefix(bytes: Uint8Array): boolean {
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(bytes, { stream: true });
    return true;
  } catch {
    return false;
  }
}
