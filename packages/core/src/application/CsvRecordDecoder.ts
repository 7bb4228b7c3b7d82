import type { ByteChunk, ByteSource } from '../domain/ports/ByteSource.js';
import type { CsvRecord } from '../domain/model/CsvRecord.js';
import type { ParseOptions } from '../domain/model/ParseOptions.js';
import type { Header } from '../domain/model/Header.js';
import { createHeader } from '../domain/model/Header.js';
import { DecodeError } from '../domain/errors/ConversionError.js';
import { CsvTokenizer } from '../domain/services/CsvTokenizer.js';
import { Utf8ChunkDecoder } from '../domain/services/Utf8ChunkDecoder.js';
import type { TokenizedRow } from '../domain/services/CsvTokenizer.js';
import { shapeRecord } from '../domain/services/RecordShaper.js';

/** Details of a row whose extra values were dropped. */
export interface RowTruncation {
  readonly line: number;
  readonly expected: number;
  readonly received: number;
}

export interface CsvRecordDecoderHooks {
  /** Called for every row that lost values under the `'drop'` policy. */
  readonly onRowTruncated?: (truncation: RowTruncation) => void;
}

type DecoderState = 'OPEN' | 'DONE' | 'FAILED' | 'CLOSED';

/**
 * Pull-based CSV decoder: raw byte chunks in, one record per `next()` out.
 *
 * Each `next()` reads only as many chunks as it takes to complete the next
 * data row. The first row becomes the header and is never yielded. The first
 * error ends the sequence; afterwards `next()` only reports `done`.
 *
 * Upstream read errors are rethrown unchanged. Invalid UTF-8 fails with
 * `DecodeError('ENCODING')` once every row completed before the offending byte
 * has been yielded. An unterminated quote or a rejected wide row fails with
 * `DecodeError('MALFORMED')`. On any failure the source iterator is closed.
 */
export class CsvRecordDecoder implements AsyncIterableIterator<CsvRecord> {
  private readonly utf8 = new Utf8ChunkDecoder();
  private readonly tokenizer: CsvTokenizer;
  private iterator: AsyncIterator<ByteChunk> | null = null;
  private header: Header | null = null;
  private state: DecoderState = 'OPEN';
  private inputEnded = false;
  private tokenizerEnded = false;
  /** Encoding error found in the last chunk, raised once the rows before it are out. */
  private pendingError: DecodeError | null = null;

  constructor(
    private readonly source: ByteSource,
    private readonly options: ParseOptions,
    private readonly hooks: CsvRecordDecoderHooks = {},
  ) {
    this.tokenizer = new CsvTokenizer(options.delimiter, options.quote);
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  async next(): Promise<IteratorResult<CsvRecord>> {
    if (this.state !== 'OPEN') return { done: true, value: undefined };

    try {
      const record = await this.pullRecord();
      if (record) return { done: false, value: record };
      this.state = 'DONE';
      return { done: true, value: undefined };
    } catch (error) {
      this.state = 'FAILED';
      this.release();
      await this.closeSource();
      throw error;
    }
  }

  /** Stop decoding. Buffered partial rows are dropped and the source iterator is closed. */
  async return(): Promise<IteratorResult<CsvRecord>> {
    const wasOpen = this.state === 'OPEN';
    this.state = 'CLOSED';
    this.release();
    if (wasOpen && this.iterator?.return) {
      await this.iterator.return();
    }
    return { done: true, value: undefined };
  }

  private async pullRecord(): Promise<CsvRecord | undefined> {
    for (;;) {
      const row = await this.pullRow();
      if (!row) return undefined;

      if (!this.header) {
        this.header = createHeader(row.values);
        continue;
      }

      const outcome = shapeRecord(this.header, row.values, this.options.extraFields);
      if (outcome.kind === 'rejected') {
        throw new DecodeError(
          'MALFORMED',
          `row on line ${String(row.line)} has ${String(row.values.length)} fields but the header has ${String(this.header.names.length)}`,
          { line: row.line },
        );
      }
      if (outcome.dropped > 0) {
        this.hooks.onRowTruncated?.({
          line: row.line,
          expected: this.header.names.length,
          received: row.values.length,
        });
      }
      return outcome.record;
    }
  }

  private async pullRow(): Promise<TokenizedRow | undefined> {
    for (;;) {
      const row = this.tokenizer.nextRow();
      if (row) return row;
      if (this.pendingError) throw this.pendingError;

      if (this.inputEnded) {
        if (this.tokenizerEnded) return undefined;
        this.tokenizerEnded = true;
        return this.tokenizer.end();
      }

      this.iterator ??= this.source[Symbol.asyncIterator]();
      const chunk = await this.iterator.next();
      if (chunk.done) {
        this.inputEnded = true;
        this.tokenizer.write(this.utf8.end());
      } else {
        const decoded = this.utf8.write(toBytes(chunk.value));
        this.tokenizer.write(decoded.text);
        this.pendingError = decoded.error ?? null;
      }
    }
  }

  /** Close the source after a failure. A source that fails to close only produces a warning; the original error wins. */
  private async closeSource(): Promise<void> {
    try {
      await this.iterator?.return?.();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      process.emitWarning(`closing the CSV source failed: ${reason}`, { code: 'CSVJSON_SOURCE_CLOSE' });
    }
  }

  private release(): void {
    this.header = null;
    this.tokenizer.reset();
  }
}

function toBytes(chunk: ByteChunk): Uint8Array {
  return typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
}
