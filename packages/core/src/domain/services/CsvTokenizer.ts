import { DecodeError } from '../errors/ConversionError.js';

/** A completed physical row: raw field values plus the line it started on. */
export interface TokenizedRow {
  readonly values: readonly string[];
  /** 1-based line number of the row's first character. */
  readonly line: number;
}

type TokenizerState =
  /** At the start of a field: after a delimiter, or at the start of a row. */
  | 'FIELD_START'
  | 'UNQUOTED'
  | 'QUOTED'
  /** Saw the quote character inside a quoted field: either an escape or the closing quote. */
  | 'QUOTE_IN_QUOTED'
  /** Saw `\r` outside quotes and need the next character to know whether it ends the row. */
  | 'PENDING_CR';

/**
 * Incremental CSV tokenizer.
 *
 * Text is fed with `write()` and rows are pulled one at a time with `nextRow()`,
 * so the caller decides how far parsing runs ahead. Only the current field, the
 * current row and the unconsumed part of the last written text are buffered.
 *
 * @example
 * ```typescript
 * const tokenizer = new CsvTokenizer(',', '"');
 * tokenizer.write('a,"b\nc"\n1,2');
 * tokenizer.nextRow(); // { values: ['a', 'b\nc'], line: 1 }
 * tokenizer.nextRow(); // undefined: '1,2' may continue in the next chunk
 * tokenizer.end();     // { values: ['1', '2'], line: 3 }
 * ```
 */
export class CsvTokenizer {
  private state: TokenizerState = 'FIELD_START';
  private field = '';
  private row: string[] = [];
  private rowHasContent = false;
  private line = 1;
  private rowStartLine = 1;

  private text = '';
  private pos = 0;

  constructor(
    private readonly delimiter: string,
    private readonly quote: string,
  ) {}

  /** Whether the text passed to the last `write()` has been fully consumed. */
  get drained(): boolean {
    return this.pos >= this.text.length;
  }

  /** Feed the next piece of text. The previous piece must be drained first. */
  write(text: string): void {
    if (!this.drained) {
      throw new Error('CsvTokenizer: write() called before the previous text was drained by nextRow().');
    }
    this.text = text;
    this.pos = 0;
  }

  /** Advance until a row is complete. Returns `undefined` when more input is needed. */
  nextRow(): TokenizedRow | undefined {
    while (this.pos < this.text.length) {
      const ch = this.text.charAt(this.pos);

      if (this.state === 'PENDING_CR') {
        if (ch === '\n') {
          this.pos++;
          const row = this.endRow();
          if (row) return row;
          continue;
        }
        // Lone `\r`: literal content. Re-read `ch` as part of the same field.
        this.field += '\r';
        this.rowHasContent = true;
        this.state = 'UNQUOTED';
        continue;
      }

      this.pos++;

      switch (this.state) {
        case 'FIELD_START':
          if (ch === this.quote) {
            this.state = 'QUOTED';
            this.rowHasContent = true;
          } else if (ch === this.delimiter) {
            this.endField();
          } else if (ch === '\n') {
            const row = this.endRow();
            if (row) return row;
          } else if (ch === '\r') {
            this.state = 'PENDING_CR';
          } else {
            this.appendPlainRun();
            this.rowHasContent = true;
            this.state = 'UNQUOTED';
          }
          break;

        case 'UNQUOTED':
          if (ch === this.delimiter) {
            this.endField();
          } else if (ch === '\n') {
            const row = this.endRow();
            if (row) return row;
          } else if (ch === '\r') {
            this.state = 'PENDING_CR';
          } else {
            this.appendPlainRun();
          }
          break;

        case 'QUOTED':
          if (ch === this.quote) {
            this.state = 'QUOTE_IN_QUOTED';
          } else {
            this.appendQuotedRun();
          }
          break;

        case 'QUOTE_IN_QUOTED':
          if (ch === this.quote) {
            this.field += ch;
            this.state = 'QUOTED';
          } else if (ch === this.delimiter) {
            this.endField();
          } else if (ch === '\n') {
            const row = this.endRow();
            if (row) return row;
          } else if (ch === '\r') {
            this.state = 'PENDING_CR';
          } else {
            // Text after a closing quote is kept as-is: `"ab"c` reads as `abc`.
            this.appendPlainRun();
            this.state = 'UNQUOTED';
          }
          break;
      }
    }

    return undefined;
  }

  /**
   * Signal end of input and flush the last row, if any.
   *
   * @throws {DecodeError} `MALFORMED` when the input ends inside a quoted field.
   */
  end(): TokenizedRow | undefined {
    if (!this.drained) {
      throw new Error('CsvTokenizer: end() called before the previous text was drained by nextRow().');
    }
    if (this.state === 'QUOTED') {
      throw new DecodeError(
        'MALFORMED',
        `unterminated quoted field in row starting on line ${String(this.rowStartLine)}`,
        { line: this.rowStartLine },
      );
    }
    return this.endRow();
  }

  /** Drop every buffered field, row and unread text. */
  reset(): void {
    this.state = 'FIELD_START';
    this.field = '';
    this.row = [];
    this.rowHasContent = false;
    this.text = '';
    this.pos = 0;
  }

  /**
   * Append the character just read plus every following one up to the next
   * delimiter or line break. Quotes are literal here.
   */
  private appendPlainRun(): void {
    const start = this.pos - 1;
    let end = this.pos;
    while (end < this.text.length) {
      const ch = this.text.charAt(end);
      if (ch === this.delimiter || ch === '\n' || ch === '\r') break;
      end++;
    }
    this.field += this.text.slice(start, end);
    this.pos = end;
  }

  /** Append the character just read plus every following one up to the next quote, counting line breaks. */
  private appendQuotedRun(): void {
    const start = this.pos - 1;
    const close = this.text.indexOf(this.quote, this.pos);
    const end = close === -1 ? this.text.length : close;
    for (let i = this.text.indexOf('\n', start); i !== -1 && i < end; i = this.text.indexOf('\n', i + 1)) {
      this.line++;
    }
    this.field += this.text.slice(start, end);
    this.pos = end;
  }

  private endField(): void {
    this.row.push(this.field);
    this.field = '';
    this.rowHasContent = true;
    this.state = 'FIELD_START';
  }

  /** Close the current row. Blank lines produce no row. */
  private endRow(): TokenizedRow | undefined {
    const line = this.rowStartLine;
    let completed: TokenizedRow | undefined;

    if (this.rowHasContent) {
      this.row.push(this.field);
      completed = { values: this.row, line };
    }

    this.row = [];
    this.field = '';
    this.rowHasContent = false;
    this.state = 'FIELD_START';
    this.line++;
    this.rowStartLine = this.line;

    return completed;
  }
}
