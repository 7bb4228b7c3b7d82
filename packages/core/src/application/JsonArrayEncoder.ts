import type { ValueSerializer } from '../domain/ports/ValueSerializer.js';
import { jsonSerializer } from '../domain/ports/ValueSerializer.js';
import { EncodeError } from '../domain/errors/ConversionError.js';

type EncoderState =
  /** Nothing handed out yet. */
  | 'INITIAL'
  /** Opening bracket sent; each pull serializes one more element. */
  | 'ELEMENTS'
  /** Upstream already exhausted while producing the opening chunk; only `]` is left. */
  | 'CLOSING'
  | 'FINISHED';

const OPEN = '[';
const SEPARATOR = ',';
const CLOSE = ']';

/**
 * Pull-based JSON array encoder: one element in, one UTF-8 chunk out.
 *
 * Chunk layout:
 * - first: `[` plus the first element, or `[` alone for an empty input;
 * - then: `,` plus the next element, one chunk per element;
 * - last: `]`, only once the upstream has ended cleanly.
 *
 * If the upstream rejects, or an element cannot be serialized, `next()` rejects and
 * `]` is never produced. A serialization failure also closes the upstream. Whatever was already handed out is a truncated JSON
 * document: once bytes are on the wire the failure can only show as an early end.
 *
 * @example
 * ```typescript
 * const encoder = new JsonArrayEncoder(records, serializeRecord);
 * for await (const chunk of encoder) response.write(chunk);
 * ```
 */
export class JsonArrayEncoder<T> implements AsyncIterableIterator<Uint8Array> {
  private readonly serializer: ValueSerializer<T>;
  private iterator: AsyncIterator<T> | null = null;
  private state: EncoderState = 'INITIAL';
  private count = 0;

  constructor(
    private readonly values: AsyncIterable<T>,
    serializer?: ValueSerializer<T>,
  ) {
    this.serializer = serializer ?? jsonSerializer;
  }

  /** Number of elements serialized so far. */
  get elementCount(): number {
    return this.count;
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  async next(): Promise<IteratorResult<Uint8Array>> {
    if (this.state === 'FINISHED') return { done: true, value: undefined };

    try {
      return { done: false, value: Buffer.from(await this.produce(), 'utf8') };
    } catch (error) {
      this.state = 'FINISHED';
      // An upstream that rejected has already ended; one whose value failed to serialize is still open.
      if (error instanceof EncodeError) await this.closeUpstream();
      throw error;
    }
  }

  /** Stop encoding and close the upstream iterator. No closing bracket is produced. */
  async return(): Promise<IteratorResult<Uint8Array>> {
    const wasActive = this.state !== 'FINISHED';
    this.state = 'FINISHED';
    if (wasActive && this.iterator?.return) {
      await this.iterator.return();
    }
    return { done: true, value: undefined };
  }

  private async produce(): Promise<string> {
    switch (this.state) {
      case 'INITIAL': {
        const first = await this.upstream().next();
        if (first.done) {
          this.state = 'CLOSING';
          return OPEN;
        }
        this.state = 'ELEMENTS';
        return OPEN + this.serialize(first.value);
      }
      case 'ELEMENTS': {
        const result = await this.upstream().next();
        if (result.done) {
          this.state = 'FINISHED';
          return CLOSE;
        }
        return SEPARATOR + this.serialize(result.value);
      }
      default:
        this.state = 'FINISHED';
        return CLOSE;
    }
  }

  private async closeUpstream(): Promise<void> {
    try {
      await this.iterator?.return?.();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      process.emitWarning(`closing the encoder upstream failed: ${reason}`, { code: 'CSVJSON_SOURCE_CLOSE' });
    }
  }

  private upstream(): AsyncIterator<T> {
    this.iterator ??= this.values[Symbol.asyncIterator]();
    return this.iterator;
  }

  private serialize(value: T): string {
    const index = this.count;
    let json: string | undefined;
    try {
      json = this.serializer(value);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new EncodeError(`failed to serialize element ${String(index)}: ${reason}`, index, { cause: error });
    }
    if (typeof json !== 'string') {
      throw new EncodeError(`element ${String(index)} has no JSON representation`, index);
    }
    this.count++;
    return json;
  }
}
