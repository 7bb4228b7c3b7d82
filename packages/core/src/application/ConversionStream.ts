import type { EventBus } from './EventBus.js';
import type { JsonArrayEncoder } from './JsonArrayEncoder.js';
import type { ParseOptions } from '../domain/model/ParseOptions.js';
import type { CsvRecord } from '../domain/model/CsvRecord.js';
import { isConversionError } from '../domain/errors/ConversionError.js';

/** Counters for one conversion, readable at any time. */
export interface ConversionProgress {
  readonly recordCount: number;
  readonly byteCount: number;
  readonly chunkCount: number;
}

/**
 * The JSON output of one conversion, as a pull-based stream of UTF-8 chunks.
 *
 * Wraps the encoder to keep counters and publish lifecycle events. Those events
 * are the terminal signal for logging: `conversion:completed` after a clean end,
 * `conversion:failed` (with `midStream`) when `next()` rejects, and
 * `conversion:cancelled` when the consumer calls `return()` first.
 */
export class ConversionStream implements AsyncIterableIterator<Uint8Array> {
  private byteCount = 0;
  private chunkCount = 0;
  private startedAt: number | null = null;
  private settled = false;

  constructor(
    readonly conversionId: string,
    private readonly options: ParseOptions,
    private readonly encoder: JsonArrayEncoder<CsvRecord>,
    private readonly eventBus: EventBus,
  ) {}

  /** Whether at least one chunk has been handed out. After that, a failure can only truncate the output. */
  get committed(): boolean {
    return this.chunkCount > 0;
  }

  get progress(): ConversionProgress {
    return {
      recordCount: this.encoder.elementCount,
      byteCount: this.byteCount,
      chunkCount: this.chunkCount,
    };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  async next(): Promise<IteratorResult<Uint8Array>> {
    if (this.startedAt === null) {
      this.startedAt = Date.now();
      this.eventBus.emit({
        type: 'conversion:started',
        conversionId: this.conversionId,
        options: this.options,
        timestamp: this.startedAt,
      });
    }

    let result: IteratorResult<Uint8Array>;
    try {
      result = await this.encoder.next();
    } catch (error) {
      this.fail(error);
      throw error;
    }

    if (result.done) {
      this.complete();
    } else {
      this.chunkCount++;
      this.byteCount += result.value.byteLength;
    }
    return result;
  }

  async return(): Promise<IteratorResult<Uint8Array>> {
    if (!this.settled) {
      this.settled = true;
      this.eventBus.emit({
        type: 'conversion:cancelled',
        conversionId: this.conversionId,
        recordCount: this.encoder.elementCount,
        byteCount: this.byteCount,
        timestamp: Date.now(),
      });
    }
    return this.encoder.return();
  }

  private complete(): void {
    if (this.settled) return;
    this.settled = true;
    const now = Date.now();
    this.eventBus.emit({
      type: 'conversion:completed',
      conversionId: this.conversionId,
      recordCount: this.encoder.elementCount,
      byteCount: this.byteCount,
      durationMs: now - (this.startedAt ?? now),
      timestamp: now,
    });
  }

  private fail(error: unknown): void {
    if (this.settled) return;
    this.settled = true;
    this.eventBus.emit({
      type: 'conversion:failed',
      conversionId: this.conversionId,
      error: error instanceof Error ? error.message : String(error),
      code: isConversionError(error) ? error.code : 'UPSTREAM',
      recordCount: this.encoder.elementCount,
      byteCount: this.byteCount,
      midStream: this.committed,
      timestamp: Date.now(),
    });
  }
}
