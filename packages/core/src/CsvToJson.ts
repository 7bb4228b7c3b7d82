import type { ByteSource } from './domain/ports/ByteSource.js';
import type { ParseOptions, ParseOptionsInput } from './domain/model/ParseOptions.js';
import { resolveParseOptions } from './domain/model/ParseOptions.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { EventBus } from './application/EventBus.js';
import { ConvertCsv } from './application/usecases/ConvertCsv.js';
import type { ConversionStream } from './application/ConversionStream.js';

/** Configuration shared by every conversion started from one `CsvToJson` instance. */
export interface CsvToJsonConfig {
  /** Options used when `convert()` is called without any. Validated on construction. */
  readonly defaults?: ParseOptionsInput;
}

/**
 * Facade for streaming CSV → JSON conversion: bytes → decode → encode → chunks.
 *
 * Every `convert()` call builds an independent pipeline; nothing is shared between
 * conversions except the event subscriptions.
 *
 * @example
 * ```typescript
 * const converter = new CsvToJson().on('conversion:failed', (e) => console.error(e.error));
 * const output = converter.convert(request, resolveParseOptions({ delimiter: ';' }));
 * await pipeline(Readable.from(output), response);
 * ```
 */
export class CsvToJson {
  private readonly eventBus = new EventBus();
  private readonly defaults: ParseOptions;
  private readonly convertCsv: ConvertCsv;

  /** @throws {OptionsError} when `config.defaults` is invalid. */
  constructor(config: CsvToJsonConfig = {}) {
    this.defaults = resolveParseOptions(config.defaults);
    this.convertCsv = new ConvertCsv(this.eventBus);
  }

  /** Start a conversion. Nothing is read from `source` until the first chunk is pulled. */
  convert(source: ByteSource, options?: ParseOptions): ConversionStream {
    return this.convertCsv.execute(source, options ?? this.defaults);
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to every lifecycle event. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a handler registered with `on()`. Returns `this` for chaining. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /** Unsubscribe a handler registered with `onAny()`. Returns `this` for chaining. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }
}
