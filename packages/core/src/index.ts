// Main entry point
export { CsvToJson } from './CsvToJson.js';
export type { CsvToJsonConfig } from './CsvToJson.js';

// Domain model
export type { ParseOptions, ParseOptionsInput, ExtraFieldsPolicy } from './domain/model/ParseOptions.js';
export {
  DEFAULT_DELIMITER,
  DEFAULT_QUOTE,
  EXTRA_FIELDS_POLICIES,
  resolveParseOptions,
} from './domain/model/ParseOptions.js';
export type { CsvRecord } from './domain/model/CsvRecord.js';
export { serializeRecord } from './domain/model/CsvRecord.js';

// Errors
export type { ConversionErrorCode } from './domain/errors/ConversionError.js';
export {
  ConversionError,
  OptionsError,
  DecodeError,
  EncodeError,
  isConversionError,
} from './domain/errors/ConversionError.js';

// Domain services (for building custom pipelines)
export { CsvTokenizer } from './domain/services/CsvTokenizer.js';
export type { TokenizedRow } from './domain/services/CsvTokenizer.js';

// Pipeline stages
export { CsvRecordDecoder } from './application/CsvRecordDecoder.js';
export type { CsvRecordDecoderHooks, RowTruncation } from './application/CsvRecordDecoder.js';
export { JsonArrayEncoder } from './application/JsonArrayEncoder.js';
export { ConversionStream } from './application/ConversionStream.js';
export type { ConversionProgress } from './application/ConversionStream.js';
export { EventBus } from './application/EventBus.js';

// Ports
export type { ByteSource, ByteChunk } from './domain/ports/ByteSource.js';
export type { ValueSerializer } from './domain/ports/ValueSerializer.js';
export { jsonSerializer } from './domain/ports/ValueSerializer.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ConversionStartedEvent,
  RowTruncatedEvent,
  ConversionCompletedEvent,
  ConversionFailedEvent,
  ConversionCancelledEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in sources)
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export type { BufferSourceOptions } from './infrastructure/sources/BufferSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
