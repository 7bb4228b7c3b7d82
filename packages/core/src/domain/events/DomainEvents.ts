import type { ConversionErrorCode } from '../errors/ConversionError.js';
import type { ParseOptions } from '../model/ParseOptions.js';

/** Emitted when the first chunk is requested from a conversion. */
export interface ConversionStartedEvent {
  readonly type: 'conversion:started';
  readonly conversionId: string;
  readonly options: ParseOptions;
  readonly timestamp: number;
}

/** Emitted when a row wider than the header had its extra values dropped. */
export interface RowTruncatedEvent {
  readonly type: 'row:truncated';
  readonly conversionId: string;
  /** 1-based line on which the row started. */
  readonly line: number;
  /** Header width. */
  readonly expected: number;
  /** Number of values the row carried. */
  readonly received: number;
  readonly timestamp: number;
}

/** Emitted after the closing bracket has been handed out. */
export interface ConversionCompletedEvent {
  readonly type: 'conversion:completed';
  readonly conversionId: string;
  readonly recordCount: number;
  readonly byteCount: number;
  readonly durationMs: number;
  readonly timestamp: number;
}

/**
 * Emitted when the conversion ends with an error.
 *
 * When `midStream` is `true` at least one chunk was already handed out, so the
 * consumer holds a truncated JSON document and the failure can only be signalled
 * by ending the stream abruptly.
 */
export interface ConversionFailedEvent {
  readonly type: 'conversion:failed';
  readonly conversionId: string;
  readonly error: string;
  /** Core error code, or `'UPSTREAM'` for transport errors passed through unchanged. */
  readonly code: ConversionErrorCode | 'UPSTREAM';
  readonly recordCount: number;
  readonly byteCount: number;
  readonly midStream: boolean;
  readonly timestamp: number;
}

/** Emitted when the consumer stops pulling before the array was closed. */
export interface ConversionCancelledEvent {
  readonly type: 'conversion:cancelled';
  readonly conversionId: string;
  readonly recordCount: number;
  readonly byteCount: number;
  readonly timestamp: number;
}

export type DomainEvent =
  | ConversionStartedEvent
  | RowTruncatedEvent
  | ConversionCompletedEvent
  | ConversionFailedEvent
  | ConversionCancelledEvent;

export type EventType = DomainEvent['type'];

/** Extract the event payload type for a given event type string. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
