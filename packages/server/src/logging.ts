import type { CsvToJson, DomainEvent } from '@csvjson/core';

/** Minimal logging surface; `console` satisfies it. */
export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const PREFIX = '[csvjson]';

function line(message: string): string {
  return `${PREFIX} ${new Date().toISOString()} ${message}`;
}

/** Prefix every message with the service tag and an ISO timestamp. */
export function createConsoleLogger(output: Logger = console): Logger {
  return {
    log: (message) => {
      output.log(line(message));
    },
    warn: (message) => {
      output.warn(line(message));
    },
    error: (message) => {
      output.error(line(message));
    },
  };
}

/** Render a conversion event as one log line. */
export function describeEvent(event: DomainEvent): string {
  const id = event.conversionId;
  switch (event.type) {
    case 'conversion:started':
      return `conversion ${id} started (delimiter=${JSON.stringify(event.options.delimiter)}, quote=${JSON.stringify(event.options.quote)}, extra-fields=${event.options.extraFields})`;
    case 'row:truncated':
      return `conversion ${id}: row on line ${String(event.line)} has ${String(event.received)} fields, dropped ${String(event.received - event.expected)} beyond the header`;
    case 'conversion:completed':
      return `conversion ${id} completed: ${String(event.recordCount)} records, ${String(event.byteCount)} bytes in ${String(event.durationMs)}ms`;
    case 'conversion:failed':
      return `error during CSV conversion ${id} [${event.code}] after ${String(event.recordCount)} records${event.midStream ? ' (response truncated)' : ''}: ${event.error}`;
    case 'conversion:cancelled':
      return `conversion ${id} cancelled by the client after ${String(event.recordCount)} records, ${String(event.byteCount)} bytes`;
  }
}

/** Route every conversion event of `converter` to `logger` at the matching level. */
export function attachLogger(converter: CsvToJson, logger: Logger): void {
  converter.onAny((event) => {
    const message = describeEvent(event);
    if (event.type === 'conversion:failed') {
      logger.error(message);
    } else if (event.type === 'row:truncated') {
      logger.warn(message);
    } else {
      logger.log(message);
    }
  });
}
