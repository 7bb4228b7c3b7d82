import { randomUUID } from 'node:crypto';
import type { ByteSource } from '../../domain/ports/ByteSource.js';
import type { ParseOptions } from '../../domain/model/ParseOptions.js';
import type { CsvRecord } from '../../domain/model/CsvRecord.js';
import { serializeRecord } from '../../domain/model/CsvRecord.js';
import type { EventBus } from '../EventBus.js';
import { CsvRecordDecoder } from '../CsvRecordDecoder.js';
import { JsonArrayEncoder } from '../JsonArrayEncoder.js';
import { ConversionStream } from '../ConversionStream.js';

/** Use case: wire a fresh decoder into a fresh encoder for one input document. */
export class ConvertCsv {
  constructor(private readonly eventBus: EventBus) {}

  execute(source: ByteSource, options: ParseOptions): ConversionStream {
    const conversionId = randomUUID();

    const decoder = new CsvRecordDecoder(source, options, {
      onRowTruncated: ({ line, expected, received }) => {
        this.eventBus.emit({
          type: 'row:truncated',
          conversionId,
          line,
          expected,
          received,
          timestamp: Date.now(),
        });
      },
    });
    const encoder = new JsonArrayEncoder<CsvRecord>(decoder, serializeRecord);

    return new ConversionStream(conversionId, options, encoder, this.eventBus);
  }
}
