import { describe, it, expect, vi } from 'vitest';
import { CsvRecordDecoder } from '../../../src/application/CsvRecordDecoder.js';
import { BufferSource } from '../../../src/infrastructure/sources/BufferSource.js';
import { resolveParseOptions } from '../../../src/domain/model/ParseOptions.js';
import type { ParseOptionsInput } from '../../../src/domain/model/ParseOptions.js';
import { DecodeError } from '../../../src/domain/errors/ConversionError.js';
import type { ByteChunk, ByteSource } from '../../../src/domain/ports/ByteSource.js';

async function decodeAll(source: ByteSource, input?: ParseOptionsInput): Promise<[string, string][][]> {
  const records: [string, string][][] = [];
  for await (const record of new CsvRecordDecoder(source, resolveParseOptions(input))) {
    records.push(Array.from(record));
  }
  return records;
}

async function decodeError(source: ByteSource, input?: ParseOptionsInput): Promise<unknown> {
  try {
    await decodeAll(source, input);
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('CsvRecordDecoder', () => {
  describe('records', () => {
    it('should use the first row as header and yield the rest as records', async () => {
      expect(await decodeAll(new BufferSource('a,b\n1,2\n3,4\n'))).toEqual([
        [
          ['a', '1'],
          ['b', '2'],
        ],
        [
          ['a', '3'],
          ['b', '4'],
        ],
      ]);
    });

    it('should yield nothing for empty input or a header alone', async () => {
      expect(await decodeAll(new BufferSource(''))).toEqual([]);
      expect(await decodeAll(new BufferSource('a,b,c'))).toEqual([]);
      expect(await decodeAll(new BufferSource('a,b,c\n'))).toEqual([]);
    });

    it('should accept string chunks', async () => {
      async function* chunks(): AsyncGenerator<ByteChunk> {
        yield 'a,b\n1,';
        yield await Promise.resolve('2\n');
      }
      expect(await decodeAll(chunks())).toEqual([
        [
          ['a', '1'],
          ['b', '2'],
        ],
      ]);
    });

    it('should omit missing trailing keys for short rows', async () => {
      expect(await decodeAll(new BufferSource('a,b,c\n1\n'))).toEqual([[['a', '1']]]);
    });
  });

  describe('UTF-8 handling', () => {
    it('should decode multi-byte characters split across chunks', async () => {
      const source = new BufferSource('name,city\nJosé,Zürich 🚲\n', { chunkSize: 1 });
      expect(await decodeAll(source)).toEqual([
        [
          ['name', 'José'],
          ['city', 'Zürich 🚲'],
        ],
      ]);
    });

    it('should strip a leading byte-order mark', async () => {
      const source = new BufferSource(Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('a\n1')]));
      expect(await decodeAll(source)).toEqual([[['a', '1']]]);
    });

    it('should fail with ENCODING on an invalid byte', async () => {
      const error = await decodeError(new BufferSource(Buffer.from([0x61, 0x0a, 0xff, 0x0a]), { chunkSize: 2 }));
      expect(error).toBeInstanceOf(DecodeError);
      expect(error).toMatchObject({
        code: 'ENCODING',
        position: { byteOffset: 2 },
        message: 'input is not valid UTF-8 at byte offset 2',
      });
    });

    it('should yield the records before an invalid byte in the same chunk', async () => {
      const decoder = new CsvRecordDecoder(
        new BufferSource(Buffer.concat([Buffer.from('a,b\n1,2\n3,4\n'), Buffer.from([0xff])])),
        resolveParseOptions(),
      );

      const first = await decoder.next();
      const second = await decoder.next();
      expect(first.value ? Array.from(first.value) : []).toEqual([
        ['a', '1'],
        ['b', '2'],
      ]);
      expect(second.value ? Array.from(second.value) : []).toEqual([
        ['a', '3'],
        ['b', '4'],
      ]);
      await expect(decoder.next()).rejects.toMatchObject({ code: 'ENCODING', position: { byteOffset: 12 } });
    });

    it('should point at the byte that breaks a sequence started in an earlier chunk', async () => {
      const error = await decodeError(new BufferSource(Buffer.from([0x61, 0x0a, 0xc3, 0x41]), { chunkSize: 1 }));
      expect(error).toMatchObject({ code: 'ENCODING', position: { byteOffset: 3 } });
    });

    it('should strip a byte-order mark split across chunks', async () => {
      const source = new BufferSource(Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('a\n1')]), {
        chunkSize: 1,
      });
      expect(await decodeAll(source)).toEqual([[['a', '1']]]);
    });

    it('should fail with ENCODING when input ends inside a multi-byte sequence', async () => {
      const error = await decodeError(new BufferSource(Buffer.from([0x61, 0x0a, 0x62, 0xc3])));
      expect(error).toMatchObject({
        code: 'ENCODING',
        position: { byteOffset: 3 },
        message: 'input is not valid UTF-8 at byte offset 3',
      });
    });
  });

  describe('failures', () => {
    it('should fail with MALFORMED on an unterminated quote', async () => {
      const error = await decodeError(new BufferSource('a\n"x'));
      expect(error).toMatchObject({ code: 'MALFORMED', position: { line: 2 } });
    });

    it('should reject wide rows when the policy says so', async () => {
      const error = await decodeError(new BufferSource('a,b\n1,2\n1,2,3\n'), { extraFields: 'reject' });
      expect(error).toMatchObject({
        code: 'MALFORMED',
        position: { line: 3 },
        message: 'row on line 3 has 3 fields but the header has 2',
      });
    });

    it('should pass upstream errors through unchanged', async () => {
      const upstream = new Error('connection reset');
      async function* chunks(): AsyncGenerator<ByteChunk> {
        yield 'a,b\n1,2\n';
        throw upstream;
      }
      const decoder = new CsvRecordDecoder(chunks(), resolveParseOptions());

      const first = await decoder.next();
      expect(first.done).toBe(false);
      await expect(decoder.next()).rejects.toBe(upstream);
    });

    it('should close the source when decoding fails', async () => {
      let closed = false;
      async function* chunks(): AsyncGenerator<ByteChunk> {
        try {
          yield 'a,b\n1,2\n';
          yield Buffer.from([0xff]);
          yield '3,4\n';
        } finally {
          closed = true;
        }
      }
      const decoder = new CsvRecordDecoder(chunks(), resolveParseOptions());

      expect((await decoder.next()).done).toBe(false);
      await expect(decoder.next()).rejects.toMatchObject({ code: 'ENCODING', position: { byteOffset: 8 } });
      expect(closed).toBe(true);
    });

    it('should report a source that fails to close as a warning and keep the original error', async () => {
      const warn = vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
      const source: ByteSource = {
        [Symbol.asyncIterator]: () => ({
          next: () => Promise.resolve({ done: false as const, value: Buffer.from([0x61, 0x0a, 0xff]) }),
          return: () => Promise.reject(new Error('already gone')),
        }),
      };
      const decoder = new CsvRecordDecoder(source, resolveParseOptions());

      await expect(decoder.next()).rejects.toMatchObject({ code: 'ENCODING', position: { byteOffset: 2 } });
      expect(warn).toHaveBeenCalledWith('closing the CSV source failed: already gone', {
        code: 'CSVJSON_SOURCE_CLOSE',
      });
      warn.mockRestore();
    });

    it('should report done after an error', async () => {
      const decoder = new CsvRecordDecoder(new BufferSource('a\n"x'), resolveParseOptions());
      await expect(decoder.next()).rejects.toBeInstanceOf(DecodeError);
      expect(await decoder.next()).toEqual({ done: true, value: undefined });
    });
  });

  describe('wide rows', () => {
    it('should report dropped values through the hook', async () => {
      const onRowTruncated = vi.fn();
      const decoder = new CsvRecordDecoder(new BufferSource('a,b\n1,2,3\n'), resolveParseOptions(), {
        onRowTruncated,
      });

      const result = await decoder.next();
      expect(result.done).toBe(false);
      expect(result.value ? Array.from(result.value) : []).toEqual([
        ['a', '1'],
        ['b', '2'],
      ]);
      expect(onRowTruncated).toHaveBeenCalledOnce();
      expect(onRowTruncated).toHaveBeenCalledWith({ line: 2, expected: 2, received: 3 });
    });

    it('should keep extra values under the "index" policy', async () => {
      expect(await decodeAll(new BufferSource('a,b\n1,2,3\n'), { extraFields: 'index' })).toEqual([
        [
          ['a', '1'],
          ['b', '2'],
          ['2', '3'],
        ],
      ]);
    });
  });

  describe('streaming', () => {
    it('should read only the chunks needed for the next record', async () => {
      let pulled = 0;
      async function* chunks(): AsyncGenerator<ByteChunk> {
        for (const chunk of ['h\n', '1\n', '2\n', '3\n']) {
          pulled++;
          yield await Promise.resolve(chunk);
        }
      }
      const decoder = new CsvRecordDecoder(chunks(), resolveParseOptions());

      await decoder.next();
      expect(pulled).toBe(2);
      await decoder.next();
      expect(pulled).toBe(3);
    });

    it('should close the source when stopped early', async () => {
      let closed = false;
      async function* chunks(): AsyncGenerator<ByteChunk> {
        try {
          yield 'h\n1\n';
          yield '2\n';
        } finally {
          closed = true;
        }
      }
      const decoder = new CsvRecordDecoder(chunks(), resolveParseOptions());

      await decoder.next();
      expect(await decoder.return()).toEqual({ done: true, value: undefined });
      expect(closed).toBe(true);
      expect(await decoder.next()).toEqual({ done: true, value: undefined });
    });
  });
});
