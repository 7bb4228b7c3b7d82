import { describe, it, expect } from 'vitest';
import { JsonArrayEncoder } from '../../../src/application/JsonArrayEncoder.js';
import { EncodeError } from '../../../src/domain/errors/ConversionError.js';

async function* from<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield await Promise.resolve(item);
  }
}

async function drain(encoder: AsyncIterable<Uint8Array>): Promise<{ chunks: string[]; error: unknown }> {
  const chunks: string[] = [];
  try {
    for await (const chunk of encoder) {
      chunks.push(Buffer.from(chunk).toString('utf8'));
    }
  } catch (error) {
    return { chunks, error };
  }
  return { chunks, error: undefined };
}

describe('JsonArrayEncoder', () => {
  describe('chunk layout', () => {
    it('should emit "[" and "]" as separate chunks for an empty input', async () => {
      expect(await drain(new JsonArrayEncoder(from([])))).toEqual({ chunks: ['[', ']'], error: undefined });
    });

    it('should emit the opening bracket with the first element and a leading comma with each later one', async () => {
      const { chunks, error } = await drain(new JsonArrayEncoder(from([1, 2, 3])));
      expect(error).toBeUndefined();
      expect(chunks).toEqual(['[1', ',2', ',3', ']']);
    });

    it('should encode any JSON-serializable value', async () => {
      const { chunks } = await drain(new JsonArrayEncoder(from<unknown>([{ a: [1, null] }, 'x', true])));
      expect(chunks.join('')).toBe('[{"a":[1,null]},"x",true]');
    });

    it('should use a custom serializer', async () => {
      const { chunks } = await drain(new JsonArrayEncoder(from(['a', 'b']), (value) => `"${value.toUpperCase()}"`));
      expect(chunks).toEqual(['["A"', ',"B"', ']']);
    });

    it('should emit UTF-8 bytes', async () => {
      const encoder = new JsonArrayEncoder(from(['é']));
      const first = await encoder.next();
      expect(first.done).toBe(false);
      expect(first.value).toEqual(Buffer.from('["é"', 'utf8'));
      expect(first.value?.byteLength).toBe(5);
    });

    it('should produce byte-identical output when run twice on the same values', async () => {
      const values = [{ id: '1' }, { id: '2' }];
      const once = await drain(new JsonArrayEncoder(from(values)));
      const twice = await drain(new JsonArrayEncoder(from(values)));
      expect(twice.chunks).toEqual(once.chunks);
    });
  });

  describe('mid-stream failures', () => {
    it('should rethrow an upstream error and never emit the closing bracket', async () => {
      const upstream = new Error('decode failed');
      async function* values(): AsyncGenerator<number> {
        yield 1;
        yield 2;
        throw upstream;
      }

      const { chunks, error } = await drain(new JsonArrayEncoder(values()));
      expect(chunks).toEqual(['[1', ',2']);
      expect(error).toBe(upstream);
      expect(() => JSON.parse(chunks.join(''))).toThrow(SyntaxError);
    });

    it('should emit nothing when the upstream fails before the first element', async () => {
      const upstream = new Error('bad header');
      async function* values(): AsyncGenerator<number> {
        yield* [];
        throw upstream;
      }

      expect(await drain(new JsonArrayEncoder(values()))).toEqual({ chunks: [], error: upstream });
    });

    it('should report done after a failure', async () => {
      async function* values(): AsyncGenerator<number> {
        yield* [];
        throw new Error('boom');
      }
      const encoder = new JsonArrayEncoder(values());

      await expect(encoder.next()).rejects.toThrow('boom');
      expect(await encoder.next()).toEqual({ done: true, value: undefined });
    });

    it('should fail with EncodeError when the serializer throws', async () => {
      const encoder = new JsonArrayEncoder(from([1, 2, 3]), (value) => {
        if (value === 2) throw new Error('unsupported');
        return String(value);
      });

      const { chunks, error } = await drain(encoder);
      expect(chunks).toEqual(['[1']);
      expect(error).toBeInstanceOf(EncodeError);
      expect(error).toMatchObject({ code: 'ENCODE', index: 1, message: 'failed to serialize element 1: unsupported' });
      expect(encoder.elementCount).toBe(1);
    });

    it('should fail with EncodeError when a value has no JSON representation', async () => {
      const { chunks, error } = await drain(new JsonArrayEncoder(from<unknown>([1, undefined])));
      expect(chunks).toEqual(['[1']);
      expect(error).toMatchObject({ code: 'ENCODE', index: 1, message: 'element 1 has no JSON representation' });
    });

    it('should close the upstream when an element cannot be serialized', async () => {
      let closed = false;
      async function* values(): AsyncGenerator<unknown> {
        try {
          yield 1;
          yield undefined;
          yield 3;
        } finally {
          closed = true;
        }
      }

      const { chunks, error } = await drain(new JsonArrayEncoder(values()));
      expect(chunks).toEqual(['[1']);
      expect(error).toBeInstanceOf(EncodeError);
      expect(closed).toBe(true);
    });

    it('should keep the serializer error as the cause', async () => {
      const { error } = await drain(new JsonArrayEncoder(from<unknown>([10n])));
      expect(error).toBeInstanceOf(EncodeError);
      expect(error).toMatchObject({ index: 0, cause: expect.any(TypeError) });
    });
  });

  describe('demand', () => {
    it('should pull one element per chunk', async () => {
      let pulled = 0;
      async function* values(): AsyncGenerator<number> {
        for (const value of [1, 2, 3]) {
          pulled++;
          yield await Promise.resolve(value);
        }
      }
      const encoder = new JsonArrayEncoder(values());

      await encoder.next();
      expect(pulled).toBe(1);
      await encoder.next();
      expect(pulled).toBe(2);
    });

    it('should close the upstream and stop without a closing bracket on return()', async () => {
      let closed = false;
      async function* values(): AsyncGenerator<number> {
        try {
          yield 1;
          yield 2;
        } finally {
          closed = true;
        }
      }
      const encoder = new JsonArrayEncoder(values());

      expect(Buffer.from((await encoder.next()).value).toString()).toBe('[1');
      expect(await encoder.return()).toEqual({ done: true, value: undefined });
      expect(closed).toBe(true);
      expect(await encoder.next()).toEqual({ done: true, value: undefined });
    });
  });
});
