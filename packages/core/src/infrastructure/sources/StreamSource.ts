import type { ByteChunk, ByteSource } from '../../domain/ports/ByteSource.js';

/** Wraps an `AsyncIterable` or a WHATWG `ReadableStream` as a single-use byte source. */
export class StreamSource implements ByteSource {
  private readonly stream: AsyncIterable<ByteChunk> | ReadableStream<ByteChunk>;
  private consumed = false;

  constructor(stream: AsyncIterable<ByteChunk> | ReadableStream<ByteChunk>) {
    this.stream = stream;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<ByteChunk> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const iterable = this.isReadableStream(this.stream) ? this.fromReadableStream(this.stream) : this.stream;

    for await (const chunk of iterable) {
      yield chunk;
    }
  }

  private isReadableStream(
    stream: AsyncIterable<ByteChunk> | ReadableStream<ByteChunk>,
  ): stream is ReadableStream<ByteChunk> {
    return 'getReader' in stream && typeof stream.getReader === 'function';
  }

  private async *fromReadableStream(stream: ReadableStream<ByteChunk>): AsyncIterable<ByteChunk> {
    const reader = stream.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        yield value;
      }
    } finally {
      reader.releaseLock();
    }
  }
}
