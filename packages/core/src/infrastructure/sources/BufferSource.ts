import type { ByteSource } from '../../domain/ports/ByteSource.js';

export interface BufferSourceOptions {
  /** Size in bytes of each chunk handed out. Default: `65536`. */
  readonly chunkSize?: number;
}

/** Byte source over an in-memory document, served in fixed-size chunks. Can be read any number of times. */
export class BufferSource implements ByteSource {
  private readonly content: Buffer;
  private readonly chunkSize: number;

  constructor(data: string | Uint8Array, options?: BufferSourceOptions) {
    this.content = typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
    this.chunkSize = options?.chunkSize ?? 65536;
    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw new Error(`BufferSource: chunkSize must be a positive integer (got ${String(options?.chunkSize)})`);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    for (let offset = 0; offset < this.content.length; offset += this.chunkSize) {
      yield await Promise.resolve(this.content.subarray(offset, offset + this.chunkSize));
    }
  }
}
