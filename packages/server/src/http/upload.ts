import type { IncomingMessage } from 'node:http';
import type { Readable } from 'node:stream';
import busboy from 'busboy';
import type { ByteChunk, ByteSource } from '@csvjson/core';

/** Name of the multipart form field that carries the CSV file. */
export const UPLOAD_FIELD = 'file';

/** The CSV payload of a request, ready to stream into a conversion. */
export interface Upload {
  readonly source: ByteSource;
  /** Client-side file name, for multipart uploads that supplied one. */
  readonly fileName?: string;
}

/** The request body could not be turned into an upload. Always a client error. */
export class UploadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UploadError';
  }
}

/**
 * Byte source over a request body or an uploaded part. When the conversion stops
 * early the stream is not destroyed: the rest is read and discarded, so the
 * connection stays able to carry the error response.
 */
export function drainingSource(stream: Readable): ByteSource {
  return {
    async *[Symbol.asyncIterator](): AsyncGenerator<ByteChunk> {
      try {
        for await (const chunk of stream.iterator({ destroyOnReturn: false })) {
          yield toByteChunk(chunk);
        }
      } finally {
        if (!stream.readableEnded) stream.resume();
      }
    },
  };
}

/** Read and discard whatever is left of a request body that will not be converted. */
export function discardBody(req: IncomingMessage): void {
  req.unpipe();
  req.resume();
}

function toByteChunk(chunk: unknown): ByteChunk {
  if (typeof chunk === 'string' || chunk instanceof Uint8Array) return chunk;
  throw new TypeError('request body stream produced a chunk that is not bytes');
}

export function isMultipart(req: IncomingMessage): boolean {
  return (req.headers['content-type'] ?? '').toLowerCase().startsWith('multipart/form-data');
}

/**
 * Resolve the CSV payload of a request.
 *
 * Multipart bodies yield the first file part named `file`, streamed as it is
 * parsed; other parts are drained and ignored. Any other body is streamed as-is.
 */
export function extractUpload(req: IncomingMessage): Promise<Upload> {
  if (!isMultipart(req)) {
    return Promise.resolve({ source: drainingSource(req) });
  }
  return extractMultipartFile(req);
}

function extractMultipartFile(req: IncomingMessage): Promise<Upload> {
  return new Promise<Upload>((resolve, reject) => {
    let settled = false;
    const settle = (outcome: () => void): void => {
      if (settled) return;
      settled = true;
      outcome();
    };

    let parser: busboy.Busboy;
    try {
      parser = busboy({ headers: req.headers });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      reject(new UploadError(`invalid multipart body: ${reason}`, { cause: error }));
      return;
    }

    parser.on('file', (name: string, file: Readable, info: busboy.FileInfo) => {
      if (settled || name !== UPLOAD_FIELD) {
        file.resume();
        return;
      }
      settle(() => {
        resolve({ source: drainingSource(file), fileName: info.filename });
      });
    });
    parser.on('close', () => {
      settle(() => {
        reject(new UploadError(`missing multipart field "${UPLOAD_FIELD}"`));
      });
    });
    parser.on('error', (error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      settle(() => {
        reject(new UploadError(`invalid multipart body: ${reason}`, { cause: error }));
      });
    });

    req.pipe(parser);
  });
}
