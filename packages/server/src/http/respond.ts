import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { Response } from 'express';
import type { ConversionStream } from '@csvjson/core';
import { DecodeError, OptionsError } from '@csvjson/core';
import { UploadError } from './upload.js';

/** How a conversion response ended. */
export type ResponseOutcome =
  /** Failed before any byte was sent; answered with an error status and JSON body. */
  | { readonly kind: 'rejected'; readonly status: number; readonly error: unknown }
  /** Full JSON array sent. */
  | { readonly kind: 'completed' }
  /** Failed or cancelled after the status was committed; the body was cut short. */
  | { readonly kind: 'truncated'; readonly error: unknown };

/** Status for an error that is still reportable, i.e. found before the first chunk. */
export function statusFor(error: unknown): number {
  if (error instanceof OptionsError || error instanceof DecodeError || error instanceof UploadError) {
    return 400;
  }
  return 500;
}

export function sendError(res: Response, status: number, message: string): void {
  res.status(status).json({ error: message });
}

/**
 * Stream a conversion into the response.
 *
 * The first chunk is pulled before the status line is written so that failures
 * in the header or first record still get a proper error response. Once that
 * chunk is out, the rest is piped with backpressure, and a failure can only
 * destroy the response: the client sees a truncated body.
 */
export async function sendConversion(
  res: Response,
  output: ConversionStream,
): Promise<ResponseOutcome> {
  let first: IteratorResult<Uint8Array>;
  try {
    first = await output.next();
  } catch (error) {
    const status = statusFor(error);
    sendError(res, status, error instanceof Error ? error.message : String(error));
    return { kind: 'rejected', status, error };
  }

  res.status(200).type('application/json');

  try {
    await pipeline(Readable.from(resume(first, output), { objectMode: false }), res);
    return { kind: 'completed' };
  } catch (error) {
    return { kind: 'truncated', error };
  }
}

async function* resume(
  first: IteratorResult<Uint8Array>,
  rest: AsyncIterableIterator<Uint8Array>,
): AsyncGenerator<Uint8Array> {
  if (first.done) return;
  yield first.value;
  yield* rest;
}
