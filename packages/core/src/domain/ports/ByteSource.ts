/** One piece of raw input as it arrives from the transport. Strings are UTF-8 encoded before decoding. */
export type ByteChunk = Uint8Array | string;

/**
 * Port for the raw input document.
 *
 * Anything that can be iterated asynchronously works: a Node `Readable`
 * (an `IncomingMessage`, a busboy file stream), an async generator, or the
 * `StreamSource` adapter around a WHATWG `ReadableStream`. Read failures
 * surface as rejections and are passed through the pipeline unchanged.
 */
export type ByteSource = AsyncIterable<ByteChunk>;
