import { Buffer } from "node:buffer";

/** Default upper bound applied to request bodies (1 MiB). */
export const DEFAULT_MAX_BODY_BYTES = 1 << 20;

/** Raw payload returned by {@link readRawBody}. */
export interface RawBody {
  /** Bytes received over the wire. */
  readonly raw: Buffer;
  /** Number of bytes read from the underlying stream. */
  readonly bytes: number;
}

/** Raised when a body exceeds the configured limit. */
export class PayloadTooLargeError extends Error {
  readonly status = 413;
  readonly limit: number;

  constructor(limit: number) {
    super(`payload exceeds ${limit} bytes`);
    this.name = "PayloadTooLargeError";
    this.limit = limit;
  }
}

/**
 * Reads a whole byte stream (an `IncomingMessage`, any readable) while
 * enforcing an upper bound on the number of bytes accepted. Stream failures
 * propagate as rejections.
 */
export async function readRawBody(
  stream: AsyncIterable<Uint8Array | string>,
  maxBytes = DEFAULT_MAX_BODY_BYTES,
): Promise<RawBody> {
  const buffers: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of stream) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk);
    totalBytes += buffer.length;
    if (maxBytes > 0 && totalBytes > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }
    buffers.push(buffer);
  }

  return { raw: Buffer.concat(buffers), bytes: totalBytes };
}
