import type {BufferAllocator} from './contracts';
import {ForwarderStreamError, type ForwarderErrorCode} from './errors';

export type ChunkAllocator = (size: number) => Buffer;

export const createChunkAllocator = (policy: BufferAllocator): ChunkAllocator =>
  policy === 'pooled' ? size => Buffer.allocUnsafe(size) : size => Buffer.allocUnsafeSlow(size);

/**
 * Copies `chunk` into buffers of at most `maxChunkSize` bytes. A chunk that
 * already fits is still copied so callers never hold upstream memory.
 */
export function* splitChunk({
  chunk,
  maxChunkSize,
  allocate
}: {
  chunk: Uint8Array;
  maxChunkSize: number;
  allocate: ChunkAllocator;
}): Generator<Buffer> {
  for (let offset = 0; offset < chunk.byteLength; offset += maxChunkSize) {
    const end = Math.min(offset + maxChunkSize, chunk.byteLength);
    const piece = allocate(end - offset);
    piece.set(chunk.subarray(offset, end));
    yield piece;
  }
}

type ChunkSource = {
  getReader: () => {
    read: () => Promise<{done: true; value?: Uint8Array} | {done: false; value: Uint8Array}>;
    cancel: (reason?: unknown) => Promise<void>;
  };
  cancel: (reason?: unknown) => Promise<void>;
};

const TIMEOUT_ERROR_NAMES = new Set(['BodyTimeoutError', 'TimeoutError']);

const readCause = (value: unknown) =>
  typeof value === 'object' && value !== null && 'cause' in value ? value.cause : undefined;

const isTimeoutError = (value: unknown) =>
  (value instanceof Error && TIMEOUT_ERROR_NAMES.has(value.name)) ||
  (typeof value === 'object' && value !== null && 'code' in value && value.code === 'UND_ERR_BODY_TIMEOUT');

const toStreamFailureCode = ({error, signal}: {error: unknown; signal?: AbortSignal}): ForwarderErrorCode => {
  if (signal?.aborted) {
    return 'aborted';
  }

  // undici's fetch surfaces body failures as TypeError('terminated') with the socket error as cause.
  if (isTimeoutError(error) || isTimeoutError(readCause(error))) {
    return 'upstream_timeout';
  }

  return 'upstream_network_error';
};

export type ChunkedBody = {
  body: AsyncIterable<Buffer>;
  cancel: () => Promise<void>;
};

/**
 * Wraps an upstream body stream as bounded chunks. `onSettled` runs exactly
 * once: when the stream ends, fails, or is cancelled by the consumer.
 */
export const createChunkedBody = ({
  source,
  maxChunkSize,
  maxResponseBytes,
  allocate,
  signal,
  onSettled
}: {
  source: ChunkSource | null;
  maxChunkSize: number;
  maxResponseBytes?: number;
  allocate: ChunkAllocator;
  signal?: AbortSignal;
  onSettled: () => void;
}): ChunkedBody => {
  let settled = false;
  let started = false;

  const settle = () => {
    if (settled) {
      return;
    }

    settled = true;
    onSettled();
  };

  if (!source) {
    settle();
  }

  async function* iterate(): AsyncGenerator<Buffer> {
    started = true;
    if (!source) {
      return;
    }

    const reader = source.getReader();
    let totalBytes = 0;
    let readerOpen = true;

    try {
      while (true) {
        let readResult: Awaited<ReturnType<typeof reader.read>>;
        try {
          readResult = await reader.read();
        } catch (error) {
          readerOpen = false;
          throw new ForwarderStreamError(
            toStreamFailureCode({error, signal}),
            'Failed while reading upstream response body',
            {cause: error}
          );
        }

        if (readResult.done) {
          readerOpen = false;
          return;
        }

        totalBytes += readResult.value.byteLength;
        if (maxResponseBytes !== undefined && totalBytes > maxResponseBytes) {
          throw new ForwarderStreamError(
            'upstream_response_too_large',
            `Upstream response exceeds max_response_bytes=${maxResponseBytes}`
          );
        }

        yield* splitChunk({chunk: readResult.value, maxChunkSize, allocate});
      }
    } finally {
      settle();
      if (readerOpen) {
        await reader.cancel();
      }
    }
  }

  const generator = iterate();

  // Closing a generator that never started skips its body, so release here.
  const releaseUnstarted = async () => {
    if (started) {
      return;
    }

    settle();
    if (source) {
      await source.cancel();
    }
  };

  const body: AsyncIterableIterator<Buffer> = {
    next: () => generator.next(),
    return: async value => {
      await releaseUnstarted();
      return generator.return(value);
    },
    throw: async error => {
      await releaseUnstarted();
      return generator.throw(error);
    },
    [Symbol.asyncIterator]: () => body
  };

  const cancel = async () => {
    await body.return?.(undefined);
  };

  return {body, cancel};
};
