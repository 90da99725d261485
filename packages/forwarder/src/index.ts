export {
  BufferAllocatorSchema,
  DEFAULT_OUTBOUND_CLIENT_OPTIONS,
  HeaderListSchema,
  OutboundClientOptionsSchema,
  OutboundMethodSchema,
  type BufferAllocator,
  type FetchLike,
  type HeaderList,
  type OutboundClientOptions,
  type OutboundClientOptionsInput,
  type OutboundFetchOptions,
  type OutboundMethod,
  type OutboundResponse
} from './contracts';
export {
  err,
  ForwarderStreamError,
  forwarderErrorCodes,
  isForwarderStreamError,
  ok,
  type ForwarderError,
  type ForwarderErrorCode,
  type ForwarderFailure,
  type ForwarderResult,
  type ForwarderSuccess
} from './errors';
export {createChunkAllocator, createChunkedBody, splitChunk, type ChunkAllocator, type ChunkedBody} from './chunking';
export {createOutboundClient, type OutboundClient} from './client';
export {
  buildOutboundHeaders,
  collectResponseHeaders,
  HOP_BY_HOP_HEADER_NAMES,
  normalizeHeaderName,
  stripHopByHopHeaders,
  validateHeaderValue
} from './headers';
export {createSlotPool, type SlotLease, type SlotPool, type SlotPoolStats} from './slotPool';

export const packageName = 'forwarder';
