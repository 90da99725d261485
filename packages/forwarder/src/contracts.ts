import type {RequestInit, Response} from 'undici';
import {z} from 'zod';

const NonEmptyStringSchema = z.string().trim().min(1);

export const BufferAllocatorSchema = z.enum(['pooled', 'unpooled']);
export type BufferAllocator = z.infer<typeof BufferAllocatorSchema>;

export const OutboundClientOptionsSchema = z
  .object({
    user_agent: NonEmptyStringSchema.default('artifact-proxy/1.0'),
    worker_count: z.number().int().min(1).max(1024).default(24),
    follow_redirects: z.boolean().default(true),
    max_redirects: z.number().int().min(0).max(20).default(5),
    max_chunk_size: z.number().int().min(1).max(16 * 1024 * 1024).default(16_384),
    max_response_bytes: z.number().int().min(1).optional(),
    connect_timeout_ms: z.number().int().min(100).max(120_000).default(10_000),
    total_timeout_ms: z.number().int().min(100).max(600_000).default(30_000),
    acquire_timeout_ms: z.number().int().min(1).max(600_000).default(30_000),
    allocator: BufferAllocatorSchema.default('pooled')
  })
  .strict();

export type OutboundClientOptionsInput = z.input<typeof OutboundClientOptionsSchema>;
export type OutboundClientOptions = z.infer<typeof OutboundClientOptionsSchema>;

export const DEFAULT_OUTBOUND_CLIENT_OPTIONS = OutboundClientOptionsSchema.parse({});

export const HeaderListSchema = z.array(
  z
    .object({
      name: NonEmptyStringSchema,
      value: z.string()
    })
    .strict()
);

export type HeaderList = z.infer<typeof HeaderListSchema>;

export const OutboundMethodSchema = z.enum(['GET', 'HEAD']);
export type OutboundMethod = z.infer<typeof OutboundMethodSchema>;

export type OutboundFetchOptions = {
  method?: OutboundMethod;
  headers?: HeaderList;
  signal?: AbortSignal;
};

export type OutboundResponse = {
  status_code: number;
  /** Final URL after any redirects were followed. */
  url: string;
  headers: Record<string, string>;
  redirect_count: number;
  /** Chunks never exceed the configured max_chunk_size. */
  body: AsyncIterable<Buffer>;
  cancel: () => Promise<void>;
};

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;
