import {Agent, fetch as undiciFetch, type Response} from 'undici';

import {createChunkAllocator, createChunkedBody} from './chunking';
import {
  HeaderListSchema,
  OutboundClientOptionsSchema,
  OutboundMethodSchema,
  type FetchLike,
  type OutboundClientOptions,
  type OutboundClientOptionsInput,
  type OutboundFetchOptions,
  type OutboundResponse
} from './contracts';
import {err, ok, type ForwarderFailure, type ForwarderResult} from './errors';
import {buildOutboundHeaders, collectResponseHeaders} from './headers';
import {createSlotPool, type SlotLease, type SlotPoolStats} from './slotPool';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const ALLOWED_SCHEMES = new Set(['http:', 'https:']);

const CONNECT_TIMEOUT_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'ETIMEDOUT'
]);

export type OutboundClient = {
  fetch: (url: string, options?: OutboundFetchOptions) => Promise<ForwarderResult<OutboundResponse>>;
  stats: () => SlotPoolStats;
  /** Waits for in-flight fetches to finish, then releases pooled connections. */
  close: () => Promise<void>;
  readonly options: Readonly<OutboundClientOptions>;
};

const readErrorCode = (value: unknown): string | undefined => {
  if (typeof value !== 'object' || value === null || !('code' in value)) {
    return undefined;
  }

  return typeof value.code === 'string' ? value.code : undefined;
};

const readErrorCause = (value: unknown): unknown =>
  typeof value === 'object' && value !== null && 'cause' in value ? value.cause : undefined;

const mapFetchError = ({
  unknownError,
  callerSignal,
  timedOut,
  url
}: {
  unknownError: unknown;
  callerSignal?: AbortSignal;
  timedOut: boolean;
  url: string;
}): ForwarderFailure => {
  if (callerSignal?.aborted) {
    return err('aborted', 'Outbound fetch was aborted by the caller', {url});
  }

  if (timedOut) {
    return err('upstream_timeout', 'Upstream did not answer before the deadline', {url});
  }

  const code = readErrorCode(readErrorCause(unknownError)) ?? readErrorCode(unknownError);
  if (code === 'ECONNREFUSED') {
    return err('upstream_connection_refused', 'Upstream refused the connection', {url});
  }

  if (code && CONNECT_TIMEOUT_CODES.has(code)) {
    return err('upstream_timeout', 'Upstream request timed out', {url});
  }

  if (unknownError instanceof Error) {
    return err('upstream_network_error', unknownError.message, {url});
  }

  return err('upstream_network_error', 'Upstream request failed', {url});
};

const parseTargetUrl = (raw: string): ForwarderResult<URL> => {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    return err('request_url_invalid', `Invalid request URL: ${raw}`, {url: raw});
  }

  if (!ALLOWED_SCHEMES.has(parsed.protocol)) {
    return err('request_scheme_not_allowed', `Request scheme is not allowed: ${parsed.protocol}`, {url: raw});
  }

  return ok(parsed);
};

const discardBody = async (response: Response) => {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
};

/**
 * Builds the process-wide outbound client. Every fetch holds one pool slot from
 * acquisition until its body is fully read or cancelled.
 */
export const createOutboundClient = ({
  options: rawOptions = {},
  fetchImpl
}: {
  options?: OutboundClientOptionsInput;
  fetchImpl?: FetchLike;
} = {}): OutboundClient => {
  const options = Object.freeze(OutboundClientOptionsSchema.parse(rawOptions));
  const pool = createSlotPool(options.worker_count);
  const allocate = createChunkAllocator(options.allocator);
  const dispatcher = new Agent({
    connections: options.worker_count,
    connect: {timeout: options.connect_timeout_ms},
    headersTimeout: options.total_timeout_ms,
    bodyTimeout: options.total_timeout_ms
  });
  const requestFetch: FetchLike = fetchImpl ?? ((input, init) => undiciFetch(input, init));
  let closed = false;

  const requestOnce = async ({
    url,
    method,
    headers,
    callerSignal
  }: {
    url: string;
    method: string;
    headers: Record<string, string>;
    callerSignal?: AbortSignal;
  }): Promise<ForwarderResult<Response>> => {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.total_timeout_ms);
    const forwardAbort = () => controller.abort(callerSignal?.reason);
    callerSignal?.addEventListener('abort', forwardAbort, {once: true});

    try {
      const response = await requestFetch(url, {
        method,
        headers,
        redirect: 'manual',
        signal: controller.signal,
        dispatcher
      });
      return ok(response);
    } catch (unknownError) {
      callerSignal?.removeEventListener('abort', forwardAbort);
      return mapFetchError({unknownError, callerSignal, timedOut, url});
    } finally {
      // The deadline covers connect and response headers; body reads are bounded by bodyTimeout.
      clearTimeout(timer);
    }
  };

  const followRedirects = async ({
    start,
    method,
    headers,
    callerSignal
  }: {
    start: URL;
    method: string;
    headers: Record<string, string>;
    callerSignal?: AbortSignal;
  }): Promise<ForwarderResult<{response: Response; url: string; redirectCount: number}>> => {
    const visited = new Set<string>();
    let current = start;
    let redirectCount = 0;

    while (true) {
      visited.add(current.href);
      const attempt = await requestOnce({url: current.href, method, headers, callerSignal});
      if (!attempt.ok) {
        return attempt;
      }

      const response = attempt.value;
      if (!options.follow_redirects || !REDIRECT_STATUSES.has(response.status)) {
        return ok({response, url: current.href, redirectCount});
      }

      await discardBody(response);
      const location = response.headers.get('location');
      if (!location) {
        return err('redirect_location_invalid', `Redirect status ${response.status} without a Location header`, {
          status_code: response.status,
          url: current.href
        });
      }

      let next: URL;
      try {
        next = new URL(location, current);
      } catch {
        return err('redirect_location_invalid', `Redirect Location is not a valid URL: ${location}`, {
          status_code: response.status,
          url: current.href
        });
      }

      if (!ALLOWED_SCHEMES.has(next.protocol)) {
        return err('request_scheme_not_allowed', `Redirect scheme is not allowed: ${next.protocol}`, {
          url: next.href
        });
      }

      if (visited.has(next.href)) {
        return err('redirect_loop', `Redirect loop detected at ${next.href}`, {url: next.href});
      }

      redirectCount += 1;
      if (redirectCount > options.max_redirects) {
        return err('redirect_limit_exceeded', `More than ${options.max_redirects} redirects`, {url: next.href});
      }

      current = next;
    }
  };

  const fetchWithLease = async ({
    lease,
    target,
    fetchOptions
  }: {
    lease: SlotLease;
    target: URL;
    fetchOptions: OutboundFetchOptions;
  }): Promise<ForwarderResult<OutboundResponse>> => {
    const parsedMethod = OutboundMethodSchema.safeParse(fetchOptions.method ?? 'GET');
    const parsedHeaders = HeaderListSchema.safeParse(fetchOptions.headers ?? []);
    if (!parsedMethod.success || !parsedHeaders.success) {
      lease.release();
      return err('invalid_input', 'Outbound fetch supports GET and HEAD with a valid header list', {
        url: target.href
      });
    }

    const method = parsedMethod.data;
    const outboundHeaders = buildOutboundHeaders({
      callerHeaders: parsedHeaders.data,
      userAgent: options.user_agent
    });
    if (!outboundHeaders.ok) {
      lease.release();
      return outboundHeaders;
    }

    const followed = await followRedirects({
      start: target,
      method,
      headers: outboundHeaders.value,
      callerSignal: fetchOptions.signal
    });
    if (!followed.ok) {
      lease.release();
      return followed;
    }

    const {response, url, redirectCount} = followed.value;
    if (response.status < 200 || response.status > 299) {
      await discardBody(response);
      lease.release();
      return err('upstream_bad_status', `Upstream answered ${response.status}`, {
        status_code: response.status,
        url
      });
    }

    const contentLength = response.headers.get('content-length');
    if (
      options.max_response_bytes !== undefined &&
      contentLength &&
      /^\d+$/u.test(contentLength.trim()) &&
      Number.parseInt(contentLength, 10) > options.max_response_bytes
    ) {
      await discardBody(response);
      lease.release();
      return err('upstream_response_too_large', `Upstream response exceeds max_response_bytes=${options.max_response_bytes}`, {
        status_code: response.status,
        url
      });
    }

    const chunked = createChunkedBody({
      source: method === 'HEAD' ? null : response.body,
      maxChunkSize: options.max_chunk_size,
      ...(options.max_response_bytes !== undefined ? {maxResponseBytes: options.max_response_bytes} : {}),
      allocate,
      ...(fetchOptions.signal ? {signal: fetchOptions.signal} : {}),
      onSettled: lease.release
    });
    if (method === 'HEAD') {
      await discardBody(response);
    }

    return ok({
      status_code: response.status,
      url,
      headers: collectResponseHeaders(response.headers),
      redirect_count: redirectCount,
      body: chunked.body,
      cancel: chunked.cancel
    });
  };

  const fetchArtifact: OutboundClient['fetch'] = async (url, fetchOptions = {}) => {
    if (closed) {
      return err('client_closed', 'Outbound client is closed', {url});
    }

    const target = parseTargetUrl(url);
    if (!target.ok) {
      return target;
    }

    const lease = await pool.acquire({
      timeoutMs: options.acquire_timeout_ms,
      ...(fetchOptions.signal ? {signal: fetchOptions.signal} : {})
    });
    if (!lease.ok) {
      return lease;
    }

    try {
      return await fetchWithLease({lease: lease.value, target: target.value, fetchOptions});
    } catch (unknownError) {
      lease.value.release();
      throw unknownError;
    }
  };

  const close = async () => {
    closed = true;
    await pool.drain();
    await dispatcher.close();
  };

  return {
    fetch: fetchArtifact,
    stats: pool.stats,
    close,
    options
  };
};
