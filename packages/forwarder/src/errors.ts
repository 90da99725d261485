export const forwarderErrorCodes = [
  'invalid_input',
  'invalid_header_name',
  'invalid_header_value',
  'invalid_connection_header',
  'request_url_invalid',
  'request_scheme_not_allowed',
  'client_closed',
  'pool_acquire_timeout',
  'aborted',
  'upstream_timeout',
  'upstream_connection_refused',
  'upstream_network_error',
  'upstream_bad_status',
  'redirect_loop',
  'redirect_limit_exceeded',
  'redirect_location_invalid',
  'upstream_response_too_large'
] as const;

export type ForwarderErrorCode = (typeof forwarderErrorCodes)[number];

export type ForwarderError = {
  code: ForwarderErrorCode;
  message: string;
  status_code?: number;
  url?: string;
};

export type ForwarderSuccess<T> = {ok: true; value: T};
export type ForwarderFailure = {ok: false; error: ForwarderError};
export type ForwarderResult<T> = ForwarderSuccess<T> | ForwarderFailure;

export const ok = <T>(value: T): ForwarderSuccess<T> => ({ok: true, value});

export const err = (
  code: ForwarderErrorCode,
  message: string,
  details: Pick<ForwarderError, 'status_code' | 'url'> = {}
): ForwarderFailure => ({
  ok: false,
  error: {code, message, ...details}
});

/**
 * Raised while a response body is being iterated, after the fetch itself
 * already resolved. Carries the same codes as {@link ForwarderError}.
 */
export class ForwarderStreamError extends Error {
  public readonly code: ForwarderErrorCode;

  public constructor(code: ForwarderErrorCode, message: string, options?: {cause?: unknown}) {
    super(message, options);
    this.name = 'ForwarderStreamError';
    this.code = code;
  }
}

export const isForwarderStreamError = (value: unknown): value is ForwarderStreamError =>
  value instanceof ForwarderStreamError;
