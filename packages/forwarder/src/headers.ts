import {HeaderListSchema, type HeaderList} from './contracts';
import {err, ok, type ForwarderResult} from './errors';

const HTTP_HEADER_NAME_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const CONNECTION_TOKEN_SPLIT_REGEX = /\s*,\s*/u;

export const HOP_BY_HOP_HEADER_NAMES = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade'
]);

// Headers the client owns on every outbound request.
const CALLER_HEADER_DENYLIST = new Set(['host', 'content-length', 'user-agent', 'cookie']);

const RESPONSE_HEADER_DENYLIST = new Set([...HOP_BY_HOP_HEADER_NAMES, 'set-cookie']);

export const normalizeHeaderName = (name: string): ForwarderResult<string> => {
  const normalizedName = name.trim().toLowerCase();
  if (!HTTP_HEADER_NAME_REGEX.test(normalizedName)) {
    return err('invalid_header_name', `Invalid header name: ${name}`);
  }

  return ok(normalizedName);
};

export const validateHeaderValue = (value: string): ForwarderResult<string> => {
  if (/[\r\n]/u.test(value)) {
    return err('invalid_header_value', 'Header values must not contain CR or LF');
  }

  return ok(value.trim());
};

const parseConnectionHeaderTokens = (connectionHeaderValue: string): ForwarderResult<Set<string>> => {
  const tokenSet = new Set<string>();
  const tokens = connectionHeaderValue.split(CONNECTION_TOKEN_SPLIT_REGEX);

  for (const rawToken of tokens) {
    const token = rawToken.trim().toLowerCase();
    if (token.length === 0) {
      continue;
    }

    if (!HTTP_HEADER_NAME_REGEX.test(token)) {
      return err('invalid_connection_header', `Connection header contains an invalid token: ${rawToken}`);
    }

    tokenSet.add(token);
  }

  return ok(tokenSet);
};

export const stripHopByHopHeaders = (rawHeaders: unknown): ForwarderResult<HeaderList> => {
  const parsedHeaders = HeaderListSchema.safeParse(rawHeaders);
  if (!parsedHeaders.success) {
    return err('invalid_input', parsedHeaders.error.message);
  }

  const normalizedHeaders: HeaderList = [];
  const connectionNominatedHeaders = new Set<string>();

  for (const header of parsedHeaders.data) {
    const normalizedName = normalizeHeaderName(header.name);
    if (!normalizedName.ok) {
      return normalizedName;
    }

    const normalizedValue = validateHeaderValue(header.value);
    if (!normalizedValue.ok) {
      return normalizedValue;
    }

    if (normalizedName.value === 'connection') {
      const parsedConnectionTokens = parseConnectionHeaderTokens(normalizedValue.value);
      if (!parsedConnectionTokens.ok) {
        return parsedConnectionTokens;
      }

      for (const token of parsedConnectionTokens.value) {
        connectionNominatedHeaders.add(token);
      }
    }

    normalizedHeaders.push({
      name: normalizedName.value,
      value: normalizedValue.value
    });
  }

  const headersToStrip = new Set<string>([...HOP_BY_HOP_HEADER_NAMES, ...connectionNominatedHeaders]);

  return ok(normalizedHeaders.filter(header => !headersToStrip.has(header.name)));
};

export const buildOutboundHeaders = ({
  callerHeaders,
  userAgent
}: {
  callerHeaders: HeaderList;
  userAgent: string;
}): ForwarderResult<Record<string, string>> => {
  const stripped = stripHopByHopHeaders(callerHeaders);
  if (!stripped.ok) {
    return stripped;
  }

  const outboundHeaders: Record<string, string> = {};
  for (const header of stripped.value) {
    if (CALLER_HEADER_DENYLIST.has(header.name)) {
      continue;
    }

    outboundHeaders[header.name] = header.value;
  }

  outboundHeaders['user-agent'] = userAgent;
  return ok(outboundHeaders);
};

export const collectResponseHeaders = (headers: Iterable<[string, string]>): Record<string, string> => {
  const selectedHeaders: Record<string, string> = {};

  for (const [name, value] of headers) {
    const normalizedName = name.toLowerCase();
    if (RESPONSE_HEADER_DENYLIST.has(normalizedName)) {
      continue;
    }

    selectedHeaders[normalizedName] = value;
  }

  return selectedHeaders;
};
