const DEFAULT_SENSITIVE_SUBSTRINGS = [
  'token',
  'secret',
  'password',
  'passwd',
  'authorization',
  'cookie',
  'credential',
  'apikey',
  'api_key',
  'privatekey',
  'private_key'
] as const;

const REDACTED_VALUE = '[REDACTED]';
const MAX_RECURSION_DEPTH = 12;

const normalizeKey = (value: string) => value.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

const isSensitiveKey = ({
  key,
  extraSensitiveKeys
}: {
  key: string;
  extraSensitiveKeys: Set<string>;
}) => {
  const normalized = normalizeKey(key);
  if (extraSensitiveKeys.has(normalized)) {
    return true;
  }

  return DEFAULT_SENSITIVE_SUBSTRINGS.some(entry => normalized.includes(entry));
};

const sanitizeErrorForLog = (error: Error) => {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return {
    name: error.name,
    message: error.message,
    ...(code ? {code} : {}),
    ...(error.stack ? {stack: error.stack} : {})
  };
};

const sanitizeInternal = ({
  value,
  depth,
  seen,
  extraSensitiveKeys
}: {
  value: unknown;
  depth: number;
  seen: WeakSet<object>;
  extraSensitiveKeys: Set<string>;
}): unknown => {
  if (depth > MAX_RECURSION_DEPTH) {
    return '[TRUNCATED]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (typeof value === 'symbol') {
    return value.toString();
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '[INVALID_DATE]' : value.toISOString();
  }

  if (value instanceof URL) {
    return value.toString();
  }

  if (Buffer.isBuffer(value)) {
    return `[BUFFER ${value.byteLength} bytes]`;
  }

  if (value instanceof Error) {
    return sanitizeErrorForLog(value);
  }

  if (Array.isArray(value)) {
    return value.map(item =>
      sanitizeInternal({
        value: item,
        depth: depth + 1,
        seen,
        extraSensitiveKeys
      })
    );
  }

  if (typeof value === 'object') {
    if (seen.has(value)) {
      return '[CIRCULAR]';
    }

    seen.add(value);

    const entries = Object.entries(value);
    const nextEntries = entries.map(([key, entryValue]) => {
      if (isSensitiveKey({key, extraSensitiveKeys})) {
        return [key, REDACTED_VALUE] as const;
      }

      return [
        key,
        sanitizeInternal({
          value: entryValue,
          depth: depth + 1,
          seen,
          extraSensitiveKeys
        })
      ] as const;
    });

    return Object.fromEntries(nextEntries);
  }

  if (typeof value === 'function') {
    return '[FUNCTION]';
  }

  return Object.prototype.toString.call(value);
};

export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown => {
  const normalizedExtraKeys = new Set(extraSensitiveKeys.map(item => normalizeKey(item)).filter(item => item.length > 0));

  return sanitizeInternal({
    value,
    depth: 0,
    seen: new WeakSet<object>(),
    extraSensitiveKeys: normalizedExtraKeys
  });
};
