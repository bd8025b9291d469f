const DEFAULT_SENSITIVE_SUBSTRINGS = [
  'token',
  'secret',
  'password',
  'authorization',
  'cookie',
  'apikey',
  'api_key',
  'privatekey',
  'private_key',
  'body'
] as const;

const REDACTED_VALUE = '[REDACTED]';
const MAX_RECURSION_DEPTH = 12;
const MAX_STRING_LENGTH = 2048;

const normalizeKey = (value: string) => value.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

type SanitizeState = {
  seen: WeakSet<object>;
  extraSensitiveKeys: Set<string>;
};

const isSensitiveKey = (key: string, state: SanitizeState) => {
  const normalized = normalizeKey(key);
  if (state.extraSensitiveKeys.has(normalized)) {
    return true;
  }

  return DEFAULT_SENSITIVE_SUBSTRINGS.some(entry => normalized.includes(entry));
};

const truncate = (value: string) =>
  value.length > MAX_STRING_LENGTH ? `${value.slice(0, MAX_STRING_LENGTH)}...[${value.length} chars]` : value;

const sanitizeEntries = (entries: Array<[string, unknown]>, depth: number, state: SanitizeState) =>
  Object.fromEntries(
    entries.map(([key, entryValue]) =>
      isSensitiveKey(key, state) ? [key, REDACTED_VALUE] : [key, sanitizeInternal(entryValue, depth + 1, state)]
    )
  );

const sanitizeError = (error: Error, depth: number, state: SanitizeState): Record<string, unknown> => ({
  name: error.name,
  message: truncate(error.message),
  ...(error.stack ? {stack: error.stack} : {}),
  ...(error.cause !== undefined ? {cause: sanitizeInternal(error.cause, depth + 1, state)} : {})
});

const sanitizeInternal = (value: unknown, depth: number, state: SanitizeState): unknown => {
  if (depth > MAX_RECURSION_DEPTH) {
    return '[TRUNCATED]';
  }

  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    return truncate(value);
  }

  if (typeof value === 'bigint' || typeof value === 'symbol') {
    return value.toString();
  }

  if (typeof value === 'function') {
    return '[FUNCTION]';
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Uint8Array) {
    return `[BINARY ${value.byteLength} bytes]`;
  }

  if (typeof value !== 'object') {
    return Object.prototype.toString.call(value);
  }

  if (state.seen.has(value)) {
    return '[CIRCULAR]';
  }
  state.seen.add(value);

  if (value instanceof Error) {
    return sanitizeError(value, depth, state);
  }

  if (Array.isArray(value)) {
    return value.map(item => sanitizeInternal(item, depth + 1, state));
  }

  if (value instanceof Map) {
    return sanitizeEntries(
      [...value.entries()].map(([key, entryValue]): [string, unknown] => [String(key), entryValue]),
      depth,
      state
    );
  }

  return sanitizeEntries(Object.entries(value), depth, state);
};

export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown =>
  sanitizeInternal(value, 0, {
    seen: new WeakSet<object>(),
    extraSensitiveKeys: new Set(extraSensitiveKeys.map(normalizeKey).filter(item => item.length > 0))
  });
