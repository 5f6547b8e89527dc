/**
 * JSON-compatible value as returned by a processor API
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Opaque pass-through of a processor response.
 * The gateway carries it for observability and never reads inside it.
 */
export type RawProviderResponse =
  | { kind: 'json'; value: JsonValue }
  | { kind: 'bytes'; value: Buffer }
  | { kind: 'none' };

export const RawProviderResponse = {
  json(value: JsonValue): RawProviderResponse {
    return { kind: 'json', value };
  },

  bytes(value: Buffer): RawProviderResponse {
    return { kind: 'bytes', value };
  },

  none(): RawProviderResponse {
    return { kind: 'none' };
  },

  /**
   * Parse a response body as JSON, falling back to raw bytes
   */
  fromBody(body: string): RawProviderResponse {
    if (!body) {
      return { kind: 'none' };
    }
    try {
      return { kind: 'json', value: parseJson(body) };
    } catch {
      return { kind: 'bytes', value: Buffer.from(body) };
    }
  },
};

export function isJsonObject(
  value: JsonValue | undefined,
): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJson(text: string): JsonValue {
  const parsed: unknown = JSON.parse(text);
  return toJsonValue(parsed);
}

/**
 * Narrow an unknown value (e.g. JSON.parse output) to JsonValue
 */
export function toJsonValue(value: unknown): JsonValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined) {
        result[key] = toJsonValue(entry);
      }
    }
    return result;
  }
  return String(value);
}
