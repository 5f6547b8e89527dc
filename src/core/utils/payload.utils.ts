/**
 * Flatten an arbitrary parsed body into a string map.
 *
 * Nested objects use dot keys (`customer.email`), arrays use index keys
 * (`items.0.id`). null and undefined values are dropped.
 */
export function flattenToStringMap(value: unknown, prefix = ''): Record<string, string> {
  const result: Record<string, string> = {};
  flattenInto(result, value, prefix);
  return result;
}

function flattenInto(target: Record<string, string>, value: unknown, prefix: string): void {
  if (value === null || value === undefined) {
    return;
  }

  if (Buffer.isBuffer(value)) {
    if (prefix) {
      target[prefix] = value.toString('utf8');
    }
    return;
  }

  if (Array.isArray(value)) {
    value.forEach((item, index) => {
      flattenInto(target, item, prefix ? `${prefix}.${index}` : String(index));
    });
    return;
  }

  if (typeof value === 'object') {
    for (const [key, entry] of Object.entries(value)) {
      flattenInto(target, entry, prefix ? `${prefix}.${key}` : key);
    }
    return;
  }

  if (prefix) {
    target[prefix] = String(value);
  }
}

/**
 * Lower-case header names and collapse multi-value headers to the first value
 */
export function normalizeHeaders(
  headers: Record<string, string | string[] | undefined>,
): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    normalized[key.toLowerCase()] = Array.isArray(value) ? (value[0] ?? '') : value;
  }
  return normalized;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
