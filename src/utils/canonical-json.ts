/**
 * RFC 8785 (JCS) canonical JSON
 *
 * Meta-transaction payloads are signed as the canonical JSON of the call,
 * so the same call always produces the same bytes.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export function canonicalizeJson(value: JsonValue): string {
  if (value === null) {
    return 'null';
  }

  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number': {
      if (!Number.isFinite(value)) {
        throw new Error('Non-finite number is not valid JSON');
      }
      return JSON.stringify(value);
    }
    case 'boolean':
      return value ? 'true' : 'false';
    case 'object': {
      if (Array.isArray(value)) {
        const items = value.map((entry) => canonicalizeJson(entry));
        return `[${items.join(',')}]`;
      }

      const keys = Object.keys(value).sort();
      const entries = keys.map((key) => `${JSON.stringify(key)}:${canonicalizeJson(value[key])}`);
      return `{${entries.join(',')}}`;
    }
    default:
      throw new Error('Unsupported JSON value');
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert call arguments into JSON: bigint becomes `{"$bigint": "..."}`,
 * bytes become 0x hex, undefined object fields are dropped.
 */
export function toJsonValue(input: unknown, seen: Set<object> = new Set()): JsonValue {
  if (input === null) {
    return null;
  }

  if (typeof input === 'string' || typeof input === 'boolean') {
    return input;
  }

  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new Error('Non-finite number is not allowed in call data');
    }
    return input;
  }

  if (typeof input === 'bigint') {
    return { $bigint: input.toString() };
  }

  if (input instanceof Uint8Array) {
    return `0x${Buffer.from(input).toString('hex')}`;
  }

  if (Array.isArray(input)) {
    return input.map((entry) => toJsonValue(entry, seen));
  }

  if (typeof input === 'object') {
    if (seen.has(input)) {
      throw new Error('Circular reference detected in call data');
    }
    if (!isPlainObject(input)) {
      throw new Error('Unsupported object type in call data');
    }
    seen.add(input);
    const output: { [key: string]: JsonValue } = {};
    for (const [key, value] of Object.entries(input)) {
      if (value !== undefined) {
        output[key] = toJsonValue(value, seen);
      }
    }
    seen.delete(input);
    return output;
  }

  throw new Error(`Unsupported value type in call data: ${typeof input}`);
}

/**
 * UTF-8 bytes of the canonical JSON of `input`
 */
export function canonicalJsonBytes(input: unknown): Buffer {
  return Buffer.from(canonicalizeJson(toJsonValue(input)), 'utf8');
}
