import { MalformedWireError } from '../errors';

/** The intermediate value model: anything JSON text can express. */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

/** True when the value is representable as JSON text without loss. */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object': {
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      const proto: unknown = Object.getPrototypeOf(value);
      if (proto !== Object.prototype && proto !== null) return false;
      return Object.values(value).every(isJsonValue);
    }
    default:
      return false;
  }
}

/** Render as compact JSON text (no insignificant whitespace) in UTF-8. */
export function serialize(value: JsonValue): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

/** Parse UTF-8 JSON text. */
export function deserialize(bytes: Uint8Array): JsonValue {
  let text: string;
  try {
    text = decoder.decode(bytes);
  } catch (e) {
    throw new MalformedWireError(`Invalid UTF-8: ${errorMessage(e)}`);
  }
  return parseText(text);
}

/** Parse JSON text that is already a string. */
export function parseText(text: string): JsonValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new MalformedWireError(`Invalid JSON: ${errorMessage(e)}`);
  }
  if (!isJsonValue(parsed)) {
    throw new MalformedWireError('Invalid JSON: value is not representable');
  }
  return parsed;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
