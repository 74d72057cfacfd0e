/** Plain object check: excludes null, arrays and byte arrays. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

/** The record's own property `key`; inherited properties read as undefined. */
export function ownValue(record: Record<string, unknown>, key: string): unknown {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/** Short name of a value's shape, for error messages. */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Uint8Array) return 'Uint8Array';
  return typeof value;
}

/** Format a list of names as `[a, b, c]`. */
export function formatNames(names: Iterable<string>): string {
  return `[${[...names].join(', ')}]`;
}

/** Upper-case hexadecimal rendering of a byte array. */
export function bytesToHex(bytes: Uint8Array): string {
  let hex = '';
  for (const byte of bytes) {
    hex += byte.toString(16).toUpperCase().padStart(2, '0');
  }
  return hex;
}

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * Parse a hexadecimal string (either case) into bytes.
 * Returns undefined for odd lengths and non-hex characters.
 */
export function hexToBytes(hex: string): Uint8Array | undefined {
  if (!HEX_PATTERN.test(hex)) return undefined;
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Structural equality for native values: numbers (NaN equals NaN, 0 and -0
 * differ), strings, booleans, null, byte arrays, arrays and plain objects.
 * Object key order is not significant.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;

  if (a instanceof Uint8Array || b instanceof Uint8Array) {
    if (!(a instanceof Uint8Array && b instanceof Uint8Array)) return false;
    return a.length === b.length && a.every((byte, i) => byte === b[i]);
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!(Array.isArray(a) && Array.isArray(b))) return false;
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
  }

  if (isRecord(a) && isRecord(b)) {
    const keysA = Object.keys(a).filter(k => a[k] !== undefined);
    const keysB = Object.keys(b).filter(k => b[k] !== undefined);
    if (keysA.length !== keysB.length) return false;
    return keysA.every(k => Object.hasOwn(b, k) && valuesEqual(a[k], b[k]));
  }

  return false;
}

/** Exhaustiveness check for discriminated unions. */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
