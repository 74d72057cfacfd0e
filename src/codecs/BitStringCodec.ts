import { EncodeError, DecodeError } from '../errors';
import { bytesToHex, describeValue, hexToBytes, isRecord } from '../helpers';
import type { BitStringNode } from '../schema/TypeNode';
import type { JsonValue } from '../wire/JsonWire';
import type { Codec, TranscodeContext } from './Codec';

export interface BitStringValue {
  /** Raw bytes containing the bits (MSB-first within each byte). */
  data: Uint8Array;
  /** Actual number of valid bits. */
  bitLength: number;
}

/**
 * BIT STRING maps to `{"value": "<hex>", "length": <bits>}`, whatever the
 * SIZE constraint. Unused bits in the last byte are written as zero.
 */
export class BitStringCodec implements Codec<BitStringNode> {
  encode(_node: BitStringNode, value: unknown, ctx: TranscodeContext): JsonValue {
    if (!isBitStringValue(value)) {
      throw new EncodeError(
        `Expected { data: Uint8Array, bitLength: number }, got ${describeValue(value)}.`,
        ctx.path,
      );
    }
    const { data, bitLength } = value;
    if (!Number.isInteger(bitLength) || bitLength < 0 || bitLength > data.length * 8) {
      throw new EncodeError(`bitLength ${bitLength} does not fit in ${data.length} byte(s).`, ctx.path);
    }
    return { value: bytesToHex(clearUnusedBits(data, bitLength)), length: bitLength };
  }

  decode(_node: BitStringNode, wire: unknown, ctx: TranscodeContext): BitStringValue {
    const hex = isRecord(wire) ? wire.value : undefined;
    const bitLength = isRecord(wire) ? wire.length : undefined;
    if (typeof hex !== 'string' || typeof bitLength !== 'number') {
      throw new DecodeError(
        `Expected { "value": <hex>, "length": <bits> }, got ${describeValue(wire)}.`,
        ctx.path,
      );
    }
    if (!Number.isInteger(bitLength) || bitLength < 0) {
      throw new DecodeError(`Invalid BIT STRING length ${bitLength}.`, ctx.path);
    }
    const bytes = hexToBytes(hex);
    if (!bytes) {
      throw new DecodeError(`Invalid hex string '${hex}'.`, ctx.path);
    }
    if (bytes.length !== Math.ceil(bitLength / 8)) {
      throw new DecodeError(
        `BIT STRING of ${bitLength} bit(s) needs ${Math.ceil(bitLength / 8)} byte(s), got ${bytes.length}.`,
        ctx.path,
      );
    }
    return { data: clearUnusedBits(bytes, bitLength), bitLength };
  }
}

function isBitStringValue(value: unknown): value is BitStringValue {
  return isRecord(value) && value.data instanceof Uint8Array && typeof value.bitLength === 'number';
}

/** Copy of the first ceil(bitLength / 8) bytes with trailing bits zeroed. */
function clearUnusedBits(data: Uint8Array, bitLength: number): Uint8Array {
  const out = data.slice(0, Math.ceil(bitLength / 8));
  const used = bitLength % 8;
  if (used !== 0) {
    out[out.length - 1] &= (0xff << (8 - used)) & 0xff;
  }
  return out;
}
