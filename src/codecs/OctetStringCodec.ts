import { EncodeError, DecodeError } from '../errors';
import { bytesToHex, describeValue, hexToBytes } from '../helpers';
import type { OctetStringNode } from '../schema/TypeNode';
import type { JsonValue } from '../wire/JsonWire';
import type { Codec, TranscodeContext } from './Codec';

/**
 * OCTET STRING maps a Uint8Array to an upper-case hex string. Decoding
 * accepts either case. The SIZE range is not checked.
 */
export class OctetStringCodec implements Codec<OctetStringNode> {
  encode(_node: OctetStringNode, value: unknown, ctx: TranscodeContext): JsonValue {
    if (!(value instanceof Uint8Array)) {
      throw new EncodeError(`Expected a Uint8Array, got ${describeValue(value)}.`, ctx.path);
    }
    return bytesToHex(value);
  }

  decode(_node: OctetStringNode, wire: unknown, ctx: TranscodeContext): Uint8Array {
    if (typeof wire !== 'string') {
      throw new DecodeError(`Expected a hex string, got ${describeValue(wire)}.`, ctx.path);
    }
    const bytes = hexToBytes(wire);
    if (!bytes) {
      throw new DecodeError(`Invalid hex string '${wire}'.`, ctx.path);
    }
    return bytes;
  }
}
