import { EncodeError, DecodeError } from '../errors';
import { describeValue } from '../helpers';
import type { CharStringNode } from '../schema/TypeNode';
import type { JsonValue } from '../wire/JsonWire';
import type { Codec, TranscodeContext } from './Codec';

/**
 * Character string and time types map to JSON strings unchanged. The
 * subtypes differ only in the node kind they keep.
 */
export class CharStringCodec implements Codec<CharStringNode> {
  encode(node: CharStringNode, value: unknown, ctx: TranscodeContext): JsonValue {
    if (typeof value !== 'string') {
      throw new EncodeError(`Expected a string for ${node.kind}, got ${describeValue(value)}.`, ctx.path);
    }
    return value;
  }

  decode(node: CharStringNode, wire: unknown, ctx: TranscodeContext): string {
    if (typeof wire !== 'string') {
      throw new DecodeError(`Expected a string for ${node.kind}, got ${describeValue(wire)}.`, ctx.path);
    }
    return wire;
  }
}
