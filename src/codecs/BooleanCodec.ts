import { EncodeError, DecodeError } from '../errors';
import { describeValue } from '../helpers';
import type { BooleanNode } from '../schema/TypeNode';
import type { JsonValue } from '../wire/JsonWire';
import type { Codec, TranscodeContext } from './Codec';

/** BOOLEAN maps to JSON true/false. */
export class BooleanCodec implements Codec<BooleanNode> {
  encode(_node: BooleanNode, value: unknown, ctx: TranscodeContext): JsonValue {
    if (typeof value !== 'boolean') {
      throw new EncodeError(`Expected a boolean, got ${describeValue(value)}.`, ctx.path);
    }
    return value;
  }

  decode(_node: BooleanNode, wire: unknown, ctx: TranscodeContext): boolean {
    if (typeof wire !== 'boolean') {
      throw new DecodeError(`Expected a boolean, got ${describeValue(wire)}.`, ctx.path);
    }
    return wire;
  }
}
