import { EncodeError, DecodeError } from '../errors';
import { describeValue } from '../helpers';
import type { NullNode } from '../schema/TypeNode';
import type { JsonValue } from '../wire/JsonWire';
import type { Codec, TranscodeContext } from './Codec';

export class NullCodec implements Codec<NullNode> {
  encode(_node: NullNode, value: unknown, ctx: TranscodeContext): JsonValue {
    if (value !== null) {
      throw new EncodeError(`Expected null, got ${describeValue(value)}.`, ctx.path);
    }
    return null;
  }

  decode(_node: NullNode, wire: unknown, ctx: TranscodeContext): null {
    if (wire !== null) {
      throw new DecodeError(`Expected null, got ${describeValue(wire)}.`, ctx.path);
    }
    return null;
  }
}
