import { EncodeError, DecodeError } from '../errors';
import { describeValue } from '../helpers';
import type { AnyNode } from '../schema/TypeNode';
import { isJsonValue } from '../wire/JsonWire';
import type { JsonValue } from '../wire/JsonWire';
import type { Codec, TranscodeContext } from './Codec';

/** ANY / ANY DEFINED BY carries an arbitrary JSON value through unchanged. */
export class AnyCodec implements Codec<AnyNode> {
  encode(_node: AnyNode, value: unknown, ctx: TranscodeContext): JsonValue {
    if (!isJsonValue(value)) {
      throw new EncodeError(`ANY value is not representable as JSON (${describeValue(value)}).`, ctx.path);
    }
    return value;
  }

  decode(_node: AnyNode, wire: unknown, ctx: TranscodeContext): JsonValue {
    if (!isJsonValue(wire)) {
      throw new DecodeError(`ANY value is not a JSON value (${describeValue(wire)}).`, ctx.path);
    }
    return wire;
  }
}
