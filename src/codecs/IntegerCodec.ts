import { EncodeError, DecodeError } from '../errors';
import { describeValue } from '../helpers';
import type { IntegerNode } from '../schema/TypeNode';
import type { JsonValue } from '../wire/JsonWire';
import type { Codec, TranscodeContext } from './Codec';

/**
 * INTEGER maps to a JSON number. No range constraints are checked, but the
 * value must be a safe integer in both directions: beyond 2^53 - 1 a JSON
 * number no longer round-trips exactly.
 */
export class IntegerCodec implements Codec<IntegerNode> {
  encode(_node: IntegerNode, value: unknown, ctx: TranscodeContext): JsonValue {
    return checkInteger(value, ctx, EncodeError);
  }

  decode(_node: IntegerNode, wire: unknown, ctx: TranscodeContext): number {
    return checkInteger(wire, ctx, DecodeError);
  }
}

function checkInteger(
  value: unknown,
  ctx: TranscodeContext,
  ErrorClass: typeof EncodeError | typeof DecodeError,
): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ErrorClass(`Expected an integer, got ${describeValue(value)}.`, ctx.path);
  }
  if (!Number.isSafeInteger(value)) {
    throw new ErrorClass(`Integer ${value} is outside the safe integer range.`, ctx.path);
  }
  return value;
}
