import { DecodeError, EncodeError } from '../errors';
import { describeValue } from '../helpers';
import type { SequenceOfNode, SetOfNode } from '../schema/TypeNode';
import type { JsonValue } from '../wire/JsonWire';
import type { Codec, TranscodeContext } from './Codec';

type CollectionNode = SequenceOfNode | SetOfNode;

/**
 * SEQUENCE OF and SET OF map to a JSON array, element by element, in the
 * order given. SET OF is not sorted.
 */
export class SequenceOfCodec implements Codec<CollectionNode> {
  encode(node: CollectionNode, value: unknown, ctx: TranscodeContext): JsonValue {
    if (!Array.isArray(value)) {
      throw new EncodeError(`Expected an array for ${node.kind}, got ${describeValue(value)}.`, ctx.path);
    }
    return value.map((item: unknown, i) => ctx.encodeChild(node.element, item, i));
  }

  decode(node: CollectionNode, wire: unknown, ctx: TranscodeContext): unknown[] {
    if (!Array.isArray(wire)) {
      throw new DecodeError(`Expected a JSON array for ${node.kind}, got ${describeValue(wire)}.`, ctx.path);
    }
    return wire.map((item: unknown, i) => ctx.decodeChild(node.element, item, i));
  }
}
