import { EncodeError, DecodeError } from '../errors';
import { formatNames } from '../helpers';
import type { EnumeratedNode } from '../schema/TypeNode';
import type { JsonValue } from '../wire/JsonWire';
import type { Codec, TranscodeContext } from './Codec';

/**
 * ENUMERATED maps to the identifier as a JSON string. Both directions
 * require the identifier to be one of the declared names.
 */
export class EnumeratedCodec implements Codec<EnumeratedNode> {
  encode(node: EnumeratedNode, value: unknown, ctx: TranscodeContext): JsonValue {
    if (typeof value !== 'string' || !node.ordinals.has(value)) {
      throw new EncodeError(
        `Enumeration value '${String(value)}' not found in ${formatNames(node.ordinals.keys())}.`,
        ctx.path,
      );
    }
    return value;
  }

  decode(node: EnumeratedNode, wire: unknown, ctx: TranscodeContext): string {
    if (typeof wire !== 'string' || !node.ordinals.has(wire)) {
      throw new DecodeError(
        `Enumeration value ${JSON.stringify(wire) ?? String(wire)} not found in ${formatNames(node.ordinals.keys())}.`,
        ctx.path,
      );
    }
    return wire;
  }
}
