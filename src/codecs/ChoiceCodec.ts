import { DecodeError, EncodeError } from '../errors';
import { describeValue, formatNames, isRecord, ownValue } from '../helpers';
import type { ChoiceNode } from '../schema/TypeNode';
import type { JsonValue } from '../wire/JsonWire';
import type { Codec, TranscodeContext } from './Codec';

/**
 * CHOICE maps `{ alternative: value }` to a single-member JSON object.
 * Exactly one alternative must be present when encoding.
 */
export class ChoiceCodec implements Codec<ChoiceNode> {
  encode(node: ChoiceNode, value: unknown, ctx: TranscodeContext): JsonValue {
    const expected = formatNames(node.alternatives.map(alt => alt.name));
    if (!isRecord(value)) {
      throw new EncodeError(`Expected choices are ${expected}, but got ${describeValue(value)}.`, ctx.path);
    }

    const present = node.alternatives.filter(alt => ownValue(value, alt.name) !== undefined);
    if (present.length !== 1) {
      const got = present.length === 0
        ? formatNames(Object.keys(value).map(key => `'${key}'`))
        : formatNames(present.map(alt => `'${alt.name}'`));
      throw new EncodeError(
        `Expected exactly one of the choices ${expected}, but got ${got}.`,
        ctx.path,
      );
    }

    const [chosen] = present;
    return { [chosen.name]: ctx.encodeChild(chosen.node, ownValue(value, chosen.name), chosen.name) };
  }

  decode(node: ChoiceNode, wire: unknown, ctx: TranscodeContext): Record<string, unknown> {
    if (!isRecord(wire)) {
      throw new DecodeError(`Expected a JSON object for CHOICE, got ${describeValue(wire)}.`, ctx.path);
    }
    const keys = Object.keys(wire);
    if (keys.length !== 1) {
      throw new DecodeError(`Expected a single-member object for CHOICE, got ${keys.length} members.`, ctx.path);
    }

    const [key] = keys;
    const chosen = node.alternatives.find(alt => alt.name === key);
    if (!chosen) {
      throw new DecodeError(
        `Unknown CHOICE alternative '${key}'; expected one of ${formatNames(node.alternatives.map(alt => alt.name))}.`,
        ctx.path,
      );
    }
    return { [chosen.name]: ctx.decodeChild(chosen.node, wire[key], key) };
  }
}
