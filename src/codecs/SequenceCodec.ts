import { DecodeError, EncodeError, MissingRequiredFieldError } from '../errors';
import { describeValue, isRecord, ownValue } from '../helpers';
import type { SequenceNode, SetNode } from '../schema/TypeNode';
import type { JsonValue } from '../wire/JsonWire';
import type { Codec, TranscodeContext } from './Codec';
import { decodeAbsence, encodePresence } from './fieldPolicy';

type AggregateNode = SequenceNode | SetNode;

/**
 * SEQUENCE and SET map to a JSON object keyed by member name. Members are
 * written in declared order; on decode, key order and unknown keys are
 * ignored. Only own properties of the native object count as members.
 */
export class SequenceCodec implements Codec<AggregateNode> {
  encode(node: AggregateNode, value: unknown, ctx: TranscodeContext): JsonValue {
    if (!isRecord(value)) {
      throw new EncodeError(`Expected an object for ${node.kind}, got ${describeValue(value)}.`, ctx.path);
    }

    const out: { [key: string]: JsonValue } = {};
    for (const field of node.fields) {
      const fieldValue = ownValue(value, field.name);
      switch (encodePresence(field, fieldValue, ctx.options)) {
        case 'emit':
          out[field.name] = ctx.encodeChild(field.node, fieldValue, field.name);
          break;
        case 'omit':
          break;
        case 'missing':
          throw new MissingRequiredFieldError(field.name, ctx.path);
      }
    }
    return out;
  }

  decode(node: AggregateNode, wire: unknown, ctx: TranscodeContext): Record<string, unknown> {
    if (!isRecord(wire)) {
      throw new DecodeError(`Expected a JSON object for ${node.kind}, got ${describeValue(wire)}.`, ctx.path);
    }

    const result: Record<string, unknown> = {};
    for (const field of node.fields) {
      if (Object.hasOwn(wire, field.name)) {
        result[field.name] = ctx.decodeChild(field.node, wire[field.name], field.name);
        continue;
      }
      switch (decodeAbsence(field, ctx.options)) {
        case 'default':
          // The compiled default is shared by every decode.
          result[field.name] = structuredClone(field.defaultValue);
          break;
        case 'omit':
          break;
        case 'error':
          throw new DecodeError(`Missing required member '${field.name}'.`, ctx.path);
      }
    }
    return result;
  }
}
