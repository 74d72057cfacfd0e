import { EncodeError, DecodeError } from '../errors';
import { describeValue } from '../helpers';
import type { ObjectIdentifierNode } from '../schema/TypeNode';
import type { JsonValue } from '../wire/JsonWire';
import type { Codec, TranscodeContext } from './Codec';

/**
 * OBJECT IDENTIFIER maps to its dot-notation string (e.g. "1.2.840.113549"),
 * checked for well-formedness in both directions.
 */
export class ObjectIdentifierCodec implements Codec<ObjectIdentifierNode> {
  encode(_node: ObjectIdentifierNode, value: unknown, ctx: TranscodeContext): JsonValue {
    if (typeof value !== 'string') {
      throw new EncodeError(`Expected a dotted OID string, got ${describeValue(value)}.`, ctx.path);
    }
    const problem = checkOid(value);
    if (problem) {
      throw new EncodeError(problem, ctx.path);
    }
    return value;
  }

  decode(_node: ObjectIdentifierNode, wire: unknown, ctx: TranscodeContext): string {
    if (typeof wire !== 'string') {
      throw new DecodeError(`Expected a dotted OID string, got ${describeValue(wire)}.`, ctx.path);
    }
    const problem = checkOid(wire);
    if (problem) {
      throw new DecodeError(problem, ctx.path);
    }
    return wire;
  }
}

const ARC_PATTERN = /^(?:0|[1-9][0-9]*)$/;

/**
 * Describe what is wrong with a dot-notation OID, or return undefined when
 * it is well formed: at least two arcs of decimal digits without leading
 * zeros, first arc 0..2, second arc 0..39 under arcs 0 and 1.
 */
export function checkOid(oid: string): string | undefined {
  const parts = oid.split('.');
  if (parts.length < 2) {
    return `OID must have at least 2 components, got: "${oid}"`;
  }
  const bad = parts.find(part => !ARC_PATTERN.test(part));
  if (bad !== undefined) {
    return `Invalid OID component: "${bad}"`;
  }
  const first = Number(parts[0]);
  const second = Number(parts[1]);
  if (first > 2) {
    return `OID first arc must be 0, 1, or 2, got: ${first}`;
  }
  if (first < 2 && second > 39) {
    return `OID second arc must be 0..39 when first arc is ${first}, got: ${parts[1]}`;
  }
  return undefined;
}
