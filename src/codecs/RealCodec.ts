import { EncodeError, DecodeError } from '../errors';
import { describeValue } from '../helpers';
import type { RealNode } from '../schema/TypeNode';
import type { JsonValue } from '../wire/JsonWire';
import type { Codec, TranscodeContext } from './Codec';

// JSON numbers cannot carry these; X.697 spells them as strings.
const SPECIAL_REALS: ReadonlyMap<string, number> = new Map([
  ['INF', Infinity],
  ['-INF', -Infinity],
  ['NaN', NaN],
  ['-0', -0],
]);

/** REAL maps to a JSON number, or to one of the special-value strings. */
export class RealCodec implements Codec<RealNode> {
  encode(_node: RealNode, value: unknown, ctx: TranscodeContext): JsonValue {
    if (typeof value !== 'number') {
      throw new EncodeError(`Expected a number, got ${describeValue(value)}.`, ctx.path);
    }
    if (Number.isNaN(value)) return 'NaN';
    if (value === Infinity) return 'INF';
    if (value === -Infinity) return '-INF';
    if (Object.is(value, -0)) return '-0';
    return value;
  }

  decode(_node: RealNode, wire: unknown, ctx: TranscodeContext): number {
    if (typeof wire === 'number') {
      return wire;
    }
    if (typeof wire === 'string') {
      const special = SPECIAL_REALS.get(wire);
      if (special !== undefined) return special;
      throw new DecodeError(`Unknown special REAL value '${wire}'.`, ctx.path);
    }
    throw new DecodeError(`Expected a number, got ${describeValue(wire)}.`, ctx.path);
  }
}
