import { DecodeError, EncodeError } from '../../src/errors';
import { Transcoder } from '../../src/schema/Transcoder';
import { NodeArena } from '../../src/schema/TypeNode';
import { field } from '../support/nodes';

describe('ChoiceCodec', () => {
  const arena = new NodeArena();
  const bool = arena.add({ kind: 'BOOLEAN' });
  const int = arena.add({ kind: 'INTEGER' });
  const nil = arena.add({ kind: 'NULL' });
  const choice = arena.add({
    kind: 'CHOICE',
    alternatives: [field('flag', bool), field('count', int), field('nothing', nil)],
    extensible: false,
  });

  const encode = (value: unknown) => new Transcoder(arena).encode(choice, value);
  const decode = (wire: unknown) => new Transcoder(arena).decode(choice, wire);

  it('encodes the chosen alternative as a single-member object', () => {
    expect(encode({ flag: true })).toEqual({ flag: true });
    expect(encode({ count: 42 })).toEqual({ count: 42 });
    expect(encode({ nothing: null })).toEqual({ nothing: null });
  });

  it('decodes a single-member object', () => {
    expect(decode({ count: 7 })).toEqual({ count: 7 });
  });

  it('ignores undefined alternatives and unknown keys when encoding', () => {
    expect(encode({ flag: undefined, count: 1, note: 'x' })).toEqual({ count: 1 });
  });

  it('does not count inherited properties as alternatives', () => {
    const withInheritedName = arena.add({
      kind: 'CHOICE',
      alternatives: [field('constructor', int), field('other', int)],
      extensible: false,
    });
    const transcoder = () => new Transcoder(arena);
    expect(transcoder().encode(withInheritedName, { other: 5 })).toEqual({ other: 5 });
    expect(transcoder().encode(withInheritedName, { constructor: 2 })).toEqual({ constructor: 2 });
  });

  it('rejects more than one present alternative', () => {
    expect(() => encode({ flag: true, count: 1 })).toThrow(
      "Expected exactly one of the choices [flag, count, nothing], but got ['flag', 'count'].",
    );
  });

  it('rejects a value with no alternative present', () => {
    expect(() => encode({ other: 1 })).toThrow(
      "Expected exactly one of the choices [flag, count, nothing], but got ['other'].",
    );
    expect(() => encode({})).toThrow(EncodeError);
    expect(() => encode(5)).toThrow('Expected choices are [flag, count, nothing], but got number.');
  });

  it('rejects wire objects without exactly one member', () => {
    expect(() => decode({})).toThrow('Expected a single-member object for CHOICE, got 0 members.');
    expect(() => decode({ flag: true, count: 1 })).toThrow('got 2 members');
    expect(() => decode([true])).toThrow(DecodeError);
  });

  it('rejects an unknown alternative on decode', () => {
    expect(() => decode({ other: 1 })).toThrow(
      "Unknown CHOICE alternative 'other'; expected one of [flag, count, nothing].",
    );
  });

  it('reports nested failures under the alternative name', () => {
    expect(() => decode({ count: 'x' })).toThrow('Expected an integer, got string. (at /count)');
  });
});
