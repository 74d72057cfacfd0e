import { DecodeError, EncodeError } from '../../src/errors';
import { Transcoder } from '../../src/schema/Transcoder';
import { NodeArena } from '../../src/schema/TypeNode';

describe('SequenceOfCodec', () => {
  const arena = new NodeArena();
  const int = arena.add({ kind: 'INTEGER' });
  const list = arena.add({ kind: 'SEQUENCE OF', element: int, size: { min: 0, max: 2 } });
  const set = arena.add({ kind: 'SET OF', element: int, size: {} });

  const encode = (id: number, value: unknown) => new Transcoder(arena).encode(id, value);
  const decode = (id: number, wire: unknown) => new Transcoder(arena).decode(id, wire);

  it('maps element by element', () => {
    expect(encode(list, [1, 2, 3])).toEqual([1, 2, 3]);
    expect(decode(list, [1, 2, 3])).toEqual([1, 2, 3]);
  });

  it('handles empty arrays', () => {
    expect(encode(list, [])).toEqual([]);
    expect(decode(list, [])).toEqual([]);
  });

  it('keeps SET OF order as given', () => {
    expect(encode(set, [3, 1, 2])).toEqual([3, 1, 2]);
  });

  it('reports the index of a bad element', () => {
    expect(() => encode(list, [1, 'x'])).toThrow('Expected an integer, got string. (at /1)');
    expect(() => decode(list, [1, 2, false])).toThrow(DecodeError);
  });

  it('rejects non-arrays', () => {
    expect(() => encode(list, { 0: 1 })).toThrow(EncodeError);
    expect(() => decode(set, 'abc')).toThrow('Expected a JSON array for SET OF, got string.');
  });
});
