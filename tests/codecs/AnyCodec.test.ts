import { DecodeError, EncodeError } from '../../src/errors';
import { single } from '../support/nodes';

describe('AnyCodec', () => {
  const { encode, decode } = single({ kind: 'ANY' });

  it('passes JSON values through', () => {
    const value = { a: [1, 'two', null, { b: false }] };
    expect(encode(value)).toEqual(value);
    expect(decode(value)).toEqual(value);
    expect(encode('text')).toBe('text');
  });

  it('rejects values JSON cannot carry', () => {
    expect(() => encode(undefined)).toThrow(EncodeError);
    expect(() => encode(Infinity)).toThrow(EncodeError);
    expect(() => encode(new Uint8Array([1]))).toThrow('ANY value is not representable as JSON (Uint8Array).');
    expect(() => encode({ when: new Date(0) })).toThrow(EncodeError);
    expect(() => decode(() => 1)).toThrow(DecodeError);
  });
});
