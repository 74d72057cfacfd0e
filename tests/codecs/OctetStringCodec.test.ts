import { DecodeError, EncodeError } from '../../src/errors';
import { single } from '../support/nodes';

describe('OctetStringCodec', () => {
  const { encode, decode } = single({ kind: 'OCTET STRING', size: {} });

  it('encodes bytes as upper-case hex', () => {
    expect(encode(new Uint8Array([0x00, 0x0f, 0xab, 0xff]))).toBe('000FABFF');
    expect(encode(new Uint8Array(0))).toBe('');
  });

  it('decodes either case', () => {
    expect(decode('000fAbFF')).toEqual(new Uint8Array([0x00, 0x0f, 0xab, 0xff]));
  });

  it('rejects malformed hex', () => {
    expect(() => decode('ABC')).toThrow("Invalid hex string 'ABC'.");
    expect(() => decode('GG')).toThrow(DecodeError);
    expect(() => decode(12)).toThrow('Expected a hex string, got number.');
  });

  it('requires a Uint8Array when encoding', () => {
    expect(() => encode([1, 2])).toThrow('Expected a Uint8Array, got array.');
    expect(() => encode('0102')).toThrow(EncodeError);
  });
});
