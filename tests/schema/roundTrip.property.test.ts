import fc from 'fast-check';
import type { BitStringValue } from '../../src/codecs/BitStringCodec';
import { SchemaCompiler } from '../../src/schema/SchemaCompiler';

describe('round-trip properties', () => {
  const compiler = new SchemaCompiler({
    M: {
      types: {
        Color: { kind: 'ENUMERATED', values: { '0': 'red', '1': 'green', '2': 'blue' } },
        Record: {
          kind: 'SEQUENCE',
          members: [
            { name: 'id', descriptor: { kind: 'INTEGER' } },
            { name: 'label', descriptor: { kind: 'UTF8String' } },
            { name: 'color', descriptor: { kind: 'Color' }, default: 'red' },
            { name: 'tags', descriptor: { kind: 'SEQUENCE OF', element: { kind: 'IA5String' } }, optional: true },
            { name: 'blob', descriptor: { kind: 'OCTET STRING' }, optional: true },
            { name: 'flag', descriptor: { kind: 'BOOLEAN' }, default: false },
          ],
        },
        Number: { kind: 'REAL' },
        Bits: { kind: 'BIT STRING' },
        Pick: {
          kind: 'CHOICE',
          members: [
            { name: 'flag', descriptor: { kind: 'BOOLEAN' } },
            { name: 'count', descriptor: { kind: 'INTEGER' } },
            { name: 'nothing', descriptor: { kind: 'NULL' } },
          ],
        },
      },
    },
  });
  const record = compiler.compileType('M', 'Record').unwrap();
  const color = compiler.compileType('M', 'Color').unwrap();
  const real = compiler.compileType('M', 'Number').unwrap();
  const bits = compiler.compileType('M', 'Bits').unwrap();
  const pick = compiler.compileType('M', 'Pick').unwrap();

  const recordValue = fc.record(
    {
      id: fc.maxSafeInteger(),
      label: fc.fullUnicodeString(),
      color: fc.constantFrom('red', 'green', 'blue'),
      tags: fc.array(fc.string()),
      blob: fc.uint8Array({ maxLength: 16 }),
      flag: fc.boolean(),
    },
    { requiredKeys: ['id', 'label', 'color', 'flag'] },
  );

  it('reconstructs SEQUENCE values, keeping absent optional members absent', () => {
    fc.assert(
      fc.property(recordValue, value => {
        const bytes = record.encode(value).unwrap();
        expect(record.decode(bytes).unwrap()).toEqual(value);
      }),
    );
  });

  it('leaves members equal to their default off the wire', () => {
    fc.assert(
      fc.property(recordValue, value => {
        const wire = record.encodeToJson(value).unwrap();
        const keys = typeof wire === 'object' && wire !== null ? Object.keys(wire) : [];
        expect(keys.includes('color')).toBe(value.color !== 'red');
        expect(keys.includes('flag')).toBe(value.flag);
      }),
    );
  });

  it('maps every enumeration name to itself', () => {
    fc.assert(
      fc.property(fc.constantFrom('red', 'green', 'blue'), name => {
        expect(color.decodeFromString(color.encodeToString(name).unwrap()).unwrap()).toBe(name);
      }),
    );
  });

  it('rejects names outside the enumeration', () => {
    fc.assert(
      fc.property(
        fc.string().filter(s => !['red', 'green', 'blue'].includes(s)),
        name => {
          const encoded = color.encode(name);
          expect(encoded._tag === 'Err' && encoded.error.code).toBe('ENCODE_ERROR');
          const decoded = color.decodeFromJson(name);
          expect(decoded._tag === 'Err' && decoded.error.code).toBe('DECODE_ERROR');
        },
      ),
    );
  });

  it('reconstructs REAL values including special values', () => {
    fc.assert(
      fc.property(fc.double(), value => {
        const decoded = real.decodeFromString(real.encodeToString(value).unwrap()).unwrap();
        expect(Object.is(decoded, value)).toBe(true);
      }),
    );
  });

  it('reaches a fixed point on BIT STRING values', () => {
    const bitString = fc
      .uint8Array({ maxLength: 8 })
      .chain(data => fc.record({ data: fc.constant(data), bitLength: fc.integer({ min: 0, max: data.length * 8 }) }));
    fc.assert(
      fc.property(bitString, (value: BitStringValue) => {
        const wire = bits.encodeToJson(value).unwrap();
        const decoded = bits.decodeFromJson(wire).unwrap();
        expect(bits.encodeToJson(decoded).unwrap()).toEqual(wire);
        expect(decoded).toMatchObject({ bitLength: value.bitLength });
      }),
    );
  });

  it('accepts exactly one CHOICE alternative', () => {
    const present = { flag: true, count: 1, nothing: null };
    fc.assert(
      fc.property(fc.subarray<'flag' | 'count' | 'nothing'>(['flag', 'count', 'nothing']), names => {
        const value = Object.fromEntries(names.map(name => [name, present[name]]));
        const result = pick.encodeToJson(value);
        if (names.length === 1) {
          expect(result.unwrap()).toEqual({ [names[0]]: present[names[0]] });
        } else {
          expect(result._tag === 'Err' && result.error.code).toBe('ENCODE_ERROR');
        }
      }),
    );
  });
});
