import { createSizeRangeExtractor } from '../../src/descriptor/sizeRange';
import { TypeRegistry } from '../../src/descriptor/TypeRegistry';
import type { DescriptorModel } from '../../src/descriptor/types';
import { InvalidDescriptorError, UnresolvedTypeError } from '../../src/errors';

describe('createSizeRangeExtractor', () => {
  const model: DescriptorModel = {
    M: {
      types: {},
      values: {
        ub: { kind: 'INTEGER', value: 16 },
        label: { kind: 'IA5String', value: 'sixteen' },
        negative: { kind: 'INTEGER', value: -1 },
      },
    },
  };
  const sizeRange = createSizeRangeExtractor(new TypeRegistry(model));

  it('is unconstrained without a size', () => {
    expect(sizeRange({ kind: 'OCTET STRING' }, 'M')).toEqual({});
  });

  it('maps a fixed size to equal bounds', () => {
    expect(sizeRange({ kind: 'OCTET STRING', size: 4 }, 'M')).toEqual({ min: 4, max: 4 });
  });

  it('maps a range', () => {
    expect(sizeRange({ kind: 'BIT STRING', size: [1, 8] }, 'M')).toEqual({ min: 1, max: 8 });
  });

  it('leaves MIN and MAX unbounded', () => {
    expect(sizeRange({ kind: 'SEQUENCE OF', size: ['MIN', 'MAX'] }, 'M')).toEqual({
      min: undefined,
      max: undefined,
    });
  });

  it('resolves named bounds', () => {
    expect(sizeRange({ kind: 'SEQUENCE OF', size: [0, 'ub'] }, 'M')).toEqual({ min: 0, max: 16 });
  });

  it('rejects bounds that are not non-negative integers', () => {
    expect(() => sizeRange({ kind: 'OCTET STRING', size: [0, 'label'] }, 'M')).toThrow(
      "Size bound 'label' is not an integer value.",
    );
    expect(() => sizeRange({ kind: 'OCTET STRING', size: [0, 'negative'] }, 'M')).toThrow(
      InvalidDescriptorError,
    );
    expect(() => sizeRange({ kind: 'OCTET STRING', size: 1.5 }, 'M')).toThrow(
      "Size bound '1.5' must be a non-negative integer.",
    );
  });

  it('fails on unknown named bounds', () => {
    expect(() => sizeRange({ kind: 'OCTET STRING', size: [0, 'missing'] }, 'M')).toThrow(UnresolvedTypeError);
  });
});
