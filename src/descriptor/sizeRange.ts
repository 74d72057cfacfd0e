import { InvalidDescriptorError } from '../errors';
import type { TypeResolver } from './TypeRegistry';
import type { SizeBound, TypeDescriptor } from './types';

/** Declared SIZE range. An undefined bound is unconstrained (MIN/MAX or absent). */
export interface SizeRange {
  min?: number;
  max?: number;
}

export type SizeRangeExtractor = (descriptor: TypeDescriptor, moduleName: string) => SizeRange;

/**
 * Build the default SIZE extractor. Named bounds are resolved as integer
 * value assignments through the given resolver.
 */
export function createSizeRangeExtractor(resolver: TypeResolver): SizeRangeExtractor {
  function bound(value: SizeBound, moduleName: string): number | undefined {
    if (typeof value === 'number') {
      return checkInteger(value, String(value));
    }
    if (value === 'MIN' || value === 'MAX') {
      return undefined;
    }
    const resolved = resolver.resolveValue(value, moduleName);
    const raw = resolved.descriptor.value;
    if (typeof raw !== 'number') {
      throw new InvalidDescriptorError(`Size bound '${value}' is not an integer value.`);
    }
    return checkInteger(raw, value);
  }

  return (descriptor, moduleName) => {
    const { size } = descriptor;
    if (size === undefined) {
      return {};
    }
    if (typeof size === 'number') {
      const fixed = checkInteger(size, String(size));
      return { min: fixed, max: fixed };
    }
    return { min: bound(size[0], moduleName), max: bound(size[1], moduleName) };
  };
}

function checkInteger(value: number, label: string): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidDescriptorError(`Size bound '${label}' must be a non-negative integer.`);
  }
  return value;
}
