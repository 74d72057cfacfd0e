import { valuesEqual } from '../helpers';
import type { Field } from '../schema/TypeNode';
import type { TranscodeOptions } from './Codec';

/** Outcome for one member when encoding a SEQUENCE/SET value. */
export type EncodePresence = 'emit' | 'omit' | 'missing';

/** Outcome for one member absent from a SEQUENCE/SET wire object. */
export type DecodeAbsence = 'default' | 'omit' | 'error';

/**
 * Encoding is strict: a required member must be present. A present member
 * equal to its DEFAULT is omitted under the 'omit-default' policy.
 */
export function encodePresence(
  field: Field,
  value: unknown,
  options: Pick<TranscodeOptions, 'defaultElision'>,
): EncodePresence {
  if (value === undefined) {
    return field.optional || field.hasDefault ? 'omit' : 'missing';
  }
  if (
    field.hasDefault &&
    options.defaultElision === 'omit-default' &&
    valuesEqual(value, field.defaultValue)
  ) {
    return 'omit';
  }
  return 'emit';
}

/**
 * Decoding is lenient: an absent OPTIONAL member stays absent (even when it
 * also has a DEFAULT), an absent DEFAULT member takes its default, and an
 * absent required member is left out unless the policy says 'error'.
 */
export function decodeAbsence(
  field: Field,
  options: Pick<TranscodeOptions, 'missingOnDecode'>,
): DecodeAbsence {
  if (field.optional) return 'omit';
  if (field.hasDefault) return 'default';
  return options.missingOnDecode === 'error' ? 'error' : 'omit';
}
