/**
 * Descriptor records for parsed ASN.1 modules. These come from a schema
 * front end and are read-only input to the compiler.
 */

/** A descriptor model: module name to module contents. */
export type DescriptorModel = Readonly<Record<string, ModuleDescriptor>>;

export interface ModuleDescriptor {
  /** Type assignments: `TypeName ::= Type`. */
  readonly types: Readonly<Record<string, TypeDescriptor>>;
  /** Value assignments, used to resolve named size bounds. */
  readonly values?: Readonly<Record<string, ValueDescriptor>>;
  /** Imported module name to the type names imported from it. */
  readonly imports?: Readonly<Record<string, readonly string[]>>;
}

export interface ValueDescriptor {
  /** Type of the value, e.g. `INTEGER`. */
  readonly kind: string;
  readonly value: unknown;
}

/**
 * One ASN.1 type occurrence. `kind` is a built-in keyword (see
 * {@link BUILTIN_KINDS}); any other string names a type to be resolved
 * in the owning module and its imports.
 */
export interface TypeDescriptor {
  readonly kind: string;
  /** SEQUENCE, SET and CHOICE members in declared order. */
  readonly members?: readonly MemberDescriptor[];
  /** SEQUENCE OF and SET OF element type. */
  readonly element?: TypeDescriptor;
  /** ENUMERATED ordinal (as a decimal string) to identifier. */
  readonly values?: Readonly<Record<string, string>>;
  readonly size?: SizeDescriptor;
}

/**
 * A SEQUENCE/SET/CHOICE member. The member named `...` is the extension
 * marker and has no descriptor.
 */
export interface MemberDescriptor {
  readonly name: string;
  readonly descriptor?: TypeDescriptor;
  readonly optional?: boolean;
  /** DEFAULT value, in native form. The key's presence is what counts. */
  readonly default?: unknown;
}

/** `MIN`, `MAX`, an integer, or the name of an integer value assignment. */
export type SizeBound = number | string;

/** `SIZE (n)` or `SIZE (lower..upper)`. */
export type SizeDescriptor = number | readonly [SizeBound, SizeBound];

export const EXTENSION_MARKER = '...';

export const CHAR_STRING_KINDS = [
  'IA5String',
  'NumericString',
  'PrintableString',
  'VisibleString',
  'UTF8String',
  'BMPString',
  'UniversalString',
  'TeletexString',
  'UTCTime',
  'GeneralizedTime',
] as const;

export type CharStringKind = (typeof CHAR_STRING_KINDS)[number];

export const BUILTIN_KINDS = [
  'INTEGER',
  'REAL',
  'BOOLEAN',
  'NULL',
  'ENUMERATED',
  ...CHAR_STRING_KINDS,
  'BIT STRING',
  'OCTET STRING',
  'OBJECT IDENTIFIER',
  'ANY',
  'ANY DEFINED BY',
  'SEQUENCE',
  'SET',
  'SEQUENCE OF',
  'SET OF',
  'CHOICE',
] as const;

export type BuiltinKind = (typeof BUILTIN_KINDS)[number];

const BUILTIN_KIND_SET: ReadonlySet<string> = new Set(BUILTIN_KINDS);

export function isBuiltinKind(kind: string): kind is BuiltinKind {
  return BUILTIN_KIND_SET.has(kind);
}
