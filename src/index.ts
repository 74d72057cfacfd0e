export type { Codec, TranscodeContext, TranscodeOptions, DefaultElisionPolicy, MissingFieldDecodePolicy } from './codecs/Codec';
export { DEFAULT_TRANSCODE_OPTIONS } from './codecs/Codec';
export { IntegerCodec } from './codecs/IntegerCodec';
export { RealCodec } from './codecs/RealCodec';
export { BooleanCodec } from './codecs/BooleanCodec';
export { NullCodec } from './codecs/NullCodec';
export { EnumeratedCodec } from './codecs/EnumeratedCodec';
export { CharStringCodec } from './codecs/CharStringCodec';
export { BitStringCodec } from './codecs/BitStringCodec';
export type { BitStringValue } from './codecs/BitStringCodec';
export { OctetStringCodec } from './codecs/OctetStringCodec';
export { ObjectIdentifierCodec, checkOid } from './codecs/ObjectIdentifierCodec';
export { AnyCodec } from './codecs/AnyCodec';
export { SequenceCodec } from './codecs/SequenceCodec';
export { SequenceOfCodec } from './codecs/SequenceOfCodec';
export { ChoiceCodec } from './codecs/ChoiceCodec';
export { encodePresence, decodeAbsence } from './codecs/fieldPolicy';
export type { EncodePresence, DecodeAbsence } from './codecs/fieldPolicy';
export { SchemaCompiler, compileDict, DEFAULT_COMPILE_OPTIONS } from './schema/SchemaCompiler';
export type { CompileOptions, CompiledModules, CompiledModel, CompileFailure } from './schema/SchemaCompiler';
export { CompiledType } from './schema/CompiledType';
export { Transcoder } from './schema/Transcoder';
export { NodeArena, describeNode } from './schema/TypeNode';
export type { NodeId, TypeNode, TypeNodeKind, Field } from './schema/TypeNode';
export { TypeRegistry } from './descriptor/TypeRegistry';
export type { TypeResolver, ResolvedType, ResolvedValue } from './descriptor/TypeRegistry';
export { createSizeRangeExtractor } from './descriptor/sizeRange';
export type { SizeRange, SizeRangeExtractor } from './descriptor/sizeRange';
export { loadDescriptorModel, parseDescriptorModel, DESCRIPTOR_MODEL_SCHEMA } from './descriptor/loadDescriptorModel';
export { BUILTIN_KINDS, CHAR_STRING_KINDS, EXTENSION_MARKER, isBuiltinKind } from './descriptor/types';
export type {
  DescriptorModel,
  ModuleDescriptor,
  TypeDescriptor,
  MemberDescriptor,
  ValueDescriptor,
  SizeDescriptor,
  SizeBound,
  BuiltinKind,
  CharStringKind,
} from './descriptor/types';
export { serialize, deserialize, parseText, isJsonValue } from './wire/JsonWire';
export type { JsonValue } from './wire/JsonWire';
export {
  JerError,
  UnresolvedTypeError,
  UnsupportedExtensionError,
  InvalidDescriptorError,
  EncodeError,
  MissingRequiredFieldError,
  DecodeError,
  MalformedWireError,
  RecursionLimitError,
  toJerResult,
} from './errors';
export type { JerErrorCode } from './errors';
export { Ok, Err, ok, err, map, mapErr, flatMap } from './result';
export type { Result } from './result';
