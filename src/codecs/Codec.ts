import type { NodeId, TypeNode } from '../schema/TypeNode';
import type { JsonValue } from '../wire/JsonWire';

/**
 * Whether a SEQUENCE/SET member equal to its DEFAULT is left out of the
 * encoding ('omit-default') or written like any other value ('emit-all').
 */
export type DefaultElisionPolicy = 'omit-default' | 'emit-all';

/**
 * What decoding does with a required member missing from the wire:
 * leave it out of the result ('omit') or fail ('error').
 */
export type MissingFieldDecodePolicy = 'omit' | 'error';

export interface TranscodeOptions {
  defaultElision: DefaultElisionPolicy;
  missingOnDecode: MissingFieldDecodePolicy;
  /** Maximum value nesting depth before a RecursionLimitError. */
  maxDepth: number;
}

export const DEFAULT_TRANSCODE_OPTIONS: Readonly<TranscodeOptions> = Object.freeze({
  defaultElision: 'omit-default',
  missingOnDecode: 'omit',
  maxDepth: 256,
});

/** What a codec sees of the walk it is part of. */
export interface TranscodeContext {
  readonly options: Readonly<TranscodeOptions>;
  /** JSON pointer of the value being processed. */
  readonly path: string;
  encodeChild(node: NodeId, value: unknown, key: string | number): JsonValue;
  decodeChild(node: NodeId, wire: unknown, key: string | number): unknown;
}

/**
 * JSON mapping for one node variant.
 * @template N The node variant(s) this codec handles.
 */
export interface Codec<N extends TypeNode> {
  /** Map a native value to its wire form. Throws EncodeError on a bad value. */
  encode(node: N, value: unknown, ctx: TranscodeContext): JsonValue;

  /** Map a wire value back to native form. Throws DecodeError on a bad value. */
  decode(node: N, wire: unknown, ctx: TranscodeContext): unknown;
}
