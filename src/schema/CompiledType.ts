import type { TranscodeOptions } from '../codecs/Codec';
import { toJerResult } from '../errors';
import type { JerError } from '../errors';
import { flatMap, map } from '../result';
import type { Result } from '../result';
import { deserialize, parseText, serialize } from '../wire/JsonWire';
import type { JsonValue } from '../wire/JsonWire';
import { Transcoder } from './Transcoder';
import { describeNode } from './TypeNode';
import type { NodeArena, NodeId } from './TypeNode';

/**
 * One compiled top-level type. Encodes native values to JER bytes and
 * decodes them back; failures come back as `Err` results.
 *
 * Instances are immutable and can be shared freely.
 */
export class CompiledType {
  constructor(
    readonly moduleName: string,
    readonly typeName: string,
    private readonly arena: NodeArena,
    readonly root: NodeId,
  ) {}

  /** Encode a value to compact UTF-8 JSON. */
  encode(value: unknown, options?: Partial<TranscodeOptions>): Result<Uint8Array, JerError> {
    return map(this.encodeToJson(value, options), serialize);
  }

  /** Decode UTF-8 JSON bytes. */
  decode(bytes: Uint8Array, options?: Partial<TranscodeOptions>): Result<unknown, JerError> {
    return flatMap(toJerResult(() => deserialize(bytes)), wire => this.decodeFromJson(wire, options));
  }

  /** Encode a value to compact JSON text. */
  encodeToString(value: unknown, options?: Partial<TranscodeOptions>): Result<string, JerError> {
    return map(this.encodeToJson(value, options), wire => JSON.stringify(wire));
  }

  /** Decode JSON text. */
  decodeFromString(text: string, options?: Partial<TranscodeOptions>): Result<unknown, JerError> {
    return flatMap(toJerResult(() => parseText(text)), wire => this.decodeFromJson(wire, options));
  }

  /** Encode a value to the intermediate JSON value without rendering text. */
  encodeToJson(value: unknown, options?: Partial<TranscodeOptions>): Result<JsonValue, JerError> {
    return toJerResult(() => new Transcoder(this.arena, options).encode(this.root, value));
  }

  /** Decode an already parsed JSON value. */
  decodeFromJson(wire: unknown, options?: Partial<TranscodeOptions>): Result<unknown, JerError> {
    return toJerResult(() => new Transcoder(this.arena, options).decode(this.root, wire));
  }

  get qualifiedName(): string {
    return `${this.moduleName}.${this.typeName}`;
  }

  toString(): string {
    return `${this.qualifiedName} ::= ${describeNode(this.arena, this.root)}`;
  }
}
