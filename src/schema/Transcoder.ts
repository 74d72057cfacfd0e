import { AnyCodec } from '../codecs/AnyCodec';
import { BitStringCodec } from '../codecs/BitStringCodec';
import { BooleanCodec } from '../codecs/BooleanCodec';
import { CharStringCodec } from '../codecs/CharStringCodec';
import { ChoiceCodec } from '../codecs/ChoiceCodec';
import { DEFAULT_TRANSCODE_OPTIONS } from '../codecs/Codec';
import type { TranscodeContext, TranscodeOptions } from '../codecs/Codec';
import { EnumeratedCodec } from '../codecs/EnumeratedCodec';
import { IntegerCodec } from '../codecs/IntegerCodec';
import { NullCodec } from '../codecs/NullCodec';
import { ObjectIdentifierCodec } from '../codecs/ObjectIdentifierCodec';
import { OctetStringCodec } from '../codecs/OctetStringCodec';
import { RealCodec } from '../codecs/RealCodec';
import { SequenceCodec } from '../codecs/SequenceCodec';
import { SequenceOfCodec } from '../codecs/SequenceOfCodec';
import { RecursionLimitError } from '../errors';
import { assertNever } from '../helpers';
import type { JsonValue } from '../wire/JsonWire';
import type { NodeArena, NodeId } from './TypeNode';

const anyCodec = new AnyCodec();
const bitStringCodec = new BitStringCodec();
const booleanCodec = new BooleanCodec();
const charStringCodec = new CharStringCodec();
const choiceCodec = new ChoiceCodec();
const enumeratedCodec = new EnumeratedCodec();
const integerCodec = new IntegerCodec();
const nullCodec = new NullCodec();
const objectIdentifierCodec = new ObjectIdentifierCodec();
const octetStringCodec = new OctetStringCodec();
const realCodec = new RealCodec();
const sequenceCodec = new SequenceCodec();
const sequenceOfCodec = new SequenceOfCodec();

/**
 * Walks a compiled node tree against one value. Holds the position of the
 * walk, so each encode or decode call gets its own instance; the arena is
 * only read.
 */
export class Transcoder implements TranscodeContext {
  readonly options: Readonly<TranscodeOptions>;
  private readonly segments: (string | number)[] = [];

  constructor(
    private readonly arena: NodeArena,
    options: Partial<TranscodeOptions> = {},
  ) {
    this.options = { ...DEFAULT_TRANSCODE_OPTIONS, ...options };
  }

  get path(): string {
    return this.segments
      .map(segment => '/' + String(segment).replace(/~/g, '~0').replace(/\//g, '~1'))
      .join('');
  }

  encode(id: NodeId, value: unknown): JsonValue {
    const node = this.arena.get(id);
    switch (node.kind) {
      case 'INTEGER':
        return integerCodec.encode(node, value, this);
      case 'REAL':
        return realCodec.encode(node, value, this);
      case 'BOOLEAN':
        return booleanCodec.encode(node, value, this);
      case 'NULL':
        return nullCodec.encode(node, value, this);
      case 'ENUMERATED':
        return enumeratedCodec.encode(node, value, this);
      case 'IA5String':
      case 'NumericString':
      case 'PrintableString':
      case 'VisibleString':
      case 'UTF8String':
      case 'BMPString':
      case 'UniversalString':
      case 'TeletexString':
      case 'UTCTime':
      case 'GeneralizedTime':
        return charStringCodec.encode(node, value, this);
      case 'BIT STRING':
        return bitStringCodec.encode(node, value, this);
      case 'OCTET STRING':
        return octetStringCodec.encode(node, value, this);
      case 'OBJECT IDENTIFIER':
        return objectIdentifierCodec.encode(node, value, this);
      case 'ANY':
        return anyCodec.encode(node, value, this);
      case 'SEQUENCE':
      case 'SET':
        return sequenceCodec.encode(node, value, this);
      case 'SEQUENCE OF':
      case 'SET OF':
        return sequenceOfCodec.encode(node, value, this);
      case 'CHOICE':
        return choiceCodec.encode(node, value, this);
      case '$ref':
        return this.encode(node.target, value);
      default:
        return assertNever(node);
    }
  }

  decode(id: NodeId, wire: unknown): unknown {
    const node = this.arena.get(id);
    switch (node.kind) {
      case 'INTEGER':
        return integerCodec.decode(node, wire, this);
      case 'REAL':
        return realCodec.decode(node, wire, this);
      case 'BOOLEAN':
        return booleanCodec.decode(node, wire, this);
      case 'NULL':
        return nullCodec.decode(node, wire, this);
      case 'ENUMERATED':
        return enumeratedCodec.decode(node, wire, this);
      case 'IA5String':
      case 'NumericString':
      case 'PrintableString':
      case 'VisibleString':
      case 'UTF8String':
      case 'BMPString':
      case 'UniversalString':
      case 'TeletexString':
      case 'UTCTime':
      case 'GeneralizedTime':
        return charStringCodec.decode(node, wire, this);
      case 'BIT STRING':
        return bitStringCodec.decode(node, wire, this);
      case 'OCTET STRING':
        return octetStringCodec.decode(node, wire, this);
      case 'OBJECT IDENTIFIER':
        return objectIdentifierCodec.decode(node, wire, this);
      case 'ANY':
        return anyCodec.decode(node, wire, this);
      case 'SEQUENCE':
      case 'SET':
        return sequenceCodec.decode(node, wire, this);
      case 'SEQUENCE OF':
      case 'SET OF':
        return sequenceOfCodec.decode(node, wire, this);
      case 'CHOICE':
        return choiceCodec.decode(node, wire, this);
      case '$ref':
        return this.decode(node.target, wire);
      default:
        return assertNever(node);
    }
  }

  encodeChild(id: NodeId, value: unknown, key: string | number): JsonValue {
    this.enter(key);
    try {
      return this.encode(id, value);
    } finally {
      this.segments.pop();
    }
  }

  decodeChild(id: NodeId, wire: unknown, key: string | number): unknown {
    this.enter(key);
    try {
      return this.decode(id, wire);
    } finally {
      this.segments.pop();
    }
  }

  private enter(key: string | number): void {
    if (this.segments.length >= this.options.maxDepth) {
      throw new RecursionLimitError(this.options.maxDepth, this.path);
    }
    this.segments.push(key);
  }
}
