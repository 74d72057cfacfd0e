import type { CharStringKind } from '../descriptor/types';
import type { SizeRange } from '../descriptor/sizeRange';

/** Stable index of a node in its {@link NodeArena}. */
export type NodeId = number;

/** A SEQUENCE/SET member or a CHOICE alternative. */
export interface Field {
  readonly name: string;
  readonly node: NodeId;
  readonly optional: boolean;
  /** True when the member declares a DEFAULT, whatever its value. */
  readonly hasDefault: boolean;
  readonly defaultValue?: unknown;
}

export interface IntegerNode { readonly kind: 'INTEGER' }
export interface RealNode { readonly kind: 'REAL' }
export interface BooleanNode { readonly kind: 'BOOLEAN' }
export interface NullNode { readonly kind: 'NULL' }
export interface ObjectIdentifierNode { readonly kind: 'OBJECT IDENTIFIER' }
export interface AnyNode { readonly kind: 'ANY' }

export interface EnumeratedNode {
  readonly kind: 'ENUMERATED';
  /** Identifier to ordinal. */
  readonly ordinals: ReadonlyMap<string, number>;
  /** Ordinal to identifier. */
  readonly names: ReadonlyMap<number, string>;
  readonly extensible: boolean;
}

export interface CharStringNode { readonly kind: CharStringKind }

export interface BitStringNode {
  readonly kind: 'BIT STRING';
  readonly size: SizeRange;
}

export interface OctetStringNode {
  readonly kind: 'OCTET STRING';
  readonly size: SizeRange;
}

export interface SequenceNode {
  readonly kind: 'SEQUENCE';
  readonly fields: readonly Field[];
  readonly extensible: boolean;
}

export interface SetNode {
  readonly kind: 'SET';
  readonly fields: readonly Field[];
  readonly extensible: boolean;
}

export interface SequenceOfNode {
  readonly kind: 'SEQUENCE OF';
  readonly element: NodeId;
  /** Kept for bit-oriented encodings; the JSON mapping ignores it. */
  readonly size: SizeRange;
}

export interface SetOfNode {
  readonly kind: 'SET OF';
  readonly element: NodeId;
  readonly size: SizeRange;
}

export interface ChoiceNode {
  readonly kind: 'CHOICE';
  readonly alternatives: readonly Field[];
  readonly extensible: boolean;
}

/** A named type, compiled once and shared by every place that names it. */
export interface RefNode {
  readonly kind: '$ref';
  readonly moduleName: string;
  readonly typeName: string;
  readonly target: NodeId;
}

export type TypeNode =
  | IntegerNode
  | RealNode
  | BooleanNode
  | NullNode
  | EnumeratedNode
  | CharStringNode
  | BitStringNode
  | OctetStringNode
  | ObjectIdentifierNode
  | AnyNode
  | SequenceNode
  | SetNode
  | SequenceOfNode
  | SetOfNode
  | ChoiceNode
  | RefNode;

export type TypeNodeKind = TypeNode['kind'];

/**
 * Append-only node storage. A slot may be reserved before its node is
 * built so that recursive types can refer to it; once filled a slot never
 * changes.
 */
export class NodeArena {
  private readonly slots: (TypeNode | undefined)[] = [];

  get size(): number {
    return this.slots.length;
  }

  reserve(): NodeId {
    this.slots.push(undefined);
    return this.slots.length - 1;
  }

  fill(id: NodeId, node: TypeNode): void {
    if (id < 0 || id >= this.slots.length) {
      throw new Error(`Node ${id} was never reserved`);
    }
    if (this.slots[id] !== undefined) {
      throw new Error(`Node ${id} is already filled`);
    }
    this.slots[id] = Object.freeze(node);
  }

  add(node: TypeNode): NodeId {
    const id = this.reserve();
    this.fill(id, node);
    return id;
  }

  isFilled(id: NodeId): boolean {
    return this.slots[id] !== undefined;
  }

  get(id: NodeId): TypeNode {
    const node = this.slots[id];
    if (node === undefined) {
      throw new Error(`Node ${id} is not compiled`);
    }
    return node;
  }
}

/** Human-readable rendering of a node tree; named types print as `Module.Type`. */
export function describeNode(arena: NodeArena, id: NodeId): string {
  const node = arena.get(id);
  switch (node.kind) {
    case 'SEQUENCE':
    case 'SET':
      return `${node.kind} { ${describeFields(arena, node.fields, node.extensible)} }`;
    case 'CHOICE':
      return `CHOICE { ${describeFields(arena, node.alternatives, node.extensible)} }`;
    case 'SEQUENCE OF':
    case 'SET OF':
      return `${node.kind} ${describeNode(arena, node.element)}`;
    case 'ENUMERATED': {
      const values = [...node.names].map(([ordinal, name]) => `${name}(${ordinal})`);
      if (node.extensible) values.push('...');
      return `ENUMERATED { ${values.join(', ')} }`;
    }
    case '$ref':
      return `${node.moduleName}.${node.typeName}`;
    default:
      return node.kind;
  }
}

function describeFields(arena: NodeArena, fields: readonly Field[], extensible: boolean): string {
  const parts = fields.map(field => {
    let text = `${field.name} ${describeNode(arena, field.node)}`;
    if (field.optional) text += ' OPTIONAL';
    if (field.hasDefault) text += ` DEFAULT ${JSON.stringify(field.defaultValue) ?? String(field.defaultValue)}`;
    return text;
  });
  if (extensible) parts.push('...');
  return parts.join(', ');
}
