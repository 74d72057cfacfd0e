import { createSizeRangeExtractor } from '../descriptor/sizeRange';
import type { SizeRangeExtractor } from '../descriptor/sizeRange';
import { TypeRegistry } from '../descriptor/TypeRegistry';
import type { TypeResolver } from '../descriptor/TypeRegistry';
import { EXTENSION_MARKER, isBuiltinKind } from '../descriptor/types';
import type { DescriptorModel, MemberDescriptor, TypeDescriptor } from '../descriptor/types';
import {
  InvalidDescriptorError,
  RecursionLimitError,
  UnresolvedTypeError,
  UnsupportedExtensionError,
  toJerResult,
} from '../errors';
import type { JerError } from '../errors';
import { assertNever } from '../helpers';
import { err, ok } from '../result';
import type { Result } from '../result';
import { CompiledType } from './CompiledType';
import { NodeArena } from './TypeNode';
import type { EnumeratedNode, Field, NodeId, TypeNode } from './TypeNode';

export interface CompileOptions {
  /** Named-type lookup. Defaults to a {@link TypeRegistry} over the model. */
  resolver?: TypeResolver;
  /** SIZE extraction. Defaults to {@link createSizeRangeExtractor} over the resolver. */
  sizeRange?: SizeRangeExtractor;
  /** Maximum descriptor nesting depth. */
  maxDepth?: number;
}

export const DEFAULT_COMPILE_OPTIONS = Object.freeze({ maxDepth: 256 });

/** Module name to type name to compiled type. */
export type CompiledModules = Record<string, Record<string, CompiledType>>;

export interface CompileFailure {
  moduleName: string;
  typeName: string;
  error: JerError;
}

export interface CompiledModel {
  types: CompiledModules;
  failures: CompileFailure[];
}

/**
 * Compiles descriptor records into a node tree held in one arena.
 *
 * Named types are compiled once per (module, type) and shared. A named
 * type's slot is reserved before its descriptor is compiled, so recursive
 * definitions resolve to the reserved slot instead of recursing.
 */
export class SchemaCompiler {
  readonly arena = new NodeArena();
  private readonly memo = new Map<string, NodeId>();
  /** Memo keys in insertion order, for rolling back a failed compile. */
  private readonly journal: string[] = [];
  private readonly resolver: TypeResolver;
  private readonly sizeRange: SizeRangeExtractor;
  private readonly maxDepth: number;

  constructor(
    private readonly model: DescriptorModel,
    options: CompileOptions = {},
  ) {
    this.resolver = options.resolver ?? new TypeRegistry(model);
    this.sizeRange = options.sizeRange ?? createSizeRangeExtractor(this.resolver);
    this.maxDepth = options.maxDepth ?? DEFAULT_COMPILE_OPTIONS.maxDepth;
  }

  /**
   * Compile the named type `typeName` of `moduleName` from its descriptor.
   * On failure nothing compiled during this call stays memoized.
   */
  compile(moduleName: string, typeName: string, descriptor: TypeDescriptor): NodeId {
    const mark = this.journal.length;
    try {
      return this.compileNamed(moduleName, typeName, descriptor, 0);
    } catch (e) {
      for (const key of this.journal.splice(mark)) {
        this.memo.delete(key);
      }
      throw e;
    }
  }

  /** Compile one top-level type of the model. */
  compileType(moduleName: string, typeName: string): Result<CompiledType, JerError> {
    return toJerResult(() => {
      const module = Object.hasOwn(this.model, moduleName) ? this.model[moduleName] : undefined;
      if (!module || !Object.hasOwn(module.types, typeName)) {
        throw new UnresolvedTypeError(typeName, moduleName);
      }
      const root = this.compile(moduleName, typeName, module.types[typeName]);
      return new CompiledType(moduleName, typeName, this.arena, root);
    });
  }

  /** Compile every type of every module, keeping failures per type. */
  compileAll(): CompiledModel {
    const types: CompiledModules = {};
    const failures: CompileFailure[] = [];
    for (const [moduleName, module] of Object.entries(this.model)) {
      types[moduleName] = {};
      for (const typeName of Object.keys(module.types)) {
        const result = this.compileType(moduleName, typeName);
        if (result._tag === 'Ok') {
          types[moduleName][typeName] = result.value;
        } else {
          failures.push({ moduleName, typeName, error: result.error });
        }
      }
    }
    return { types, failures };
  }

  private compileNamed(
    moduleName: string,
    typeName: string,
    descriptor: TypeDescriptor,
    depth: number,
  ): NodeId {
    const key = JSON.stringify([moduleName, typeName]);
    const existing = this.memo.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const id = this.arena.reserve();
    this.memo.set(key, id);
    this.journal.push(key);

    const node = this.buildNode(descriptor, moduleName, depth);
    this.arena.fill(id, node);
    if (node.kind === '$ref') {
      this.checkAliasChain(id, moduleName, typeName);
    }
    return id;
  }

  private compileInline(descriptor: TypeDescriptor, moduleName: string, depth: number): NodeId {
    return this.arena.add(this.buildNode(descriptor, moduleName, depth));
  }

  private buildNode(descriptor: TypeDescriptor, moduleName: string, depth: number): TypeNode {
    if (depth > this.maxDepth) {
      throw new RecursionLimitError(this.maxDepth);
    }

    const { kind } = descriptor;
    if (!isBuiltinKind(kind)) {
      const resolved = this.resolver.resolve(kind, moduleName);
      const target = this.compileNamed(resolved.moduleName, resolved.typeName, resolved.descriptor, depth + 1);
      return { kind: '$ref', moduleName: resolved.moduleName, typeName: resolved.typeName, target };
    }

    switch (kind) {
      case 'INTEGER':
      case 'REAL':
      case 'BOOLEAN':
      case 'NULL':
      case 'OBJECT IDENTIFIER':
      case 'ANY':
        return { kind };
      case 'ANY DEFINED BY':
        return { kind: 'ANY' };
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
        return { kind };
      case 'ENUMERATED':
        return compileEnumerated(descriptor);
      case 'BIT STRING':
      case 'OCTET STRING':
        return { kind, size: this.sizeRange(descriptor, moduleName) };
      case 'SEQUENCE':
      case 'SET': {
        const { fields, extensible } = this.compileMembers(descriptor, moduleName, depth, false);
        return { kind, fields, extensible };
      }
      case 'CHOICE': {
        const { fields, extensible } = this.compileMembers(descriptor, moduleName, depth, true);
        return { kind, alternatives: fields, extensible };
      }
      case 'SEQUENCE OF':
      case 'SET OF': {
        if (!descriptor.element) {
          throw new InvalidDescriptorError(`${kind} in module '${moduleName}' has no element type.`);
        }
        const size = this.sizeRange(descriptor, moduleName);
        const element = this.compileInline(descriptor.element, moduleName, depth + 1);
        return { kind, element, size };
      }
      default:
        return assertNever(kind);
    }
  }

  /**
   * Member list in declared order. `...` marks the aggregate extensible; no
   * member may follow it. CHOICE alternatives are never optional and never
   * carry a default.
   */
  private compileMembers(
    descriptor: TypeDescriptor,
    moduleName: string,
    depth: number,
    isChoice: boolean,
  ): { fields: Field[]; extensible: boolean } {
    if (!descriptor.members) {
      throw new InvalidDescriptorError(`${descriptor.kind} in module '${moduleName}' has no members.`);
    }

    const fields: Field[] = [];
    const seen = new Set<string>();
    let extensible = false;

    for (const member of descriptor.members) {
      if (member.name === EXTENSION_MARKER) {
        extensible = true;
        continue;
      }
      if (extensible) {
        throw new UnsupportedExtensionError(member.name);
      }
      if (seen.has(member.name)) {
        throw new InvalidDescriptorError(`Duplicate member '${member.name}' in ${descriptor.kind}.`);
      }
      seen.add(member.name);
      fields.push(this.compileMember(member, moduleName, depth, isChoice));
    }

    return { fields, extensible };
  }

  private compileMember(
    member: MemberDescriptor,
    moduleName: string,
    depth: number,
    isChoice: boolean,
  ): Field {
    if (!member.descriptor) {
      throw new InvalidDescriptorError(`Member '${member.name}' has no type descriptor.`);
    }
    const node = this.compileInline(member.descriptor, moduleName, depth + 1);
    if (isChoice) {
      return { name: member.name, node, optional: false, hasDefault: false };
    }
    const hasDefault = member.default !== undefined;
    return {
      name: member.name,
      node,
      optional: member.optional === true,
      hasDefault,
      ...(hasDefault ? { defaultValue: structuredClone(member.default) } : {}),
    };
  }

  /** Reject `A ::= B`, `B ::= A` style chains that never reach a real type. */
  private checkAliasChain(start: NodeId, moduleName: string, typeName: string): void {
    const visited = new Set<NodeId>();
    let id = start;
    while (this.arena.isFilled(id)) {
      const node = this.arena.get(id);
      if (node.kind !== '$ref') return;
      if (visited.has(id)) {
        throw new UnresolvedTypeError(
          typeName,
          moduleName,
          `Type '${typeName}' in module '${moduleName}' is a circular alias with no concrete definition.`,
        );
      }
      visited.add(id);
      id = node.target;
    }
  }
}

function compileEnumerated(descriptor: TypeDescriptor): EnumeratedNode {
  if (!descriptor.values) {
    throw new InvalidDescriptorError('ENUMERATED has no values.');
  }

  const entries: [number, string][] = [];
  let extensible = false;
  for (const [ordinalText, name] of Object.entries(descriptor.values)) {
    if (name === EXTENSION_MARKER) {
      extensible = true;
      continue;
    }
    const ordinal = Number(ordinalText);
    if (!/^-?\d+$/.test(ordinalText) || !Number.isSafeInteger(ordinal)) {
      throw new InvalidDescriptorError(`ENUMERATED ordinal '${ordinalText}' of '${name}' is not an integer.`);
    }
    entries.push([ordinal, name]);
  }
  entries.sort((a, b) => a[0] - b[0]);

  const names = new Map(entries);
  const ordinals = new Map(entries.map(([ordinal, name]) => [name, ordinal] as const));
  if (ordinals.size !== entries.length || names.size !== entries.length) {
    throw new InvalidDescriptorError('ENUMERATED identifiers and ordinals must be unique.');
  }
  return { kind: 'ENUMERATED', ordinals, names, extensible };
}

/**
 * Compile every type of a descriptor model, failing on the first error.
 */
export function compileDict(
  model: DescriptorModel,
  options?: CompileOptions,
): Result<CompiledModules, JerError> {
  const { types, failures } = new SchemaCompiler(model, options).compileAll();
  if (failures.length > 0) {
    return err(failures[0].error);
  }
  return ok(types);
}
