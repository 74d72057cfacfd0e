import { UnresolvedTypeError } from '../errors';
import type { DescriptorModel, ModuleDescriptor, TypeDescriptor, ValueDescriptor } from './types';

/** A named type together with the module that actually defines it. */
export interface ResolvedType {
  descriptor: TypeDescriptor;
  moduleName: string;
  typeName: string;
}

export interface ResolvedValue {
  descriptor: ValueDescriptor;
  moduleName: string;
}

/** Looks up named types as seen from a given module. */
export interface TypeResolver {
  resolve(typeName: string, moduleName: string): ResolvedType;
  resolveValue(valueName: string, moduleName: string): ResolvedValue;
}

type Section = 'types' | 'values';

/**
 * Default resolver over a descriptor model. A name is looked up in the
 * module itself, then in each module it is imported from, following those
 * modules' own imports in turn.
 */
export class TypeRegistry implements TypeResolver {
  constructor(private readonly model: DescriptorModel) {}

  resolve(typeName: string, moduleName: string): ResolvedType {
    const definingModule = this.findDefiningModule('types', typeName, moduleName, new Set());
    const descriptor = definingModule !== undefined
      ? this.module(definingModule)?.types[typeName]
      : undefined;
    if (definingModule === undefined || descriptor === undefined) {
      throw this.notFound('Type', typeName, moduleName);
    }
    return { descriptor, moduleName: definingModule, typeName };
  }

  resolveValue(valueName: string, moduleName: string): ResolvedValue {
    const definingModule = this.findDefiningModule('values', valueName, moduleName, new Set());
    const descriptor = definingModule !== undefined
      ? this.module(definingModule)?.values?.[valueName]
      : undefined;
    if (definingModule === undefined || descriptor === undefined) {
      throw this.notFound('Value', valueName, moduleName);
    }
    return { descriptor, moduleName: definingModule };
  }

  /** Module names in declaration order. */
  get moduleNames(): string[] {
    return Object.keys(this.model);
  }

  module(moduleName: string): ModuleDescriptor | undefined {
    return Object.hasOwn(this.model, moduleName) ? this.model[moduleName] : undefined;
  }

  private findDefiningModule(
    section: Section,
    name: string,
    moduleName: string,
    visited: Set<string>,
  ): string | undefined {
    // Import cycles are legal between modules; visit each module once.
    if (visited.has(moduleName)) return undefined;
    visited.add(moduleName);

    const module = this.module(moduleName);
    if (!module) return undefined;

    const entries = module[section];
    if (entries && Object.hasOwn(entries, name)) {
      return moduleName;
    }

    for (const [fromModule, names] of Object.entries(module.imports ?? {})) {
      if (!names.includes(name)) continue;
      const found = this.findDefiningModule(section, name, fromModule, visited);
      if (found !== undefined) return found;
    }
    return undefined;
  }

  private notFound(what: 'Type' | 'Value', name: string, moduleName: string): UnresolvedTypeError {
    if (!this.module(moduleName)) {
      return new UnresolvedTypeError(name, moduleName, `Module '${moduleName}' not found.`);
    }
    return new UnresolvedTypeError(
      name,
      moduleName,
      `${what} '${name}' not found in module '${moduleName}' or its imports.`,
    );
  }
}
