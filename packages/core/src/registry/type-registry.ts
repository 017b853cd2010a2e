import {
  isEntityType,
  prototypeHierarchy,
  type AttributeDescriptor,
  type EntityType,
  type TypeDescriptor,
  type TypeDescriptorService,
  type TypeHierarchy,
  type TypeResolver,
} from '../types/entity.js';

export interface TypeRegistration {
  /** Registry name; defaults to the constructor name */
  name?: string;
  attributes?: ReadonlyArray<string | AttributeDescriptor>;
}

interface Entry {
  readonly name: string;
  readonly type: EntityType;
  readonly attributes: ReadonlyMap<string, AttributeDescriptor>;
}

export class UnknownTypeError extends Error {
  constructor(public readonly typeName: string) {
    super(`Unknown type: ${typeName}`);
    this.name = 'UnknownTypeError';
  }
}

/**
 * In-memory type metadata keyed by name.
 *
 * Parents follow the JavaScript class hierarchy: a registered class whose
 * constructor extends another registered class gets that class's
 * descriptor as parent. Unregistered intermediate classes are skipped.
 */
export class TypeRegistry
  implements TypeDescriptorService, TypeResolver, TypeHierarchy
{
  readonly #byName = new Map<string, Entry>();
  readonly #byType = new Map<EntityType, Entry>();
  readonly #descriptors = new Map<EntityType, TypeDescriptor>();

  register(type: EntityType, registration: TypeRegistration = {}): this {
    const name = registration.name ?? type.name;
    const attributes = new Map<string, AttributeDescriptor>();
    for (const attribute of registration.attributes ?? []) {
      const descriptor =
        typeof attribute === 'string' ? { name: attribute } : attribute;
      attributes.set(descriptor.name, descriptor);
    }
    const entry: Entry = { name, type, attributes };
    this.#byName.set(name, entry);
    this.#byType.set(type, entry);
    this.#descriptors.clear();
    return this;
  }

  has(typeName: string): boolean {
    return this.#byName.has(typeName);
  }

  resolve(typeName: string): EntityType {
    const entry = this.#byName.get(typeName);
    if (entry === undefined) {
      throw new UnknownTypeError(typeName);
    }
    return entry.type;
  }

  nameOf(type: EntityType): string | undefined {
    return this.#byType.get(type)?.name;
  }

  describe(type: EntityType): TypeDescriptor | undefined {
    const cached = this.#descriptors.get(type);
    if (cached !== undefined) return cached;

    const entry = this.#byType.get(type);
    if (entry === undefined) return undefined;

    const parentType = this.#registeredParent(type);
    const descriptor: TypeDescriptor = {
      type,
      parent: parentType === undefined ? undefined : this.describe(parentType),
      attributes: entry.attributes,
      isInstance: (value) => value instanceof type,
    };
    this.#descriptors.set(type, descriptor);
    return descriptor;
  }

  isAssignableFrom(superType: EntityType, subType: EntityType): boolean {
    return prototypeHierarchy.isAssignableFrom(superType, subType);
  }

  #registeredParent(type: EntityType): EntityType | undefined {
    let current: unknown = Object.getPrototypeOf(type);
    while (isEntityType(current)) {
      if (this.#byType.has(current)) return current;
      current = Object.getPrototypeOf(current);
    }
    return undefined;
  }
}

/** Attribute descriptor of `name` on the type or its ancestors */
export function findAttribute(
  descriptor: TypeDescriptor,
  name: string
): AttributeDescriptor | undefined {
  let current: TypeDescriptor | undefined = descriptor;
  while (current !== undefined) {
    const found = current.attributes?.get(name);
    if (found !== undefined) return found;
    current = current.parent;
  }
  return undefined;
}
