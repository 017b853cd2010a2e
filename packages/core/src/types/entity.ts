/**
 * Collaborator contracts the attribute group model depends on.
 * None of them are implemented by the model itself; TypeRegistry in
 * registry/type-registry.ts is the in-memory implementation.
 */

/**
 * Runtime handle of a modeled type. Class constructors satisfy it and are
 * compared by identity.
 */
export type EntityType = abstract new (...args: never[]) => unknown;

/**
 * Key of a per-type nested group: the live type once resolved, otherwise
 * the deferred type name.
 */
export type TypeKey = EntityType | string;

export interface AttributeDescriptor {
  readonly name: string;
  /** Type reached through the attribute (relationship target / element type) */
  readonly target?: EntityType;
  /** Key type of a map-valued attribute */
  readonly keyTarget?: EntityType;
}

/**
 * Metadata of one level of the modeled inheritance hierarchy
 */
export interface TypeDescriptor {
  readonly type: EntityType;
  /** Inheritance parent, undefined at the hierarchy root */
  readonly parent: TypeDescriptor | undefined;
  /** Attributes declared on this level only */
  readonly attributes?: ReadonlyMap<string, AttributeDescriptor>;
  isInstance(value: unknown): boolean;
}

export interface TypeDescriptorService {
  describe(type: EntityType): TypeDescriptor | undefined;
}

/**
 * Resolves a persisted type name into a live type; throws when unknown.
 */
export interface TypeResolver {
  resolve(typeName: string): EntityType;
}

export interface TypeHierarchy {
  /** True when subType is superType or inherits from it */
  isAssignableFrom(superType: EntityType, subType: EntityType): boolean;
}

/**
 * Original instance → already produced copy, shared by one copy session
 */
export type CopyRegistry = Map<object, object>;

export function isEntityType(value: unknown): value is EntityType {
  return typeof value === 'function' && value !== Function.prototype;
}

/**
 * Hierarchy of class constructors: `class B extends A` links B's
 * constructor prototype to A.
 */
export const prototypeHierarchy: TypeHierarchy = {
  isAssignableFrom(superType, subType) {
    let current: unknown = subType;
    while (isEntityType(current)) {
      if (current === superType) return true;
      current = Object.getPrototypeOf(current);
    }
    return false;
  },
};

export function typeNameOf(key: TypeKey): string {
  return typeof key === 'string' ? key : key.name;
}
