import { AttributeItem } from './attribute-item.js';
import { parseAttributePath, type AttributePath } from './path.js';
import {
  GENERIC_VARIANT,
  duplicateVariant,
  type GroupKind,
  type GroupVariant,
  type VariantOf,
} from './variant.js';
import { isSupersetOf } from '../compare/superset.js';
import { groupsEqual } from '../compare/equality.js';
import {
  cloneGroup,
  toCopyGroup,
  toFetchGroup,
  toLoadGroup,
  type SpecializeOptions,
} from '../transform/specialize.js';
import { TypeResolutionError } from '../types/errors.js';
import {
  prototypeHierarchy,
  type CopyRegistry,
  type EntityType,
  type TypeDescriptor,
  type TypeHierarchy,
  type TypeKey,
  type TypeResolver,
} from '../types/entity.js';
import type { DiagnosticSink } from '../diag/sink.js';

export interface GroupInit {
  type?: EntityType;
  /** Deferred type name, e.g. after restoring a persisted description */
  typeName?: string;
  validated?: boolean;
  variant?: GroupVariant;
}

export type SpecializedGroup<K extends GroupKind> = AttributeGroup & {
  readonly variant: VariantOf<K>;
};
export type FetchGroup = SpecializedGroup<'fetch'>;
export type LoadGroup = SpecializedGroup<'load'>;
export type CopyGroup = SpecializedGroup<'copy'>;

const KIND_LABELS: Record<GroupKind, string> = {
  generic: 'AttributeGroup',
  fetch: 'FetchGroup',
  load: 'LoadGroup',
  copy: 'CopyGroup',
};

const EMPTY_ITEMS: ReadonlyMap<string, AttributeItem> = new Map();

/**
 * A named set of attributes of one type level, with nested groups for
 * attributes reached through relationships.
 *
 * Attribute paths use dot notation:
 *
 * ```ts
 * const group = new AttributeGroup('summary');
 * group.addAttribute('firstName');
 * group.addAttribute('manager.address.city');
 * ```
 *
 * The super-group chain must be acyclic. Reads fall back to the super group;
 * writes always land on this group.
 */
export class AttributeGroup {
  /** Display/lookup label; no effect on comparisons */
  name: string;
  type: EntityType | undefined;
  typeName: string | undefined;
  superGroup: AttributeGroup | undefined;
  subGroups: Set<AttributeGroup> | undefined;
  owningItem: AttributeItem | undefined;
  /** Already checked against attribute metadata */
  validated: boolean;
  readonly variant: GroupVariant;

  #items: Map<string, AttributeItem> | undefined;

  constructor(name = '', init: GroupInit = {}) {
    this.name = name;
    this.type = init.type;
    this.typeName = init.typeName ?? init.type?.name;
    this.validated = init.validated ?? false;
    this.variant = init.variant ?? GENERIC_VARIANT;
  }

  get kind(): GroupKind {
    return this.variant.kind;
  }

  /** Key under which an owning item files this group per type */
  get typeKey(): TypeKey | undefined {
    return this.type ?? this.typeName;
  }

  protected newItem(attributeName: string): AttributeItem {
    return new AttributeItem(this, attributeName);
  }

  /** Nested groups created for path segments keep this group's variant. */
  protected newGroup(attributeName: string): AttributeGroup {
    return new AttributeGroup(attributeName, {
      variant: duplicateVariant(this.variant),
    });
  }

  // ---------------------------------------------------------------------------
  // Items
  // ---------------------------------------------------------------------------

  hasItems(): boolean {
    return this.#items !== undefined && this.#items.size > 0;
  }

  getItems(): ReadonlyMap<string, AttributeItem> {
    return this.#items ?? EMPTY_ITEMS;
  }

  /** Super-group items overlaid with the local ones */
  getAllItems(): Map<string, AttributeItem> {
    const all = new Map<string, AttributeItem>(
      this.superGroup ? this.superGroup.getAllItems() : []
    );
    for (const [name, item] of this.getItems()) {
      all.set(name, item);
    }
    return all;
  }

  /**
   * File an item under its attribute name, replacing any previous entry.
   * Used by the clone drivers and description restore.
   */
  adoptItem(item: AttributeItem): void {
    item.owner = this;
    this.#ensureItems().set(item.attributeName, item);
  }

  #ensureItems(): Map<string, AttributeItem> {
    if (this.#items === undefined) {
      this.#items = new Map();
    }
    return this.#items;
  }

  hasInheritance(): boolean {
    return (
      (this.subGroups !== undefined && this.subGroups.size > 0) ||
      this.superGroup !== undefined
    );
  }

  // ---------------------------------------------------------------------------
  // Path resolution
  // ---------------------------------------------------------------------------

  /**
   * Walk the path one segment at a time.
   *
   * With `create` every missing item and intermediate group is materialised
   * locally. Without it, a missing item defers the whole path to the super
   * group, and an item without the nested group a longer path needs yields
   * undefined.
   *
   * @throws InvalidPathError before anything is touched
   */
  resolveItem(
    attributeNameOrPath: string | readonly string[],
    create = false
  ): AttributeItem | undefined {
    const path = parseAttributePath(attributeNameOrPath);
    return create ? this.#materialise(path) : this.#resolve(path);
  }

  getItem(
    attributeNameOrPath: string | readonly string[]
  ): AttributeItem | undefined {
    return this.resolveItem(attributeNameOrPath, false);
  }

  #resolve(path: AttributePath): AttributeItem | undefined {
    let current: AttributeGroup = this;
    let item: AttributeItem | undefined;
    const last = path.length - 1;

    for (const [index, attributeName] of path.entries()) {
      item = current.#items?.get(attributeName);
      if (item === undefined) {
        const superGroup = this.superGroup;
        return superGroup === undefined ? undefined : superGroup.#resolve(path);
      }
      if (index < last) {
        const next = item.group;
        if (next === undefined) return undefined;
        current = next;
      }
    }
    return item;
  }

  #materialise(path: AttributePath): AttributeItem {
    let current: AttributeGroup = this;
    for (const attributeName of path.slice(0, -1)) {
      const item = current.#materialiseItem(attributeName);
      let next = item.group;
      if (next === undefined) {
        next = current.newGroup(attributeName);
        item.setRootGroup(next);
      }
      current = next;
    }
    return current.#materialiseItem(path[path.length - 1]);
  }

  #materialiseItem(attributeName: string): AttributeItem {
    let item = this.#items?.get(attributeName);
    if (item === undefined) {
      item = this.newItem(attributeName);
      this.#ensureItems().set(attributeName, item);
    }
    return item;
  }

  // ---------------------------------------------------------------------------
  // Containment & lookup
  // ---------------------------------------------------------------------------

  containsAttribute(attributeNameOrPath: string | readonly string[]): boolean {
    const path = parseAttributePath(attributeNameOrPath);
    if (this.#resolve(path) !== undefined) {
      return true;
    }
    if (this.hasInheritance() && this.superGroup !== undefined) {
      return this.superGroup.containsAttribute(path);
    }
    return false;
  }

  /** Single local name, no path parsing */
  containsAttributeLocal(attributeName: string): boolean {
    if (this.#items?.has(attributeName)) {
      return true;
    }
    return this.superGroup?.containsAttributeLocal(attributeName) ?? false;
  }

  /** Nested group reached by the path, falling back to the super group */
  getGroup(
    attributeNameOrPath: string | readonly string[]
  ): AttributeGroup | undefined {
    const path = parseAttributePath(attributeNameOrPath);
    const item = this.#resolve(path);
    if (item !== undefined) {
      return item.group;
    }
    return this.superGroup?.getGroup(path);
  }

  allAttributeNames(): Set<string> {
    const names = new Set<string>();
    if (this.superGroup !== undefined && this.superGroup !== this) {
      for (const name of this.superGroup.allAttributeNames()) {
        names.add(name);
      }
    }
    for (const name of this.getItems().keys()) {
      names.add(name);
    }
    return names;
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  /**
   * Add an attribute or nested attribute path. A passed group (or several,
   * one per subtype) becomes the nested specification of the leaf,
   * overriding the current one for the same type.
   */
  addAttribute(
    attributeNameOrPath: string | readonly string[],
    group?: AttributeGroup | Iterable<AttributeGroup>
  ): void {
    const item = this.#materialise(parseAttributePath(attributeNameOrPath));
    if (group === undefined) return;
    if (group instanceof AttributeGroup) {
      item.addSubGroup(group);
    } else {
      item.addGroups(group);
    }
  }

  /** Add the nested specification of a map-valued attribute's key */
  addAttributeKey(
    attributeNameOrPath: string | readonly string[],
    group: AttributeGroup | Iterable<AttributeGroup>
  ): void {
    const item = this.#materialise(parseAttributePath(attributeNameOrPath));
    if (group instanceof AttributeGroup) {
      item.addKeyGroup(group);
    } else {
      item.addKeyGroups(group);
    }
  }

  addAttributes(attributeNamesOrPaths: Iterable<string>): void {
    for (const path of attributeNamesOrPaths) {
      this.addAttribute(path);
    }
  }

  setAttributeNames(attributeNamesOrPaths: Iterable<string>): void {
    this.addAttributes(attributeNamesOrPaths);
  }

  /** Remove the leaf item of the path from the group that declares it */
  removeAttribute(attributeNameOrPath: string | readonly string[]): void {
    const item = this.getItem(attributeNameOrPath);
    if (item !== undefined) {
      item.owner.#items?.delete(item.attributeName);
    }
  }

  // ---------------------------------------------------------------------------
  // Inheritance
  // ---------------------------------------------------------------------------

  /**
   * Group of this attribute level that applies to the concrete type
   * described. Falls back to this group when nothing more specific exists.
   */
  findGroup(descriptor: TypeDescriptor): AttributeGroup {
    if (this.type === undefined || this.type === descriptor.type) {
      return this;
    }
    if (this.hasInheritance()) {
      let current: TypeDescriptor | undefined = descriptor;
      while (current !== undefined) {
        const found = this.#groupForType(current.type);
        if (found !== undefined) {
          return found;
        }
        current = current.parent;
      }
    }
    return this;
  }

  #groupForType(type: EntityType): AttributeGroup | undefined {
    if (this.owningItem !== undefined) {
      return (
        this.owningItem.getGroup(type) ?? this.owningItem.getGroup(type.name)
      );
    }
    // Root groups have no owning item; search the subclass tree instead.
    const root = this.#hierarchyRoot();
    return findInSubclassTree(root, type, new Set());
  }

  #hierarchyRoot(): AttributeGroup {
    const seen = new Set<AttributeGroup>();
    let current: AttributeGroup = this;
    while (current.superGroup !== undefined && !seen.has(current)) {
      seen.add(current);
      current = current.superGroup;
    }
    return current;
  }

  /**
   * Link `group` directly beneath this one. Existing subclass groups whose
   * type derives from `group`'s type are re-parented under `group`, so the
   * tree stays ordered by specificity whatever the insertion order.
   */
  insertSubclass(
    group: AttributeGroup,
    hierarchy: TypeHierarchy = prototypeHierarchy
  ): void {
    if (group === this) {
      return;
    }
    group.superGroup = this;
    if (this.subGroups === undefined) {
      this.subGroups = new Set();
    } else {
      const groupType = group.type;
      for (const subClass of [...this.subGroups]) {
        if (
          subClass !== group &&
          groupType !== undefined &&
          subClass.type !== undefined &&
          hierarchy.isAssignableFrom(groupType, subClass.type)
        ) {
          if (group.subGroups === undefined) {
            group.subGroups = new Set();
          }
          group.subGroups.add(subClass);
          subClass.superGroup = group;
          this.subGroups.delete(subClass);
        }
      }
    }
    this.subGroups.add(group);
  }

  /**
   * Materialise deferred type names into live types for the whole tree.
   *
   * @throws TypeResolutionError carrying the name and the resolver's cause
   */
  resolveTypes(
    resolver: TypeResolver,
    visited: Set<AttributeGroup> = new Set()
  ): void {
    if (visited.has(this)) return;
    visited.add(this);

    if (this.type === undefined && this.typeName !== undefined) {
      try {
        this.type = resolver.resolve(this.typeName);
      } catch (error) {
        throw new TypeResolutionError(
          this.typeName,
          error instanceof Error ? error : new Error(String(error))
        );
      }
    }
    this.superGroup?.resolveTypes(resolver, visited);
    for (const subClass of this.subGroups ?? []) {
      subClass.resolveTypes(resolver, visited);
    }
    for (const item of this.getItems().values()) {
      item.resolveTypes(resolver, visited);
    }
  }

  /** Dotted path from the root group to this one, '' for a root */
  attributePath(): string {
    const segments: string[] = [];
    const seen = new Set<AttributeGroup>();
    let current: AttributeGroup | undefined = this;
    while (current?.owningItem !== undefined && !seen.has(current)) {
      seen.add(current);
      segments.unshift(current.owningItem.attributeName);
      current = current.owningItem.owner;
    }
    return segments.join('.');
  }

  // ---------------------------------------------------------------------------
  // Comparison
  // ---------------------------------------------------------------------------

  isSupersetOf(
    anotherGroup: AttributeGroup | null | undefined,
    diagnostics?: DiagnosticSink
  ): boolean {
    return isSupersetOf(this, anotherGroup, diagnostics);
  }

  equals(other: unknown): boolean {
    return other instanceof AttributeGroup && groupsEqual(this, other);
  }

  // ---------------------------------------------------------------------------
  // Cloning & specialization
  // ---------------------------------------------------------------------------

  isFetchGroup(): this is FetchGroup {
    return this.variant.kind === 'fetch';
  }

  isLoadGroup(): this is LoadGroup {
    return this.variant.kind === 'load';
  }

  isCopyGroup(): this is CopyGroup {
    return this.variant.kind === 'copy';
  }

  /** Only load groups may be traversed by several consumers at once */
  isConcurrent(): boolean {
    return this.variant.kind === 'load';
  }

  clone(options?: SpecializeOptions): AttributeGroup {
    return cloneGroup(this, options);
  }

  toFetchGroup(options?: SpecializeOptions): FetchGroup {
    return toFetchGroup(this, options);
  }

  toLoadGroup(options?: SpecializeOptions): LoadGroup {
    return toLoadGroup(this, options);
  }

  toCopyGroup(copies?: CopyRegistry, options?: SpecializeOptions): CopyGroup {
    return toCopyGroup(this, copies, options);
  }

  // ---------------------------------------------------------------------------
  // Rendering
  // ---------------------------------------------------------------------------

  toString(): string {
    return `${KIND_LABELS[this.variant.kind]}(${this.name})${this.toStringAdditionalInfo()}${this.toStringItemsBlock()}`;
  }

  protected toStringAdditionalInfo(): string {
    switch (this.variant.kind) {
      case 'copy':
        return `[cascade=${this.variant.cascade}]`;
      case 'fetch':
        return this.variant.shouldLoadAll ? '[loadAll]' : '';
      default:
        return '';
    }
  }

  /** `{a, b{c}}`; a group met again on the way renders as `{...}` */
  toStringItemsBlock(visited: Set<AttributeGroup> = new Set()): string {
    if (visited.has(this)) return '{...}';
    visited.add(this);
    const block = `{${this.toStringItems(visited).join(', ')}}`;
    visited.delete(this);
    return block;
  }

  protected toStringItems(visited: Set<AttributeGroup>): string[] {
    const parts = [...this.getItems().values()].map((item) =>
      item.toStringNoClassName(visited)
    );
    if (this.superGroup !== undefined && !visited.has(this.superGroup)) {
      visited.add(this.superGroup);
      parts.push(...this.superGroup.toStringItems(visited));
      visited.delete(this.superGroup);
    }
    return parts;
  }
}

function findInSubclassTree(
  group: AttributeGroup,
  type: EntityType,
  seen: Set<AttributeGroup>
): AttributeGroup | undefined {
  if (seen.has(group)) return undefined;
  seen.add(group);
  if (group.type === type || (group.type === undefined && group.typeName === type.name)) {
    return group;
  }
  for (const subClass of group.subGroups ?? []) {
    const found = findInSubclassTree(subClass, type, seen);
    if (found !== undefined) return found;
  }
  return undefined;
}
