import type { AttributeGroup } from './attribute-group.js';
import { itemsEqual } from '../compare/equality.js';
import {
  typeNameOf,
  type TypeKey,
  type TypeResolver,
} from '../types/entity.js';

type Slot = 'value' | 'key';

/**
 * One attribute entry of an AttributeGroup together with the nested groups
 * describing what to include beneath it.
 *
 * - `group` / `typeGroups`: nested specification of the attribute's value,
 *   the latter keyed by concrete subtype for polymorphic attributes
 * - `keyGroup` / `keyTypeGroups`: the same for the key of a map-valued
 *   attribute
 *
 * Nested groups point back here through `owningItem`.
 */
export class AttributeItem {
  readonly attributeName: string;
  /** Group that declares this item. Reassigned only while cloning. */
  owner: AttributeGroup;

  group: AttributeGroup | undefined;
  typeGroups: Map<TypeKey, AttributeGroup> | undefined;
  keyGroup: AttributeGroup | undefined;
  keyTypeGroups: Map<TypeKey, AttributeGroup> | undefined;

  constructor(owner: AttributeGroup, attributeName: string) {
    this.owner = owner;
    this.attributeName = attributeName;
  }

  /** Install the primary nested group materialised for a path segment. */
  setRootGroup(group: AttributeGroup): void {
    group.owningItem = this;
    this.group = group;
  }

  /** Install the primary nested key group. */
  setRootKeyGroup(group: AttributeGroup): void {
    group.owningItem = this;
    this.keyGroup = group;
  }

  /**
   * Register a nested value group. An untyped group replaces the primary
   * group; a typed one is filed under its type and becomes primary when the
   * slot is empty, untyped, or holds a group for the same type.
   */
  addSubGroup(group: AttributeGroup | undefined): void {
    if (group !== undefined) this.#register(group, 'value');
  }

  addGroups(groups: Iterable<AttributeGroup>): void {
    for (const group of groups) {
      this.#register(group, 'value');
    }
  }

  addKeyGroup(group: AttributeGroup | undefined): void {
    if (group !== undefined) this.#register(group, 'key');
  }

  addKeyGroups(groups: Iterable<AttributeGroup>): void {
    for (const group of groups) {
      this.#register(group, 'key');
    }
  }

  /** Primary value group, or the one registered for `type`. */
  getGroup(type?: TypeKey): AttributeGroup | undefined {
    if (type === undefined) return this.group;
    return this.typeGroups?.get(type);
  }

  getKeyGroup(type?: TypeKey): AttributeGroup | undefined {
    if (type === undefined) return this.keyGroup;
    return this.keyTypeGroups?.get(type);
  }

  /** Every distinct nested group held by the four slots. */
  nestedGroups(): Set<AttributeGroup> {
    const groups = new Set<AttributeGroup>();
    if (this.group) groups.add(this.group);
    if (this.keyGroup) groups.add(this.keyGroup);
    for (const group of this.typeGroups?.values() ?? []) groups.add(group);
    for (const group of this.keyTypeGroups?.values() ?? []) groups.add(group);
    return groups;
  }

  /**
   * Resolve type names of every nested group, then re-key the per-type maps
   * by the resolved types.
   */
  resolveTypes(resolver: TypeResolver, visited: Set<AttributeGroup>): void {
    for (const group of this.nestedGroups()) {
      group.resolveTypes(resolver, visited);
    }
    this.typeGroups = rekey(this.typeGroups);
    this.keyTypeGroups = rekey(this.keyTypeGroups);
  }

  /** Same attribute name and structurally equal nested groups in every slot */
  equals(other: unknown): boolean {
    return other instanceof AttributeItem && itemsEqual(this, other);
  }

  toString(): string {
    return `${this.constructor.name}(${this.attributeName})${this.toStringNoClassName()}`;
  }

  toStringNoClassName(visited = new Set<AttributeGroup>()): string {
    let str = this.attributeName;
    if (this.group) {
      str += this.group.toStringItemsBlock(visited);
    }
    if (this.keyGroup) {
      str += ` key${this.keyGroup.toStringItemsBlock(visited)}`;
    }
    for (const [key, group] of this.typeGroups ?? []) {
      if (group === this.group) continue;
      str += ` as ${typeNameOf(key)}${group.toStringItemsBlock(visited)}`;
    }
    return str;
  }

  #register(group: AttributeGroup, slot: Slot): void {
    group.owningItem = this;
    const key = group.typeKey;
    const primary = slot === 'value' ? this.group : this.keyGroup;

    if (key === undefined) {
      this.#setPrimary(slot, group);
      return;
    }

    let byType = slot === 'value' ? this.typeGroups : this.keyTypeGroups;
    if (byType === undefined) {
      byType = new Map();
      if (slot === 'value') this.typeGroups = byType;
      else this.keyTypeGroups = byType;
    }
    byType.set(key, group);

    if (
      primary === undefined ||
      primary.typeKey === undefined ||
      primary.typeKey === key
    ) {
      this.#setPrimary(slot, group);
    }
  }

  #setPrimary(slot: Slot, group: AttributeGroup): void {
    if (slot === 'value') this.group = group;
    else this.keyGroup = group;
  }
}

function rekey(
  byType: Map<TypeKey, AttributeGroup> | undefined
): Map<TypeKey, AttributeGroup> | undefined {
  if (byType === undefined) return undefined;
  const rekeyed = new Map<TypeKey, AttributeGroup>();
  for (const [key, group] of byType) {
    rekeyed.set(group.typeKey ?? key, group);
  }
  return rekeyed;
}
