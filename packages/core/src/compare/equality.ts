import type { AttributeGroup } from '../model/attribute-group.js';
import type { AttributeItem } from '../model/attribute-item.js';
import type { TypeKey } from '../types/entity.js';

type Visited = Map<AttributeGroup, Set<AttributeGroup>>;

/**
 * Structural equality: same local items with equal nested groups in every
 * slot, and equal super-group chains. Names, types and variants are not
 * compared. A pair met again while it is being compared counts as equal,
 * which makes self-referencing groups terminate.
 */
export function groupsEqual(
  a: AttributeGroup | undefined,
  b: AttributeGroup | undefined,
  visited: Visited = new Map()
): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined) return false;

  let seen = visited.get(a);
  if (seen?.has(b)) return true;
  if (seen === undefined) {
    seen = new Set();
    visited.set(a, seen);
  }
  seen.add(b);

  const itemsA = a.getItems();
  const itemsB = b.getItems();
  if (itemsA.size !== itemsB.size) return false;
  for (const [attributeName, item] of itemsA) {
    const otherItem = itemsB.get(attributeName);
    if (otherItem === undefined || !itemsEqual(item, otherItem, visited)) {
      return false;
    }
  }

  return groupsEqual(a.superGroup, b.superGroup, visited);
}

export function itemsEqual(
  a: AttributeItem,
  b: AttributeItem,
  visited: Visited = new Map()
): boolean {
  return (
    a.attributeName === b.attributeName &&
    groupsEqual(a.group, b.group, visited) &&
    groupsEqual(a.keyGroup, b.keyGroup, visited) &&
    typeGroupsEqual(a.typeGroups, b.typeGroups, visited) &&
    typeGroupsEqual(a.keyTypeGroups, b.keyTypeGroups, visited)
  );
}

function typeGroupsEqual(
  a: ReadonlyMap<TypeKey, AttributeGroup> | undefined,
  b: ReadonlyMap<TypeKey, AttributeGroup> | undefined,
  visited: Visited
): boolean {
  const sizeA = a?.size ?? 0;
  const sizeB = b?.size ?? 0;
  if (sizeA !== sizeB) return false;
  for (const [type, group] of a ?? []) {
    const other = b?.get(type);
    if (other === undefined || !groupsEqual(group, other, visited)) {
      return false;
    }
  }
  return true;
}
