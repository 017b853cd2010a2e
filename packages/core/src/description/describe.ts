import type { AttributeGroup } from '../model/attribute-group.js';
import type { AttributeItem } from '../model/attribute-item.js';
import { DescriptionCycleError } from '../types/errors.js';
import type { TypeKey } from '../types/entity.js';
import type { GroupDescription, ItemDescription } from './schema.js';

interface SlotDescription {
  primary?: GroupDescription;
  typed?: GroupDescription[];
}

/**
 * JSON-safe description of a group tree.
 *
 * Per-type groups record the sibling they extend as `superTypeName`. Sharing
 * between branches is not preserved (a shared group is described at every
 * place it occurs), and the super/sub links of the root are not recorded.
 *
 * @throws DescriptionCycleError when a group is nested inside itself
 */
export function describeGroup(group: AttributeGroup): GroupDescription {
  return describeNode(group, new Set(), undefined);
}

function describeNode(
  group: AttributeGroup,
  onPath: Set<AttributeGroup>,
  siblings: ReadonlySet<AttributeGroup> | undefined
): GroupDescription {
  if (onPath.has(group)) {
    throw new DescriptionCycleError(group.attributePath(), group.name);
  }
  onPath.add(group);

  const description: GroupDescription = { name: group.name };
  if (group.typeName !== undefined) {
    description.typeName = group.typeName;
  }
  const superGroup = group.superGroup;
  if (
    superGroup !== undefined &&
    siblings?.has(superGroup) &&
    superGroup.typeName !== undefined
  ) {
    description.superTypeName = superGroup.typeName;
  }
  if (group.validated) {
    description.validated = true;
  }
  if (group.kind !== 'generic') {
    description.kind = group.kind;
  }
  if (group.hasItems()) {
    const attributes: Record<string, ItemDescription> = {};
    for (const [attributeName, item] of group.getItems()) {
      attributes[attributeName] = describeItem(item, onPath);
    }
    description.attributes = attributes;
  }

  onPath.delete(group);
  return description;
}

function describeItem(
  item: AttributeItem,
  onPath: Set<AttributeGroup>
): ItemDescription {
  const description: ItemDescription = {};

  const value = describeSlot(item.group, item.typeGroups, onPath);
  if (value.primary) description.group = value.primary;
  if (value.typed) description.typeGroups = value.typed;

  const key = describeSlot(item.keyGroup, item.keyTypeGroups, onPath);
  if (key.primary) description.keyGroup = key.primary;
  if (key.typed) description.keyTypeGroups = key.typed;

  return description;
}

function describeSlot(
  primary: AttributeGroup | undefined,
  byType: ReadonlyMap<TypeKey, AttributeGroup> | undefined,
  onPath: Set<AttributeGroup>
): SlotDescription {
  const typedGroups = [...(byType?.values() ?? [])];
  const siblings = new Set(typedGroups);
  if (primary !== undefined) siblings.add(primary);

  const slot: SlotDescription = {};
  if (typedGroups.length > 0) {
    // The first typed group registered becomes primary again on restore.
    if (primary !== undefined && typedGroups.includes(primary)) {
      typedGroups.splice(typedGroups.indexOf(primary), 1);
      typedGroups.unshift(primary);
    }
    slot.typed = typedGroups.map((group) =>
      describeNode(group, onPath, siblings)
    );
  }
  if (primary !== undefined && !typedGroups.includes(primary)) {
    slot.primary = describeNode(primary, onPath, siblings);
  }
  return slot;
}
