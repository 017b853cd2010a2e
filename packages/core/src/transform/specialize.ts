import {
  AttributeGroup,
  type CopyGroup,
  type FetchGroup,
  type LoadGroup,
} from '../model/attribute-group.js';
import { AttributeItem } from '../model/attribute-item.js';
import {
  copyVariant,
  duplicateVariant,
  fetchVariant,
  loadVariant,
  type GroupVariant,
} from '../model/variant.js';
import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import { consoleSink, emitDiagnostic, type DiagnosticSink } from '../diag/sink.js';
import { CloneError } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import type { CopyRegistry, TypeKey } from '../types/entity.js';

/**
 * Decides the variant of every node produced by a traversal.
 */
export interface VariantFactory {
  /** Label used in diagnostics and errors */
  readonly label: string;
  variantFor(source: AttributeGroup): GroupVariant;
}

export interface SpecializeOptions {
  /** Receiver of CLONE_FAILED (default: console.warn) */
  diagnostics?: DiagnosticSink;
}

interface SpecializeContext {
  readonly factory: VariantFactory;
  readonly sink: DiagnosticSink;
  /** Source node → produced node, by identity */
  readonly groups: Map<AttributeGroup, AttributeGroup>;
  readonly items: Map<AttributeItem, AttributeItem>;
}

export const CLONE_FACTORY: VariantFactory = {
  label: 'clone',
  variantFor: (source) => duplicateVariant(source.variant),
};

export const FETCH_FACTORY: VariantFactory = {
  label: 'fetch',
  variantFor: (source) =>
    fetchVariant(
      source.variant.kind === 'fetch' ? source.variant.shouldLoadAll : false
    ),
};

export const LOAD_FACTORY: VariantFactory = {
  label: 'load',
  variantFor: () => loadVariant(),
};

/** Every produced copy node shares `copies` and cascades the whole tree. */
export function copyFactory(copies: CopyRegistry): VariantFactory {
  return {
    label: 'copy',
    variantFor: () => copyVariant(copies, 'tree'),
  };
}

/**
 * Produce a parallel tree in one traversal. Each source group and item maps
 * to exactly one produced node, so shared nodes stay shared and cycles
 * through super, sub and owning-item links terminate. The source is never
 * modified.
 *
 * @throws CloneError when a node cannot be produced; nodes finished before
 *   the failure stay registered and consistent
 */
export function specialize(
  root: AttributeGroup,
  factory: VariantFactory,
  options: SpecializeOptions = {}
): AttributeGroup {
  const context: SpecializeContext = {
    factory,
    sink: options.diagnostics ?? consoleSink,
    groups: new Map(),
    items: new Map(),
  };
  return transformGroup(root, context, undefined);
}

export function cloneGroup(
  group: AttributeGroup,
  options?: SpecializeOptions
): AttributeGroup {
  return specialize(group, CLONE_FACTORY, options);
}

export function toFetchGroup(
  group: AttributeGroup,
  options?: SpecializeOptions
): FetchGroup {
  if (group.isFetchGroup()) return group;
  const produced = specialize(group, FETCH_FACTORY, options);
  if (!produced.isFetchGroup()) throw unexpectedKind(group, 'fetch');
  return produced;
}

export function toLoadGroup(
  group: AttributeGroup,
  options?: SpecializeOptions
): LoadGroup {
  if (group.isLoadGroup()) return group;
  const produced = specialize(group, LOAD_FACTORY, options);
  if (!produced.isLoadGroup()) throw unexpectedKind(group, 'load');
  return produced;
}

export function toCopyGroup(
  group: AttributeGroup,
  copies: CopyRegistry = new Map(),
  options?: SpecializeOptions
): CopyGroup {
  if (group.isCopyGroup()) return group;
  const produced = specialize(group, copyFactory(copies), options);
  if (!produced.isCopyGroup()) throw unexpectedKind(group, 'copy');
  return produced;
}

/**
 * @param parentItem produced item that owns the node, when the caller
 *   already has it
 */
function transformGroup(
  source: AttributeGroup,
  context: SpecializeContext,
  parentItem: AttributeItem | undefined
): AttributeGroup {
  const done = context.groups.get(source);
  if (done !== undefined) {
    return done;
  }

  const target = allocate(source, context);
  // Registered before recursing: cycles come back to this entry.
  context.groups.set(source, target);

  let owningItem = parentItem;
  if (source.owningItem !== undefined && owningItem === undefined) {
    owningItem = transformItem(source.owningItem, context, undefined);
  }
  target.owningItem = owningItem;

  if (source.superGroup !== undefined) {
    target.superGroup = transformGroup(
      source.superGroup,
      context,
      linkedParent(source.superGroup, source, owningItem)
    );
  }

  if (source.subGroups !== undefined) {
    const subGroups = new Set<AttributeGroup>();
    for (const subClass of source.subGroups) {
      subGroups.add(
        transformGroup(
          subClass,
          context,
          linkedParent(subClass, source, owningItem)
        )
      );
    }
    target.subGroups = subGroups;
  }

  for (const item of source.getItems().values()) {
    target.adoptItem(transformItem(item, context, target));
  }
  return target;
}

/**
 * @param ownerClone produced group that declares the item, when known
 */
function transformItem(
  source: AttributeItem,
  context: SpecializeContext,
  ownerClone: AttributeGroup | undefined
): AttributeItem {
  const done = context.items.get(source);
  if (done !== undefined) {
    return done;
  }

  let owner = ownerClone;
  if (owner === undefined) {
    // Producing the owner produces its items, this one included.
    owner = transformGroup(source.owner, context, undefined);
    const produced = context.items.get(source);
    if (produced !== undefined) {
      return produced;
    }
  }

  const target = new AttributeItem(owner, source.attributeName);
  context.items.set(source, target);

  const nested = (group: AttributeGroup): AttributeGroup =>
    transformGroup(
      group,
      context,
      group.owningItem === source ? target : undefined
    );

  target.group = source.group && nested(source.group);
  target.keyGroup = source.keyGroup && nested(source.keyGroup);
  target.typeGroups = mapGroups(source.typeGroups, nested);
  target.keyTypeGroups = mapGroups(source.keyTypeGroups, nested);
  return target;
}

/**
 * Produced owning item to hand to a related group: only when the related
 * group is owned by the same source item, which keeps the produced
 * owning-item links identical in shape to the source.
 */
function linkedParent(
  related: AttributeGroup,
  source: AttributeGroup,
  owningItem: AttributeItem | undefined
): AttributeItem | undefined {
  return related.owningItem === source.owningItem ? owningItem : undefined;
}

function mapGroups(
  byType: ReadonlyMap<TypeKey, AttributeGroup> | undefined,
  transform: (group: AttributeGroup) => AttributeGroup
): Map<TypeKey, AttributeGroup> | undefined {
  if (byType === undefined) return undefined;
  const produced = new Map<TypeKey, AttributeGroup>();
  for (const [type, group] of byType) {
    produced.set(type, transform(group));
  }
  return produced;
}

function allocate(
  source: AttributeGroup,
  context: SpecializeContext
): AttributeGroup {
  try {
    return new AttributeGroup(source.name, {
      type: source.type,
      typeName: source.typeName,
      validated: source.validated,
      variant: context.factory.variantFor(source),
    });
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    emitDiagnostic(context.sink, {
      code: DIAGNOSTIC_CODES.CLONE_FAILED,
      path: source.attributePath(),
      phase: DIAGNOSTIC_PHASES.SPECIALIZE,
      details: { groupName: source.name, factory: context.factory.label },
    });
    throw new CloneError({
      message: `Could not produce a ${context.factory.label} node for group '${source.name}'`,
      context: { groupName: source.name, path: source.attributePath() },
      cause,
    });
  }
}

function unexpectedKind(source: AttributeGroup, kind: string): CloneError {
  return new CloneError({
    message: `Specializing group '${source.name}' did not produce a ${kind} group`,
    errorCode: ErrorCode.INTERNAL_ERROR,
    context: { groupName: source.name },
  });
}
