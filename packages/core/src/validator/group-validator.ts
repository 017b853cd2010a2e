/**
 * Checks a group tree against type metadata: every attribute named by a
 * group must exist on the group's type or one of its ancestors.
 */

import type { AttributeGroup } from '../model/attribute-group.js';
import type { AttributeItem } from '../model/attribute-item.js';
import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import { emitDiagnostic } from '../diag/sink.js';
import { findAttribute } from '../registry/type-registry.js';
import type {
  EntityType,
  TypeDescriptor,
  TypeDescriptorService,
} from '../types/entity.js';
import {
  ValidationError,
  createValidationFailure,
  type ValidationFailure,
} from '../types/errors.js';
import {
  resolveOptions,
  type GroupOptions,
  type ResolvedGroupOptions,
} from '../types/options.js';

interface ValidationRun {
  readonly descriptors: TypeDescriptorService;
  readonly options: ResolvedGroupOptions;
  readonly visited: Set<AttributeGroup>;
  readonly failures: ValidationFailure[];
}

/**
 * Validate the tree rooted at `group`.
 *
 * Nested groups without a type of their own are checked against the
 * attribute's `target` (value groups) or `keyTarget` (key groups). Groups
 * already flagged `validated` are skipped; groups found clean are flagged.
 *
 * @returns the failures found; empty when the tree is valid
 * @throws ValidationError when failures exist and
 *   `validation.unknownAttributes` is 'error'
 */
export function validateGroup(
  group: AttributeGroup,
  descriptors: TypeDescriptorService,
  options: GroupOptions = {}
): ValidationFailure[] {
  const run: ValidationRun = {
    descriptors,
    options: resolveOptions(options),
    visited: new Set(),
    failures: [],
  };

  visitGroup(run, group, undefined, 0);

  if (run.failures.length === 0) {
    return run.failures;
  }
  if (run.options.validation.unknownAttributes === 'error') {
    throw new ValidationError({
      message: `Unknown attributes: ${run.failures.map((f) => f.path).join(', ')}`,
      failures: run.failures,
    });
  }
  for (const failure of run.failures) {
    emitDiagnostic(run.options.diagnostics, {
      code: DIAGNOSTIC_CODES.UNKNOWN_ATTRIBUTE,
      path: failure.path,
      phase: DIAGNOSTIC_PHASES.VALIDATE,
      details: { message: failure.message, typeName: failure.typeName },
    });
  }
  return run.failures;
}

function visitGroup(
  run: ValidationRun,
  group: AttributeGroup,
  impliedType: EntityType | undefined,
  depth: number
): void {
  if (group.validated || run.visited.has(group)) return;
  run.visited.add(group);

  const type = group.type ?? impliedType;
  const descriptor = type === undefined ? undefined : run.descriptors.describe(type);
  if (descriptor === undefined) {
    emitDiagnostic(run.options.diagnostics, {
      code: DIAGNOSTIC_CODES.TYPE_UNRESOLVED,
      path: group.attributePath(),
      phase: DIAGNOSTIC_PHASES.VALIDATE,
      details: { groupName: group.name, typeName: group.typeName ?? type?.name },
    });
    return;
  }

  const failuresBefore = run.failures.length;
  for (const item of group.getItems().values()) {
    visitItem(run, group, item, descriptor, depth);
  }
  if (run.failures.length === failuresBefore) {
    group.validated = true;
  }

  if (group.superGroup !== undefined) {
    visitGroup(run, group.superGroup, descriptor.parent?.type, depth);
  }
  for (const subClass of group.subGroups ?? []) {
    visitGroup(run, subClass, undefined, depth);
  }
}

function visitItem(
  run: ValidationRun,
  group: AttributeGroup,
  item: AttributeItem,
  descriptor: TypeDescriptor,
  depth: number
): void {
  const path = joinPath(group.attributePath(), item.attributeName);
  const attribute = findAttribute(descriptor, item.attributeName);
  if (attribute === undefined) {
    const typeName = descriptor.type.name;
    run.failures.push(
      createValidationFailure(
        path,
        `Attribute '${item.attributeName}' is not defined on ${typeName}`,
        typeName
      )
    );
    return;
  }

  if (depth + 1 > run.options.validation.maxDepth) return;

  const values = [item.group, ...(item.typeGroups?.values() ?? [])];
  for (const nested of values) {
    if (nested !== undefined) {
      visitGroup(run, nested, attribute.target, depth + 1);
    }
  }
  const keys = [item.keyGroup, ...(item.keyTypeGroups?.values() ?? [])];
  for (const nested of keys) {
    if (nested !== undefined) {
      visitGroup(run, nested, attribute.keyTarget, depth + 1);
    }
  }
}

function joinPath(prefix: string, attributeName: string): string {
  return prefix === '' ? attributeName : `${prefix}.${attributeName}`;
}
