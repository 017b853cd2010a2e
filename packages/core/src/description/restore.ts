import AjvModule, { type ErrorObject } from 'ajv';

import { AttributeGroup } from '../model/attribute-group.js';
import type { AttributeItem } from '../model/attribute-item.js';
import {
  copyVariant,
  fetchVariant,
  loadVariant,
  GENERIC_VARIANT,
  type GroupKind,
  type GroupVariant,
} from '../model/variant.js';
import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import { emitDiagnostic } from '../diag/sink.js';
import {
  AttributeGroupError,
  ConfigError,
  ParseError,
} from '../types/errors.js';
import type { CopyRegistry, TypeResolver } from '../types/entity.js';
import {
  resolveOptions,
  type GroupOptions,
  type ResolvedGroupOptions,
} from '../types/options.js';
import { attempt, type Result } from '../types/result.js';
import {
  GROUP_DESCRIPTION_SCHEMA,
  type GroupDescription,
  type ItemDescription,
} from './schema.js';

const Ajv = AjvModule.default;

const ajv = new Ajv({
  strict: true,
  strictTypes: true,
  allErrors: true,
});
const validateDescription = ajv.compile<GroupDescription>(
  GROUP_DESCRIPTION_SCHEMA
);

export interface RestoreGroupOptions extends GroupOptions {
  /** Required when `restore.resolveTypes` is set */
  resolver?: TypeResolver;
}

interface RestoreSession {
  readonly options: ResolvedGroupOptions;
  /** One copy registry shared by every copy group of the restored tree */
  readonly copies: CopyRegistry;
}

interface Restored {
  readonly description: GroupDescription;
  readonly group: AttributeGroup;
}

/**
 * Rebuild a group tree from its description. Accepts the JSON text or the
 * already parsed value.
 *
 * @throws ParseError when the input is not a valid description
 * @throws TypeResolutionError when `restore.resolveTypes` is set and a type
 *   name is unknown to the resolver
 */
export function restoreGroup(
  input: unknown,
  options: RestoreGroupOptions = {}
): AttributeGroup {
  const resolved = resolveOptions(options);
  if (resolved.restore.resolveTypes && options.resolver === undefined) {
    throw new ConfigError(
      'restore.resolveTypes requires a type resolver',
      'restore.resolveTypes'
    );
  }

  const description = parseGroupDescription(input);
  if (description.superTypeName !== undefined) {
    throw new ParseError({
      message: `Root group '${description.name}' cannot extend a sibling group`,
      context: { path: '', groupName: description.name },
      issues: ['/superTypeName is only allowed on nested groups'],
    });
  }

  const session: RestoreSession = { options: resolved, copies: new Map() };
  const root = buildGroup(description, session);
  if (resolved.restore.resolveTypes && options.resolver !== undefined) {
    root.resolveTypes(options.resolver);
  }
  return root;
}

export function tryRestoreGroup(
  input: unknown,
  options?: RestoreGroupOptions
): Result<AttributeGroup, AttributeGroupError> {
  return attempt(
    () => restoreGroup(input, options),
    (error): error is AttributeGroupError =>
      error instanceof AttributeGroupError
  );
}

/**
 * Check the shape of a description without building anything.
 *
 * @throws ParseError listing every schema violation
 */
export function parseGroupDescription(input: unknown): GroupDescription {
  const value = typeof input === 'string' ? parseJson(input) : input;
  if (validateDescription(value)) {
    return value;
  }
  const issues = (validateDescription.errors ?? []).map(formatIssue);
  throw new ParseError({
    message: `Invalid group description: ${issues[0] ?? 'unknown error'}`,
    issues,
  });
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ParseError({
      message: 'Group description is not valid JSON',
      cause: error instanceof Error ? error : undefined,
    });
  }
}

function formatIssue(error: ErrorObject): string {
  const where = error.instancePath === '' ? '/' : error.instancePath;
  return `${where} ${error.message ?? error.keyword}`;
}

function buildGroup(
  description: GroupDescription,
  session: RestoreSession
): AttributeGroup {
  const group = new AttributeGroup(description.name, {
    typeName: description.typeName,
    validated: description.validated ?? false,
    variant: variantForKind(description.kind ?? 'generic', session.copies),
  });

  for (const [attributeName, itemDescription] of Object.entries(
    description.attributes ?? {}
  )) {
    const item = group.resolveItem(attributeName, true);
    if (item !== undefined) {
      restoreItem(item, itemDescription, session);
    }
  }
  return group;
}

function restoreItem(
  item: AttributeItem,
  description: ItemDescription,
  session: RestoreSession
): void {
  const values = restoreSlot(description.typeGroups, session);
  item.addGroups(values.map((entry) => entry.group));
  if (description.group !== undefined) {
    const primary = buildGroup(description.group, session);
    item.setRootGroup(primary);
    values.push({ description: description.group, group: primary });
  }
  linkSiblings(values, session);

  const keys = restoreSlot(description.keyTypeGroups, session);
  item.addKeyGroups(keys.map((entry) => entry.group));
  if (description.keyGroup !== undefined) {
    const primary = buildGroup(description.keyGroup, session);
    item.setRootKeyGroup(primary);
    keys.push({ description: description.keyGroup, group: primary });
  }
  linkSiblings(keys, session);
}

function restoreSlot(
  descriptions: GroupDescription[] | undefined,
  session: RestoreSession
): Restored[] {
  return (descriptions ?? []).map((description) => ({
    description,
    group: buildGroup(description, session),
  }));
}

function linkSiblings(siblings: Restored[], session: RestoreSession): void {
  for (const { description, group } of siblings) {
    const superTypeName = description.superTypeName;
    if (superTypeName === undefined) continue;

    const parent = siblings.find(
      (candidate) =>
        candidate.group !== group && candidate.group.typeName === superTypeName
    );
    if (parent === undefined) {
      emitDiagnostic(session.options.diagnostics, {
        code: DIAGNOSTIC_CODES.SUPER_TYPE_UNRESOLVED,
        path: group.attributePath(),
        phase: DIAGNOSTIC_PHASES.RESTORE,
        details: { groupName: group.name, superTypeName },
      });
      continue;
    }
    parent.group.insertSubclass(group, session.options.hierarchy);
  }
}

function variantForKind(kind: GroupKind, copies: CopyRegistry): GroupVariant {
  switch (kind) {
    case 'fetch':
      return fetchVariant();
    case 'load':
      return loadVariant();
    case 'copy':
      return copyVariant(copies, 'tree');
    default:
      return GENERIC_VARIANT;
  }
}
