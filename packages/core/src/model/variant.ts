import type { CopyRegistry } from '../types/entity.js';

export type GroupKind = 'generic' | 'fetch' | 'load' | 'copy';

/**
 * How far the copy engine follows relationships.
 * 'tree' copies everything reachable through the group.
 */
export type CascadePolicy = 'none' | 'private-parts' | 'tree' | 'all-parts';

export interface GenericVariant {
  readonly kind: 'generic';
}

export interface FetchVariant {
  readonly kind: 'fetch';
  /** Fetch engine should also load the fetched relationships */
  shouldLoadAll: boolean;
}

export interface LoadVariant {
  readonly kind: 'load';
  /** The loading engine may traverse this group from several consumers */
  readonly concurrent: true;
}

export interface CopyVariant {
  readonly kind: 'copy';
  readonly copies: CopyRegistry;
  cascade: CascadePolicy;
  shouldResetPrimaryKey: boolean;
  shouldResetVersion: boolean;
}

export type GroupVariant =
  | GenericVariant
  | FetchVariant
  | LoadVariant
  | CopyVariant;

export type VariantOf<K extends GroupKind> = Extract<GroupVariant, { kind: K }>;

export const GENERIC_VARIANT: GenericVariant = Object.freeze({
  kind: 'generic',
});

export function fetchVariant(shouldLoadAll = false): FetchVariant {
  return { kind: 'fetch', shouldLoadAll };
}

export function loadVariant(): LoadVariant {
  return { kind: 'load', concurrent: true };
}

export function copyVariant(
  copies: CopyRegistry = new Map(),
  cascade: CascadePolicy = 'private-parts'
): CopyVariant {
  return {
    kind: 'copy',
    copies,
    cascade,
    shouldResetPrimaryKey: false,
    shouldResetVersion: false,
  };
}

/**
 * Independent copy of the variant's settings. A copy registry stays shared:
 * it belongs to the copy session, not to the node.
 */
export function duplicateVariant<V extends GroupVariant>(variant: V): V {
  if (variant.kind === 'generic') return variant;
  return { ...variant };
}
