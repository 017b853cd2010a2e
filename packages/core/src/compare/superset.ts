import type { AttributeGroup } from '../model/attribute-group.js';
import type { AttributeItem } from '../model/attribute-item.js';
import type { TypeKey } from '../types/entity.js';
import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import { emitDiagnostic, silentSink, type DiagnosticSink } from '../diag/sink.js';

/**
 * Outcome of comparing one nested slot of two items.
 * 'short-circuit' ends the whole comparison with true: this side has no
 * nested group where the other one has.
 */
type SlotOutcome = 'continue' | 'fail' | 'short-circuit';

interface CompareState {
  sink: DiagnosticSink;
  /** Pairs under comparison; revisiting one counts as satisfied */
  inProgress: Map<AttributeGroup, Set<AttributeGroup>>;
}

/**
 * True when `group` declares every attribute `other` declares, with nested,
 * key and per-type groups that are supersets of `other`'s.
 *
 * A missing nested group on `group`'s side where `other` has one returns
 * true immediately for the whole call, without looking at the remaining
 * attributes. Callers that rely on a full proof must account for it; the
 * event is reported as SUPERSET_SHORT_CIRCUIT.
 */
export function isSupersetOf(
  group: AttributeGroup,
  other: AttributeGroup | null | undefined,
  sink: DiagnosticSink = silentSink
): boolean {
  return compareGroups(group, other, { sink, inProgress: new Map() });
}

function compareGroups(
  group: AttributeGroup,
  other: AttributeGroup | null | undefined,
  state: CompareState
): boolean {
  if (other === null || other === undefined) {
    return false;
  }
  if (other === group) {
    return true;
  }
  if (!group.hasItems()) {
    return !other.hasItems();
  }
  if (!other.hasItems()) {
    return true;
  }

  let partners = state.inProgress.get(group);
  if (partners?.has(other)) {
    return true;
  }
  if (partners === undefined) {
    partners = new Set();
    state.inProgress.set(group, partners);
  }
  partners.add(other);

  try {
    const items = group.getItems();
    for (const [attributeName, otherItem] of other.getItems()) {
      const item = items.get(attributeName);
      if (item === undefined) {
        return false;
      }
      const outcome = compareItems(item, otherItem, state);
      if (outcome === 'fail') {
        return false;
      }
      if (outcome === 'short-circuit') {
        emitDiagnostic(state.sink, {
          code: DIAGNOSTIC_CODES.SUPERSET_SHORT_CIRCUIT,
          path: joinPath(group.attributePath(), attributeName),
          phase: DIAGNOSTIC_PHASES.COMPARE,
        });
        return true;
      }
    }
    return true;
  } finally {
    partners.delete(other);
  }
}

function compareItems(
  item: AttributeItem,
  otherItem: AttributeItem,
  state: CompareState
): SlotOutcome {
  const slots: Array<() => SlotOutcome> = [
    () => compareSlot(item.group, otherItem.group, state),
    () => compareSlot(item.keyGroup, otherItem.keyGroup, state),
    () => compareTypeSlot(item.typeGroups, otherItem.typeGroups, state),
    () => compareTypeSlot(item.keyTypeGroups, otherItem.keyTypeGroups, state),
  ];
  for (const slot of slots) {
    const outcome = slot();
    if (outcome !== 'continue') return outcome;
  }
  return 'continue';
}

function compareSlot(
  mine: AttributeGroup | undefined,
  theirs: AttributeGroup | undefined,
  state: CompareState
): SlotOutcome {
  if (mine !== undefined) {
    return compareGroups(mine, theirs, state) ? 'continue' : 'fail';
  }
  return theirs !== undefined ? 'short-circuit' : 'continue';
}

function compareTypeSlot(
  mine: ReadonlyMap<TypeKey, AttributeGroup> | undefined,
  theirs: ReadonlyMap<TypeKey, AttributeGroup> | undefined,
  state: CompareState
): SlotOutcome {
  if (mine === undefined) {
    return 'continue';
  }
  if (theirs === undefined) {
    return 'short-circuit';
  }
  for (const [type, element] of mine) {
    if (!compareGroups(element, theirs.get(type), state)) {
      return 'fail';
    }
  }
  return 'continue';
}

function joinPath(prefix: string, attributeName: string): string {
  return prefix === '' ? attributeName : `${prefix}.${attributeName}`;
}
