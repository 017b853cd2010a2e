// @attrgroups/core entry point
//
// Public API:
// - AttributeGroup / AttributeItem: the group tree, path resolution,
//   containment, inheritance lookup, comparison and specialization.
// - describeGroup / restoreGroup: JSON descriptions of group trees.
// - validateGroup: checks a tree against type metadata.
// - TypeRegistry: in-memory type metadata implementing every collaborator
//   contract the model depends on.

export * from './types/index.js';

// Model
export {
  AttributeGroup,
  type GroupInit,
  type SpecializedGroup,
  type FetchGroup,
  type LoadGroup,
  type CopyGroup,
} from './model/attribute-group.js';
export { AttributeItem } from './model/attribute-item.js';
export {
  parseAttributePath,
  tryParseAttributePath,
  formatAttributePath,
  type AttributePath,
} from './model/path.js';
export {
  GENERIC_VARIANT,
  fetchVariant,
  loadVariant,
  copyVariant,
  duplicateVariant,
  type GroupKind,
  type CascadePolicy,
  type GroupVariant,
  type GenericVariant,
  type FetchVariant,
  type LoadVariant,
  type CopyVariant,
  type VariantOf,
} from './model/variant.js';

// Comparison
export { isSupersetOf } from './compare/superset.js';
export { groupsEqual } from './compare/equality.js';

// Cloning & specialization
export {
  specialize,
  cloneGroup,
  toFetchGroup,
  toLoadGroup,
  toCopyGroup,
  copyFactory,
  CLONE_FACTORY,
  FETCH_FACTORY,
  LOAD_FACTORY,
  type VariantFactory,
  type SpecializeOptions,
} from './transform/specialize.js';

// Type metadata
export {
  TypeRegistry,
  UnknownTypeError,
  findAttribute,
  type TypeRegistration,
} from './registry/type-registry.js';

// Descriptions
export { describeGroup } from './description/describe.js';
export {
  restoreGroup,
  tryRestoreGroup,
  parseGroupDescription,
  type RestoreGroupOptions,
} from './description/restore.js';
export {
  GROUP_DESCRIPTION_SCHEMA,
  type GroupDescription,
  type ItemDescription,
} from './description/schema.js';

// Validation
export { validateGroup } from './validator/index.js';

// Diagnostics
export {
  DIAGNOSTIC_CODES,
  DIAGNOSTIC_PHASES,
  getAllowedDiagnosticPhases,
  isDiagnosticCode,
  type DiagnosticCode,
  type DiagnosticPhase,
} from './diag/codes.js';
export {
  consoleSink,
  silentSink,
  createCollectingSink,
  emitDiagnostic,
  type DiagnosticSink,
  type GroupDiagnostic,
  type CollectingSink,
} from './diag/sink.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
