/**
 * Configuration options for attribute group operations
 *
 * All options are optional with conservative defaults. Collaborators that
 * the model cannot provide itself (type metadata, type resolution) are
 * passed to the operations that need them, not configured here.
 */

import { consoleSink, type DiagnosticSink } from '../diag/sink.js';
import { ConfigError } from './errors.js';
import { prototypeHierarchy, type TypeHierarchy } from './entity.js';

export interface ValidationOptions {
  /** Reaction to attributes unknown on the declared type (default: 'error') */
  unknownAttributes?: 'error' | 'warn';
  /** Maximum nesting depth descended while validating (default: 32) */
  maxDepth?: number;
}

export interface RestoreOptions {
  /** Resolve type names while restoring a description (default: false) */
  resolveTypes?: boolean;
}

export interface GroupOptions {
  /** Subtype test used when inserting subclass groups (default: prototype chain) */
  hierarchy?: TypeHierarchy;
  /** Receiver of non-fatal diagnostics (default: console.warn) */
  diagnostics?: DiagnosticSink;
  validation?: ValidationOptions;
  restore?: RestoreOptions;
}

export interface ResolvedGroupOptions {
  hierarchy: TypeHierarchy;
  diagnostics: DiagnosticSink;
  validation: Required<ValidationOptions>;
  restore: Required<RestoreOptions>;
}

export const DEFAULT_OPTIONS: ResolvedGroupOptions = {
  hierarchy: prototypeHierarchy,
  diagnostics: consoleSink,
  validation: {
    unknownAttributes: 'error',
    maxDepth: 32,
  },
  restore: {
    resolveTypes: false,
  },
};

/**
 * Resolve user options with defaults, deep merging nested objects
 *
 * @throws ConfigError on out-of-range values
 */
export function resolveOptions(
  userOptions: GroupOptions = {}
): ResolvedGroupOptions {
  const resolved: ResolvedGroupOptions = {
    hierarchy: userOptions.hierarchy ?? DEFAULT_OPTIONS.hierarchy,
    diagnostics: userOptions.diagnostics ?? DEFAULT_OPTIONS.diagnostics,
    validation: { ...DEFAULT_OPTIONS.validation, ...userOptions.validation },
    restore: { ...DEFAULT_OPTIONS.restore, ...userOptions.restore },
  };

  validateOptions(resolved);
  return resolved;
}

function validateOptions(options: ResolvedGroupOptions): void {
  const { unknownAttributes, maxDepth } = options.validation;
  if (unknownAttributes !== 'error' && unknownAttributes !== 'warn') {
    throw new ConfigError(
      `validation.unknownAttributes must be 'error' or 'warn', got ${String(unknownAttributes)}`,
      'validation.unknownAttributes'
    );
  }
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new ConfigError(
      `validation.maxDepth must be a positive integer, got ${String(maxDepth)}`,
      'validation.maxDepth'
    );
  }
  if (typeof options.restore.resolveTypes !== 'boolean') {
    throw new ConfigError(
      'restore.resolveTypes must be a boolean',
      'restore.resolveTypes'
    );
  }
}
