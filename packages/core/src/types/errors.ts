/**
 * Error hierarchy for attribute groups
 * Provides structured error handling with context and causes
 */

import { ErrorCode, type Severity, getExitCode } from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // Attribute path (e.g., 'manager.address.city')
  groupName?: string;
  typeName?: string;
  value?: unknown; // Rejected input
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface ErrorParams<C extends ErrorContext = ErrorContext> {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: C;
  cause?: Error;
}

/**
 * Base error class for all attribute group errors
 */
export abstract class AttributeGroupError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: ErrorParams & { errorCode: ErrorCode }) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: context and cause only
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  getExitCode(): number {
    return getExitCode(this.errorCode);
  }
}

/**
 * Malformed, empty or improperly segmented attribute path
 */
export class InvalidPathError extends AttributeGroupError {
  constructor(path: unknown) {
    super({
      message: `Invalid attribute path: ${describeInput(path)}`,
      errorCode: ErrorCode.INVALID_ATTRIBUTE_PATH,
      context: { path: typeof path === 'string' ? path : undefined, value: path },
    });
  }

  get path(): string | undefined {
    return this.context?.path;
  }
}

/**
 * A deferred type name could not be resolved to a live type
 */
export class TypeResolutionError extends AttributeGroupError {
  constructor(typeName: string, cause?: Error) {
    super({
      message: `Type ${typeName} could not be resolved while converting type names`,
      errorCode: ErrorCode.TYPE_RESOLUTION_FAILED,
      context: { typeName },
      cause,
    });
  }

  get typeName(): string {
    return this.context?.typeName ?? '';
  }
}

/**
 * A node could not be produced while cloning or specializing a tree
 */
export class CloneError extends AttributeGroupError {
  constructor(params: ErrorParams<ErrorContext & { groupName: string }>) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.CLONE_FAILED });
  }
}

/**
 * Attributes that do not exist on the declared type
 */
export class ValidationError extends AttributeGroupError {
  public readonly failures: ValidationFailure[];

  constructor(params: ErrorParams & { failures: ValidationFailure[] }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.UNKNOWN_ATTRIBUTE,
      context: { failureCount: params.failures.length, ...params.context },
      severity: params.severity,
      cause: params.cause,
    });
    this.failures = params.failures;
  }
}

/**
 * Persisted group description that does not match the expected shape
 */
export class ParseError extends AttributeGroupError {
  public readonly issues: string[];

  constructor(params: ErrorParams & { issues?: string[] }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.DESCRIPTION_PARSE_FAILED,
    });
    this.issues = params.issues ?? [];
  }
}

/**
 * Invalid option values
 */
export class ConfigError extends AttributeGroupError {
  constructor(message: string, setting?: string) {
    super({
      message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: { setting },
    });
  }

  get setting(): string | undefined {
    const setting = this.context?.setting;
    return typeof setting === 'string' ? setting : undefined;
  }
}

/**
 * Individual validation failure details
 */
export interface ValidationFailure {
  path: string;
  message: string;
  typeName?: string;
}

export function isAttributeGroupError(
  error: unknown
): error is AttributeGroupError {
  return error instanceof AttributeGroupError;
}

export function createValidationFailure(
  path: string,
  message: string,
  typeName?: string
): ValidationFailure {
  return typeName === undefined
    ? { path, message }
    : { path, message, typeName };
}

function describeInput(input: unknown): string {
  if (typeof input === 'string') return JSON.stringify(input);
  if (Array.isArray(input)) return JSON.stringify(input);
  return String(input);
}

/**
 * A group nested inside itself has no finite description
 */
export class DescriptionCycleError extends AttributeGroupError {
  constructor(path: string, groupName: string) {
    super({
      message: `Group '${groupName}' at '${path}' contains itself and cannot be described`,
      errorCode: ErrorCode.CYCLIC_DESCRIPTION,
      context: { path, groupName },
    });
  }
}
