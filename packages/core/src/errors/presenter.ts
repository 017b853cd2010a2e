/**
 * ErrorPresenter - pure presentation layer for AttributeGroupError instances
 * - No business logic; formats into environment-specific view objects
 */

import { ErrorCode } from './codes.js';
import {
  ParseError,
  ValidationError,
  type AttributeGroupError,
  type ErrorContext,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  path?: string;
  details: string[];
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

const WORKAROUNDS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.INVALID_ATTRIBUTE_PATH]:
    'Use dot-separated attribute names without empty or padded segments',
  [ErrorCode.TYPE_RESOLUTION_FAILED]:
    'Register the type with the resolver before restoring the description',
  [ErrorCode.DESCRIPTION_PARSE_FAILED]:
    'Check the description file against the group description schema',
  [ErrorCode.CYCLIC_DESCRIPTION]:
    'Break the self-nesting before describing the group',
};

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: AttributeGroupError): CLIErrorView {
    const path = readString(error.context, 'path');
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      path,
      details: this.#details(error),
      workaround: WORKAROUNDS[error.errorCode],
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth ?? process.stdout.columns ?? 80,
    };
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    const path = readString(ctx, 'path');
    if (path !== undefined && path !== '') return `Location: ${path}`;
    const groupName = readString(ctx, 'groupName');
    return groupName ? `Group: ${groupName}` : undefined;
  }

  #details(error: AttributeGroupError): string[] {
    if (error instanceof ValidationError) {
      return error.failures.map((f) => `${f.path}: ${f.message}`);
    }
    if (error instanceof ParseError && error.issues.length > 0) {
      return [...error.issues];
    }
    return error.cause ? [`caused by: ${error.cause.message}`] : [];
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}

function readString(
  ctx: ErrorContext | undefined,
  key: string
): string | undefined {
  const value = ctx?.[key];
  return typeof value === 'string' ? value : undefined;
}

export default ErrorPresenter;
