import {
  getAllowedDiagnosticPhases,
  type DiagnosticCode,
  type DiagnosticPhase,
} from './codes.js';

export interface GroupDiagnostic<Details = Record<string, unknown>> {
  code: DiagnosticCode;
  /** Attribute path of the node concerned, '' for a root group */
  path: string;
  phase: DiagnosticPhase;
  details?: Details;
}

export type DiagnosticSink = (diagnostic: GroupDiagnostic) => void;

export const consoleSink: DiagnosticSink = (diagnostic) => {
  const where = diagnostic.path === '' ? '<root>' : diagnostic.path;
  const details = diagnostic.details
    ? ` ${JSON.stringify(diagnostic.details)}`
    : '';
  console.warn(
    `[attrgroups] ${diagnostic.phase} ${diagnostic.code} ${where}${details}`
  );
};

export const silentSink: DiagnosticSink = () => {};

export interface CollectingSink {
  sink: DiagnosticSink;
  readonly diagnostics: GroupDiagnostic[];
  codes(): DiagnosticCode[];
}

export function createCollectingSink(): CollectingSink {
  const diagnostics: GroupDiagnostic[] = [];
  return {
    diagnostics,
    sink: (diagnostic) => {
      diagnostics.push(diagnostic);
    },
    codes: () => diagnostics.map((entry) => entry.code),
  };
}

/**
 * Emit after checking the code is registered for the phase.
 * A mismatch is a programming error in this package.
 */
export function emitDiagnostic(
  sink: DiagnosticSink,
  diagnostic: GroupDiagnostic
): void {
  if (!getAllowedDiagnosticPhases(diagnostic.code).has(diagnostic.phase)) {
    throw new Error(
      `Diagnostic ${diagnostic.code} is not allowed in phase ${diagnostic.phase}`
    );
  }
  sink(diagnostic);
}
