export const DIAGNOSTIC_PHASES = {
  SPECIALIZE: 'specialize',
  RESTORE: 'restore',
  VALIDATE: 'validate',
  COMPARE: 'compare',
} as const;

export type DiagnosticPhase =
  (typeof DIAGNOSTIC_PHASES)[keyof typeof DIAGNOSTIC_PHASES];

export const DIAGNOSTIC_CODES = {
  CLONE_FAILED: 'CLONE_FAILED',
  TYPE_UNRESOLVED: 'TYPE_UNRESOLVED',
  SUPER_TYPE_UNRESOLVED: 'SUPER_TYPE_UNRESOLVED',
  UNKNOWN_ATTRIBUTE: 'UNKNOWN_ATTRIBUTE',
  SUPERSET_SHORT_CIRCUIT: 'SUPERSET_SHORT_CIRCUIT',
} as const;

export type DiagnosticCode =
  (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

const ALLOWED_PHASES: Record<DiagnosticCode, ReadonlySet<DiagnosticPhase>> = {
  CLONE_FAILED: new Set([DIAGNOSTIC_PHASES.SPECIALIZE]),
  TYPE_UNRESOLVED: new Set([DIAGNOSTIC_PHASES.VALIDATE]),
  SUPER_TYPE_UNRESOLVED: new Set([DIAGNOSTIC_PHASES.RESTORE]),
  UNKNOWN_ATTRIBUTE: new Set([DIAGNOSTIC_PHASES.VALIDATE]),
  SUPERSET_SHORT_CIRCUIT: new Set([DIAGNOSTIC_PHASES.COMPARE]),
};

export function getAllowedDiagnosticPhases(
  code: DiagnosticCode
): ReadonlySet<DiagnosticPhase> {
  return ALLOWED_PHASES[code];
}

export function isDiagnosticCode(value: string): value is DiagnosticCode {
  return Object.prototype.hasOwnProperty.call(ALLOWED_PHASES, value);
}
