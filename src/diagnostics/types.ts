/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic (error/warning/info) tied to the script file it was raised for.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `PRB001`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Failed to read a script file from disk. */
  IoReadFailed: 'PRB001',

  /** The grammar threw while building the tree. */
  InternalParseError: 'PRB002',

  /** The grammar produced no tree. */
  ParseError: 'PRB100',

  /** A probe spec names a provider nobody registered. */
  UnknownProvider: 'PRB200',

  /** A pass callback returned a non-zero status. */
  PassAborted: 'PRB300',

  /** No scratch register left for a probe (expression too complex). */
  RegisterExhausted: 'PRB301',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
