import type { Diagnostic } from './types.js';
import type { DumpStream } from '../frontend/dump.js';

function severityRank(severity: Diagnostic['severity']): number {
  if (severity === 'error') return 0;
  if (severity === 'warning') return 1;
  return 2;
}

function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = a.file.localeCompare(b.file);
  if (fileCmp !== 0) return fileCmp;

  const sevCmp = severityRank(a.severity) - severityRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export function formatDiagnostic(d: Diagnostic): string {
  return `${d.file}: ${d.severity}: [${d.id}] ${d.message}`;
}

/**
 * Write diagnostics in a stable order, one per line. Returns whether any of them is an error.
 */
export function reportDiagnostics(
  diagnostics: Diagnostic[],
  out: DumpStream = process.stderr,
): boolean {
  const sorted = [...diagnostics].sort(compareDiagnostics);
  for (const d of sorted) out.write(`${formatDiagnostic(d)}\n`);
  return sorted.some((d) => d.severity === 'error');
}
