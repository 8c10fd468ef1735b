import { describe, expect, it } from 'vitest';

import { formatDiagnostic, reportDiagnostics } from '../src/diagnostics/report.js';
import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';

describe('diagnostic reporting', () => {
  it('formats one diagnostic per line', () => {
    expect(
      formatDiagnostic({
        id: DiagnosticIds.UnknownProvider,
        severity: 'error',
        message: 'Unknown provider "usdt" in probe "usdt:x".',
        file: 'a.ply',
      }),
    ).toBe('a.ply: error: [PRB200] Unknown provider "usdt" in probe "usdt:x".');
  });

  it('writes diagnostics sorted by file, severity and id', () => {
    const diagnostics: Diagnostic[] = [
      { id: DiagnosticIds.PassAborted, severity: 'error', message: 'late', file: 'b.ply' },
      { id: DiagnosticIds.ParseError, severity: 'warning', message: 'soft', file: 'a.ply' },
      { id: DiagnosticIds.UnknownProvider, severity: 'error', message: 'hard', file: 'a.ply' },
      { id: DiagnosticIds.IoReadFailed, severity: 'error', message: 'first', file: 'a.ply' },
    ];
    const lines: string[] = [];

    const failed = reportDiagnostics(diagnostics, { write: (c: string) => lines.push(c) });

    expect(failed).toBe(true);
    expect(lines).toEqual([
      'a.ply: error: [PRB001] first\n',
      'a.ply: error: [PRB200] hard\n',
      'a.ply: warning: [PRB100] soft\n',
      'b.ply: error: [PRB300] late\n',
    ]);
  });

  it('reports success when there are only warnings', () => {
    const lines: string[] = [];
    const failed = reportDiagnostics(
      [{ id: DiagnosticIds.ParseError, severity: 'info', message: 'note', file: 'x.ply' }],
      { write: (c: string) => lines.push(c) },
    );
    expect(failed).toBe(false);
    expect(lines).toEqual(['x.ply: info: [PRB100] note\n']);
  });
});
