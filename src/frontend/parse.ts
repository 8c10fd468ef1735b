import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { ScriptNode } from './ast.js';
import type { NodeFactory } from './factory.js';

/**
 * Surface syntax of the language. Builds a tree bottom-up through the factory only.
 *
 * Returns `undefined` when the text could not be parsed; it may push its own diagnostics first.
 */
export interface Grammar {
  parse(
    file: string,
    text: string,
    ast: NodeFactory,
    diagnostics: Diagnostic[],
  ): ScriptNode | undefined;
}

/**
 * Parse one script. Either a fully linked tree comes back or nothing does.
 */
export function parseScript(
  file: string,
  text: string,
  grammar: Grammar,
  ast: NodeFactory,
  diagnostics: Diagnostic[],
): ScriptNode | undefined {
  const before = diagnostics.length;
  let script: ScriptNode | undefined;
  try {
    script = grammar.parse(file, text, ast, diagnostics);
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.InternalParseError,
      severity: 'error',
      message: `Internal error during parse: ${String(err)}`,
      file,
    });
    return undefined;
  }

  if (!script) {
    if (diagnostics.length === before) {
      diagnostics.push({
        id: DiagnosticIds.ParseError,
        severity: 'error',
        message: 'Failed to parse script.',
        file,
      });
    }
    return undefined;
  }
  return script;
}
