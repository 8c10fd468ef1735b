import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import type {
  CompileFn,
  CompilerOptions,
  CompileResult,
  PassContext,
  PipelineDeps,
} from './pipeline.js';

import { createNodeArena } from './frontend/arena.js';
import { dumpAst } from './frontend/dump.js';
import { createNodeFactory } from './frontend/factory.js';
import { freeNode } from './frontend/free.js';
import { parseScript } from './frontend/parse.js';
import { walk } from './frontend/walk.js';
import { resolveProviders } from './semantics/providers.js';
import { attachSymbols, createSymbolTable } from './semantics/symtab.js';

function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

/**
 * Compile script text that is already in memory.
 *
 * The tree lives for the duration of this call only: it is parsed, annotated by the passes in
 * order, optionally dumped, and freed exactly once at the end.
 */
export function compileSource(
  file: string,
  text: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult {
  const diagnostics: Diagnostic[] = [];
  const symbols = createSymbolTable();
  const arena = createNodeArena();

  const script = parseScript(file, text, deps.grammar, createNodeFactory(arena), diagnostics);
  if (!script) return { diagnostics, symbols, released: 0 };

  attachSymbols(script, symbols);
  if (options.providers) {
    resolveProviders(script, options.providers, diagnostics, file);
  }

  if (!hasErrors(diagnostics)) {
    const ctx: PassContext = { file, symbols, diagnostics };
    for (const pass of deps.passes) {
      const status = walk(script, pass.pre, pass.post, ctx);
      if (status !== 0) {
        diagnostics.push({
          id: DiagnosticIds.PassAborted,
          severity: 'error',
          message: `Pass "${pass.name}" aborted with status ${status}.`,
          file,
        });
        break;
      }
      if (hasErrors(diagnostics)) break;
    }
  }

  if (options.dumpAst) dumpAst(script, options.dumpStream);

  const released = freeNode(script, arena);
  return { diagnostics, symbols, released };
}

/**
 * Compile a probe script file.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const entryPath = resolve(entryFile);
  let text: string;
  try {
    text = await readFile(entryPath, 'utf8');
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          severity: 'error',
          message: `Failed to read script: ${String(err)}`,
          file: entryPath,
        },
      ],
      symbols: createSymbolTable(),
      released: 0,
    };
  }
  return compileSource(entryPath, text, options, deps);
};
