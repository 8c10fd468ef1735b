import type { Diagnostic } from './diagnostics/types.js';
import type { DumpStream } from './frontend/dump.js';
import type { Grammar } from './frontend/parse.js';
import type { WalkFn } from './frontend/walk.js';
import type { Provider } from './semantics/providers.js';
import type { SymbolTable } from './semantics/symtab.js';

/**
 * Options that influence compilation behavior.
 */
export interface CompilerOptions {
  /** Write the tree to `dumpStream` after the passes have run. */
  dumpAst?: boolean;
  /** Diagnostic stream for tree dumps (defaults to stderr). */
  dumpStream?: DumpStream;
  /** Providers probe specs may name. Without any, provider resolution is skipped. */
  providers?: Provider[];
}

/**
 * State handed to every pass callback.
 */
export interface PassContext {
  file: string;
  symbols: SymbolTable;
  diagnostics: Diagnostic[];
}

/**
 * A later compiler stage (type inference, code generation, ...) expressed as walker callbacks.
 *
 * Passes may write to node annotations; they never change tree structure.
 */
export interface Pass {
  name: string;
  pre?: WalkFn<PassContext>;
  post?: WalkFn<PassContext>;
}

/**
 * Result of a compilation run.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  /** Symbols of the script; their annotations stay valid after the tree is gone. */
  symbols: SymbolTable;
  /** Nodes released when the tree was freed (0 when nothing was parsed). */
  released: number;
}

/**
 * Dependency injection surface for the compiler pipeline.
 */
export interface PipelineDeps {
  grammar: Grammar;
  passes: Pass[];
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
