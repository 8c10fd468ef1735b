export * from './frontend/ast.js';
export { createNodeArena } from './frontend/arena.js';
export type { NodeArena } from './frontend/arena.js';
export { appendNode, createNodeFactory, linkNodes, siblings } from './frontend/factory.js';
export type { NodeFactory } from './frontend/factory.js';
export { children, walk } from './frontend/walk.js';
export type { WalkFn } from './frontend/walk.js';
export {
  enclosingProbe,
  enclosingScript,
  enclosingStatement,
  nearestAncestorOfKind,
  providerOf,
} from './frontend/query.js';
export { dumpAst, escapeString, formatAst, formatNode } from './frontend/dump.js';
export type { DumpStream } from './frontend/dump.js';
export { freeNode } from './frontend/free.js';
export { parseScript } from './frontend/parse.js';
export type { Grammar } from './frontend/parse.js';
export {
  acquireRegister,
  acquireStack,
  createRegisterAllocator,
  createStackAllocator,
  newProbeFrame,
  SCRATCH_REGISTERS,
} from './lowering/frame.js';
export type {
  ProbeFrame,
  RegisterAllocator,
  RegisterClass,
  StackAllocator,
} from './lowering/frame.js';
export { attachSymbols, createSymbolTable } from './semantics/symtab.js';
export type { SymbolTable } from './semantics/symtab.js';
export { providerName, resolveProviders } from './semantics/providers.js';
export type { Provider } from './semantics/providers.js';
export { DiagnosticIds } from './diagnostics/types.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { internalError } from './diagnostics/internal.js';
export { formatDiagnostic, reportDiagnostics } from './diagnostics/report.js';
export { compile, compileSource } from './compile.js';
export type {
  CompileFn,
  CompileResult,
  CompilerOptions,
  Pass,
  PassContext,
  PipelineDeps,
} from './pipeline.js';
