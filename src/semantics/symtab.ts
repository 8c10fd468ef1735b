import type { Annotation, ScriptNode } from '../frontend/ast.js';
import { newAnnotation } from '../frontend/ast.js';
import { walk } from '../frontend/walk.js';

/**
 * Annotation records shared by every map/var node naming the same symbol.
 *
 * The table, not the nodes, owns these records; they outlive the tree.
 */
export interface SymbolTable {
  /**
   * The record for `name`, created on first use. The same name always yields the same record.
   */
  annotationFor(name: string): Annotation;
  get(name: string): Annotation | undefined;
  names(): string[];
  readonly size: number;
}

export function createSymbolTable(): SymbolTable {
  const entries = new Map<string, Annotation>();
  return {
    annotationFor: (name) => {
      const existing = entries.get(name);
      if (existing) return existing;
      const created = newAnnotation();
      entries.set(name, created);
      return created;
    },
    get: (name) => entries.get(name),
    names: () => [...entries.keys()],
    get size() {
      return entries.size;
    },
  };
}

/**
 * Point every map/var node in `script` at its shared record. Returns the number of nodes attached.
 */
export function attachSymbols(script: ScriptNode, symbols: SymbolTable): number {
  const state = { attached: 0 };
  walk(
    script,
    (n, s: typeof state) => {
      if (n.kind === 'map' || n.kind === 'var') {
        n.dyn = symbols.annotationFor(n.name);
        s.attached++;
      }
      return 0;
    },
    undefined,
    state,
  );
  return state.attached;
}
