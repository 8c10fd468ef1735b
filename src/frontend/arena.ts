import type { Annotation, Node } from './ast.js';
import { ownsAnnotation } from './ast.js';
import { internalError } from '../diagnostics/internal.js';

/**
 * Owner of every node, and every node-owned annotation, built for one script.
 *
 * Shared map/var annotations belong to the symbol table and are never tracked here.
 */
export interface NodeArena {
  adopt<T extends Node>(node: T): T;
  release(node: Node): void;
  owns(node: Node): boolean;
  readonly liveNodes: number;
  readonly liveAnnotations: number;
}

export function createNodeArena(): NodeArena {
  // Owned annotation as adopted, so a pass that swaps `dyn` cannot strand the original.
  const nodes = new Map<Node, Annotation | undefined>();
  let annotations = 0;

  return {
    adopt: <T extends Node>(node: T): T => {
      if (nodes.has(node)) internalError(`Node <${node.kind}> adopted twice.`);
      const dyn = ownsAnnotation(node) ? node.dyn : undefined;
      nodes.set(node, dyn);
      if (dyn) annotations++;
      return node;
    },
    release: (node) => {
      if (!nodes.has(node)) internalError(`Node <${node.kind}> released but not live.`);
      if (nodes.get(node)) annotations--;
      nodes.delete(node);
    },
    owns: (node) => nodes.has(node),
    get liveNodes() {
      return nodes.size;
    },
    get liveAnnotations() {
      return annotations;
    },
  };
}
