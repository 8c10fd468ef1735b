import type { Node } from './ast.js';
import { siblings } from './factory.js';

/**
 * Walk callback. `0` continues; any other status aborts the walk and is returned by it.
 */
export type WalkFn<C> = (node: Node, ctx: C) => number;

/**
 * Immediate children of `node` in traversal order, flattening sibling lists.
 *
 * This is the one description of tree shape: the walker, the dump and structural checks all
 * go through it.
 */
export function* children(node: Node): Generator<Node> {
  switch (node.kind) {
    case 'script':
      yield* siblings(node.probes);
      return;
    case 'probe':
      if (node.pred) yield node.pred;
      yield* siblings(node.stmts);
      return;
    case 'if':
      yield node.cond;
      yield* siblings(node.then);
      yield* siblings(node.els);
      return;
    case 'unroll':
      yield* siblings(node.stmts);
      return;
    case 'call':
    case 'rec':
      yield* siblings(node.vargs);
      return;
    case 'method':
      yield node.map;
      yield node.call;
      return;
    case 'assign':
      yield node.lval;
      if (node.expr) yield node.expr;
      return;
    case 'binop':
      yield node.left;
      yield node.right;
      return;
    case 'not':
      yield node.expr;
      return;
    case 'map':
      yield node.rec;
      return;
    case 'break':
    case 'continue':
    case 'return':
    case 'var':
    case 'str':
    case 'int':
    case 'stack':
      return;
  }
}

/**
 * Depth-first walk of the subtree at `node`.
 *
 * `pre` runs before the children and `post` after them. The first non-zero status from either
 * stops the walk: no further node is visited and no pending `post` runs.
 */
export function walk<C>(
  node: Node,
  pre: WalkFn<C> | undefined,
  post: WalkFn<C> | undefined,
  ctx: C,
): number {
  const status = pre ? pre(node, ctx) : 0;
  if (status !== 0) return status;

  for (const child of children(node)) {
    const err = walk(child, pre, post, ctx);
    if (err !== 0) return err;
  }

  return post ? post(node, ctx) : 0;
}
