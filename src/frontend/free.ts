import type { Node } from './ast.js';
import type { NodeArena } from './arena.js';
import { walk } from './walk.js';

/**
 * Release the whole subtree at `root` from `arena` in one post-order pass.
 *
 * Children go before their parent. Owned annotations go with their node; shared map/var
 * annotations stay with the symbol table. Returns the number of nodes released.
 */
export function freeNode(root: Node, arena: NodeArena): number {
  const state = { released: 0 };
  walk(
    root,
    undefined,
    (n, s: typeof state) => {
      arena.release(n);
      s.released++;
      return 0;
    },
    state,
  );
  return state.released;
}
