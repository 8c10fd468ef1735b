import type {
  AssignNode,
  BinaryOp,
  BinopNode,
  BreakNode,
  CallNode,
  ContinueNode,
  IfNode,
  IntNode,
  MapNode,
  MethodNode,
  Node,
  NotNode,
  ProbeNode,
  RecNode,
  ReturnNode,
  ScriptNode,
  StackNode,
  StrNode,
  UnrollNode,
  VarNode,
} from './ast.js';
import { newAnnotation } from './ast.js';
import type { NodeArena } from './arena.js';
import { createNodeArena } from './arena.js';
import { internalError } from '../diagnostics/internal.js';
import { newProbeFrame } from '../lowering/frame.js';

/**
 * Iterate a sibling chain. `next` is read before each element is handed out.
 */
export function* siblings(head: Node | undefined): Generator<Node> {
  let n = head;
  while (n) {
    const next = n.next;
    yield n;
    n = next;
  }
}

/**
 * Append `node` to the chain starting at `head` and return the chain's head.
 */
export function appendNode(head: Node | undefined, node: Node): Node {
  if (node.next || node.parent) {
    internalError(`Node <${node.kind}> is already linked.`);
  }
  if (!head) return node;
  let tail = head;
  while (tail.next) {
    if (tail === node) internalError(`Node <${node.kind}> appended to its own chain.`);
    tail = tail.next;
  }
  if (tail === node) internalError(`Node <${node.kind}> appended to its own chain.`);
  tail.next = node;
  return head;
}

/**
 * Chain nodes in order; `undefined` for an empty list.
 */
export function linkNodes<T extends Node[]>(...nodes: T): T[number] | undefined {
  let head: T[number] | undefined;
  for (const n of nodes) {
    appendNode(head, n);
    if (!head) head = n;
  }
  return head;
}

/**
 * Node constructors handed to a grammar.
 *
 * Each takes ownership of the nodes passed in and points their `parent` at the new node. No
 * constructor checks arity or types; later passes do.
 */
export interface NodeFactory {
  readonly arena: NodeArena;
  str(value: string): StrNode;
  int(value: bigint | number): IntNode;
  /** Without arguments the record holds one empty-string key, the key of an unkeyed map. */
  rec(vargs?: Node): RecNode;
  map(name: string, rec?: RecNode): MapNode;
  var(name: string): VarNode;
  not(expr: Node): NotNode;
  binop(left: Node, op: BinaryOp, right: Node): BinopNode;
  assign(lval: Node, expr?: Node): AssignNode;
  method(map: MapNode, call: CallNode): MethodNode;
  call(module: string | undefined, func: string, vargs?: Node): CallNode;
  if(cond: Node, then?: Node, els?: Node): IfNode;
  unroll(count: number, stmts?: Node): UnrollNode;
  break(): BreakNode;
  continue(): ContinueNode;
  return(): ReturnNode;
  probe(spec: string, pred: Node | undefined, stmts?: Node): ProbeNode;
  script(probes?: ProbeNode): ScriptNode;
  stack(): StackNode;
}

export function createNodeFactory(arena: NodeArena = createNodeArena()): NodeFactory {
  const adopt = <T extends Node>(node: T): T => arena.adopt(node);

  const adoptChild = (parent: Node, child: Node | undefined): void => {
    if (child) child.parent = parent;
  };

  // Stamps `parent` on every element and returns how many there were.
  const adoptList = (parent: Node, head: Node | undefined): number => {
    let count = 0;
    for (const c of siblings(head)) {
      c.parent = parent;
      count++;
    }
    return count;
  };

  const str = (value: string): StrNode => adopt({ kind: 'str', value, dyn: newAnnotation() });

  const rec = (vargs?: Node): RecNode => {
    const n: RecNode = adopt({
      kind: 'rec',
      vargs: vargs ?? str(''),
      nVargs: 0,
      dyn: newAnnotation(),
    });
    n.nVargs = adoptList(n, n.vargs);
    return n;
  };

  const call = (module: string | undefined, func: string, vargs?: Node): CallNode => {
    const n: CallNode = adopt({
      kind: 'call',
      ...(module !== undefined ? { module } : {}),
      func,
      ...(vargs ? { vargs } : {}),
      nVargs: 0,
      dyn: newAnnotation(),
    });
    n.nVargs = adoptList(n, vargs);
    return n;
  };

  return {
    arena,
    str,
    int: (value) => {
      if (typeof value === 'number' && !Number.isSafeInteger(value)) {
        internalError(`Integer literal must be a whole number (got ${value}).`);
      }
      return adopt({ kind: 'int', value: BigInt.asIntN(64, BigInt(value)), dyn: newAnnotation() });
    },
    rec,
    map: (name, key) => {
      const n: MapNode = adopt({ kind: 'map', name, rec: key ?? rec() });
      adoptChild(n, n.rec);
      return n;
    },
    var: (name) => adopt({ kind: 'var', name }),
    not: (expr) => {
      const n: NotNode = adopt({ kind: 'not', expr, dyn: newAnnotation() });
      adoptChild(n, expr);
      return n;
    },
    binop: (left, op, right) => {
      const n: BinopNode = adopt({ kind: 'binop', op, left, right, dyn: newAnnotation() });
      adoptChild(n, left);
      adoptChild(n, right);
      return n;
    },
    assign: (lval, expr) => {
      const n: AssignNode = adopt({
        kind: 'assign',
        op: '=',
        lval,
        ...(expr ? { expr } : {}),
        dyn: newAnnotation(),
      });
      adoptChild(n, lval);
      adoptChild(n, expr);
      return n;
    },
    method: (map, inner) => {
      inner.module = 'method';
      const n: MethodNode = adopt({ kind: 'method', map, call: inner, dyn: newAnnotation() });
      adoptChild(n, map);
      adoptChild(n, inner);
      return n;
    },
    call,
    if: (cond, then, els) => {
      const n: IfNode = adopt({
        kind: 'if',
        cond,
        ...(then ? { then } : {}),
        ...(els ? { els } : {}),
        dyn: newAnnotation(),
      });
      adoptChild(n, cond);
      for (const c of siblings(then)) {
        c.parent = n;
        if (!c.next) n.thenLast = c;
      }
      adoptList(n, els);
      return n;
    },
    unroll: (count, stmts) => {
      if (!Number.isSafeInteger(count) || count < 0) {
        internalError(`Unroll count must be a non-negative integer (got ${count}).`);
      }
      const n: UnrollNode = adopt({
        kind: 'unroll',
        count,
        ...(stmts ? { stmts } : {}),
        dyn: newAnnotation(),
      });
      adoptList(n, stmts);
      return n;
    },
    break: () => adopt({ kind: 'break', dyn: newAnnotation() }),
    continue: () => adopt({ kind: 'continue', dyn: newAnnotation() }),
    return: () => adopt({ kind: 'return', dyn: newAnnotation() }),
    probe: (spec, pred, stmts) => {
      const n: ProbeNode = adopt({
        kind: 'probe',
        spec,
        ...(pred ? { pred } : {}),
        ...(stmts ? { stmts } : {}),
        dyn: { ...newAnnotation(), frame: newProbeFrame() },
      });
      adoptChild(n, pred);
      adoptList(n, stmts);
      return n;
    },
    script: (probes) => {
      const n: ScriptNode = adopt({
        kind: 'script',
        ...(probes ? { probes } : {}),
        dyn: newAnnotation(),
      });
      adoptList(n, probes);
      return n;
    },
    stack: () => adopt({ kind: 'stack', dyn: newAnnotation() }),
  };
}
