/**
 * AST contracts for probe scripts.
 *
 * Nodes are plain objects discriminated by `kind`. Structure is fixed once a constructor in
 * `factory.ts` returns; later passes only write to the `dyn` annotation.
 */
import type { ProbeFrame } from '../lowering/frame.js';
import type { Provider } from '../semantics/providers.js';

export type NodeKind =
  | 'script'
  | 'probe'
  | 'if'
  | 'unroll'
  | 'break'
  | 'continue'
  | 'return'
  | 'call'
  | 'method'
  | 'assign'
  | 'binop'
  | 'not'
  | 'map'
  | 'var'
  | 'rec'
  | 'str'
  | 'int'
  | 'stack';

/**
 * Resolved value type of an annotation: `none` until a pass decides, then the kind of value held.
 */
export type ValueType = 'none' | NodeKind;

/**
 * Where a value lives in generated code.
 */
export type Location =
  | { kind: 'nowhere' }
  | { kind: 'virtual' }
  | { kind: 'reg'; reg: number }
  | { kind: 'stack'; addr: number };

/**
 * Mutable per-node record filled in by the passes that run after parsing.
 */
export interface Annotation {
  type: ValueType;
  /** Size in bytes. */
  size: number;
  loc: Location;
}

export interface ProbeAnnotation extends Annotation {
  frame: ProbeFrame;
  /** Set once the probe spec has been resolved. */
  provider?: Provider;
}

export type BinaryOp =
  | '=='
  | '!='
  | '>'
  | '>='
  | '<'
  | '<='
  | '+'
  | '-'
  | '*'
  | '/'
  | '|'
  | '&'
  | '<<'
  | '>>'
  | '%'
  | '^';

export interface OpInfo {
  /** Comparisons lower to conditional jumps, everything else to ALU instructions. */
  class: 'jmp' | 'alu';
  /** Operation bits of the instruction opcode. */
  code: number;
}

export const OP_TABLE: Readonly<Record<BinaryOp, OpInfo>> = {
  '==': { class: 'jmp', code: 0x10 },
  '!=': { class: 'jmp', code: 0x50 },
  '>': { class: 'jmp', code: 0x60 },
  '>=': { class: 'jmp', code: 0x70 },
  '<': { class: 'jmp', code: 0xc0 },
  '<=': { class: 'jmp', code: 0xd0 },
  '+': { class: 'alu', code: 0x00 },
  '-': { class: 'alu', code: 0x10 },
  '*': { class: 'alu', code: 0x20 },
  '/': { class: 'alu', code: 0x30 },
  '|': { class: 'alu', code: 0x40 },
  '&': { class: 'alu', code: 0x50 },
  '<<': { class: 'alu', code: 0x60 },
  '>>': { class: 'alu', code: 0x70 },
  '%': { class: 'alu', code: 0x90 },
  '^': { class: 'alu', code: 0xa0 },
};

/**
 * Base shape for all AST nodes.
 *
 * `parent` is a back-reference only; a node is owned by exactly one child slot or sibling chain.
 */
export interface BaseNode {
  kind: NodeKind;
  parent?: Node;
  /** Following sibling in a statement, argument or probe list. */
  next?: Node;
}

/**
 * Nodes whose annotation belongs to the node itself.
 */
export interface OwnedNode extends BaseNode {
  dyn: Annotation;
}

/**
 * Map and var nodes alias the symbol table's annotation for their name.
 *
 * `dyn` stays unset until the symbol is attached.
 */
export interface SymbolNode extends BaseNode {
  name: string;
  dyn?: Annotation;
}

export interface ScriptNode extends OwnedNode {
  kind: 'script';
  probes?: ProbeNode;
}

export interface ProbeNode extends BaseNode {
  kind: 'probe';
  /** Probe specification, e.g. `kprobe:do_sys_open`. */
  spec: string;
  pred?: Node;
  stmts?: Node;
  dyn: ProbeAnnotation;
}

export interface IfNode extends OwnedNode {
  kind: 'if';
  cond: Node;
  then?: Node;
  /** Last statement of `then`, cached at construction. */
  thenLast?: Node;
  els?: Node;
}

export interface UnrollNode extends OwnedNode {
  kind: 'unroll';
  count: number;
  stmts?: Node;
}

export interface BreakNode extends OwnedNode {
  kind: 'break';
}

export interface ContinueNode extends OwnedNode {
  kind: 'continue';
}

export interface ReturnNode extends OwnedNode {
  kind: 'return';
}

export interface CallNode extends OwnedNode {
  kind: 'call';
  /** `undefined` lets later passes pick the module; `method` marks a map method call. */
  module?: string;
  func: string;
  vargs?: Node;
  nVargs: number;
}

export interface MethodNode extends OwnedNode {
  kind: 'method';
  map: MapNode;
  call: CallNode;
}

export interface AssignNode extends OwnedNode {
  kind: 'assign';
  op: '=';
  lval: Node;
  expr?: Node;
}

export interface BinopNode extends OwnedNode {
  kind: 'binop';
  op: BinaryOp;
  left: Node;
  right: Node;
}

export interface NotNode extends OwnedNode {
  kind: 'not';
  expr: Node;
}

export interface MapNode extends SymbolNode {
  kind: 'map';
  rec: RecNode;
}

export interface VarNode extends SymbolNode {
  kind: 'var';
}

/**
 * Ordered key tuple of a map.
 */
export interface RecNode extends OwnedNode {
  kind: 'rec';
  vargs?: Node;
  nVargs: number;
}

export interface StrNode extends OwnedNode {
  kind: 'str';
  value: string;
}

export interface IntNode extends OwnedNode {
  kind: 'int';
  value: bigint;
}

/**
 * Value spilled to the stack by code generation. Never produced by a grammar.
 */
export interface StackNode extends OwnedNode {
  kind: 'stack';
}

export type Node =
  | ScriptNode
  | ProbeNode
  | IfNode
  | UnrollNode
  | BreakNode
  | ContinueNode
  | ReturnNode
  | CallNode
  | MethodNode
  | AssignNode
  | BinopNode
  | NotNode
  | MapNode
  | VarNode
  | RecNode
  | StrNode
  | IntNode
  | StackNode;

export type NodeOfKind<K extends NodeKind> = Extract<Node, { kind: K }>;

export function isKind<K extends NodeKind>(node: Node, kind: K): node is NodeOfKind<K> {
  return node.kind === kind;
}

/**
 * Whether `node.dyn` belongs to the node rather than to the symbol table.
 */
export function ownsAnnotation(node: Node): boolean {
  return node.kind !== 'map' && node.kind !== 'var';
}

export function newAnnotation(): Annotation {
  return { type: 'none', size: 0, loc: { kind: 'nowhere' } };
}
