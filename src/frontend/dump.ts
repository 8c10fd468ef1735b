import type { Annotation, Location, Node } from './ast.js';
import { newAnnotation } from './ast.js';
import { children, walk } from './walk.js';
import { internalError } from '../diagnostics/internal.js';

/**
 * Anything text can be written to; `process.stderr` by default.
 */
export interface DumpStream {
  write(chunk: string): unknown;
}

function toHex(n: number): string {
  return n.toString(16);
}

function formatInt(value: bigint): string {
  if (value === 0n) return '0';
  return `0x${BigInt.asUintN(64, value).toString(16)}`;
}

/**
 * Quote `s`, escaping every byte of its UTF-8 form outside printable ASCII.
 */
export function escapeString(s: string): string {
  let out = '"';
  for (const byte of Buffer.from(s, 'utf8')) {
    if (byte >= 0x20 && byte <= 0x7e) {
      out += String.fromCharCode(byte);
      continue;
    }
    switch (byte) {
      case 0x0a:
        out += '\\n';
        break;
      case 0x0d:
        out += '\\r';
        break;
      case 0x09:
        out += '\\t';
        break;
      default:
        out += `\\x${byte.toString(16).padStart(2, '0')}`;
        break;
    }
  }
  return `${out}"`;
}

function summary(node: Node): string {
  switch (node.kind) {
    case 'script':
    case 'method':
    case 'if':
    case 'break':
    case 'continue':
    case 'return':
    case 'not':
    case 'rec':
      return `<${node.kind}> `;
    case 'probe':
      return `${node.spec} `;
    case 'map':
    case 'var':
      return `${node.name} `;
    case 'assign':
    case 'binop':
      return `${node.op} `;
    case 'unroll':
      return `unroll (${node.count}) `;
    case 'call':
      return `${node.module ?? '<auto>'}.${node.func} `;
    case 'int':
      return `${formatInt(node.value)} `;
    case 'str':
      return `${escapeString(node.value)} `;
    case 'stack':
      return internalError('Stack values only exist after code generation and cannot be dumped.');
  }
}

function locationSuffix(loc: Location): string {
  switch (loc.kind) {
    case 'nowhere':
    case 'virtual':
      return '';
    case 'reg':
      return `/${loc.reg}`;
    case 'stack':
      return `/-0x${toHex(-loc.addr)}`;
  }
}

/**
 * One-line summary of `node` followed by its annotation block.
 *
 * Map and var nodes without an attached symbol print as unresolved.
 */
export function formatNode(node: Node): string {
  const dyn: Annotation = node.dyn ?? newAnnotation();
  return (
    `${summary(node)}(type:${node.kind}/${dyn.type} size:0x${toHex(dyn.size)} ` +
    `loc:${dyn.loc.kind}${locationSuffix(dyn.loc)})`
  );
}

// A node has a next when a later child slot of its parent is filled.
function hasNext(node: Node): boolean {
  if (node.next) return true;
  if (!node.parent) return false;
  const slots = [...children(node.parent)];
  const at = slots.indexOf(node);
  return at >= 0 && at < slots.length - 1;
}

interface DumpState {
  lines: string[];
  /** For every open ancestor level: whether that ancestor has a following sibling. */
  open: boolean[];
}

/**
 * Render the subtree at `node` as a tree diagram, one node per line.
 */
export function formatAst(node: Node): string {
  const state: DumpState = { lines: ['ast:'], open: [] };
  walk(
    node,
    (n, s: DumpState) => {
      const more = s.open.length > 0 && hasNext(n);
      const rails = s.open.map((o) => (o ? '|   ' : '    ')).join('');
      s.lines.push(`${rails}${more ? '|' : '`'}-> ${formatNode(n)}`);
      s.open.push(more);
      return 0;
    },
    (_n, s: DumpState) => {
      s.open.pop();
      return 0;
    },
    state,
  );
  return `${state.lines.join('\n')}\n`;
}

export function dumpAst(node: Node, out: DumpStream = process.stderr): void {
  out.write(formatAst(node));
}
