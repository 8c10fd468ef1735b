import type { Node, NodeKind, NodeOfKind, ProbeNode, ScriptNode } from './ast.js';
import { isKind } from './ast.js';
import { internalError } from '../diagnostics/internal.js';
import type { Provider } from '../semantics/providers.js';

/**
 * First node of `kind` on the path from `node` (inclusive) up to the root.
 */
export function nearestAncestorOfKind<K extends NodeKind>(
  node: Node,
  kind: K,
): NodeOfKind<K> | undefined {
  for (let n: Node | undefined = node; n; n = n.parent) {
    if (isKind(n, kind)) return n;
  }
  return undefined;
}

/**
 * Top-level statement of the probe body (or the predicate) containing `node`.
 *
 * `node` must sit inside a probe.
 */
export function enclosingStatement(node: Node): Node {
  for (let n: Node | undefined = node; n; n = n.parent) {
    if (n.parent?.kind === 'probe') return n;
  }
  return internalError(`<${node.kind}> node is not inside a probe.`);
}

export function enclosingProbe(node: Node): ProbeNode | undefined {
  return nearestAncestorOfKind(node, 'probe');
}

export function enclosingScript(node: Node): ScriptNode | undefined {
  return nearestAncestorOfKind(node, 'script');
}

/**
 * Provider resolved for the probe containing `node`, if any.
 */
export function providerOf(node: Node): Provider | undefined {
  return enclosingProbe(node)?.dyn.provider;
}
