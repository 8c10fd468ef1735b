import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { ScriptNode } from '../frontend/ast.js';
import { siblings } from '../frontend/factory.js';

/**
 * A trace source a probe can attach to (kprobes, tracepoints, ...).
 *
 * Providers are resolved here by name only; what they do with a probe is up to them.
 */
export interface Provider {
  name: string;
}

/**
 * Provider part of a probe spec: the text before the first `:`, or the whole spec.
 */
export function providerName(spec: string): string {
  const colon = spec.indexOf(':');
  return colon >= 0 ? spec.slice(0, colon) : spec;
}

/**
 * Store the matching provider in every probe's annotation.
 *
 * Probes naming an unknown provider are reported and left unresolved. Returns the number resolved.
 */
export function resolveProviders(
  script: ScriptNode,
  providers: readonly Provider[],
  diagnostics: Diagnostic[],
  file: string,
): number {
  const byName = new Map(providers.map((p) => [p.name, p]));
  let resolved = 0;
  for (const probe of siblings(script.probes)) {
    if (probe.kind !== 'probe') continue;
    const name = providerName(probe.spec);
    const provider = byName.get(name);
    if (!provider) {
      diagnostics.push({
        id: DiagnosticIds.UnknownProvider,
        severity: 'error',
        message: `Unknown provider "${name}" in probe "${probe.spec}".`,
        file,
      });
      continue;
    }
    probe.dyn.provider = provider;
    resolved++;
  }
  return resolved;
}
