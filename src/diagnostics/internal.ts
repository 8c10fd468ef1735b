/**
 * Abort on a broken compiler invariant.
 *
 * These are programming errors, not user-facing diagnostics: nothing catches them inside the core.
 */
export function internalError(message: string): never {
  throw Object.assign(new Error(message), { name: 'InternalError' });
}
