/**
 * Ordered evaluation contexts, outermost first, innermost last.
 * Nodes treat a stack as immutable and only ever extend a copy.
 */
export type ScopeStack = readonly unknown[];

/**
 * The "no value" sentinel test for scope extension: `null` and `undefined`.
 * `false`, `0` and `""` are values and do extend the stack.
 */
export function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/** Copy-on-extend: returns `scopes` itself for an absent candidate. */
export function extendScopes(scopes: ScopeStack, scope: unknown): ScopeStack {
  if (isAbsent(scope)) return scopes;
  const next = scopes.slice();
  next.push(scope);
  return next;
}

/** The innermost scope, or `undefined` for an empty stack. */
export function innermostScope(scopes: ScopeStack): unknown {
  return scopes.length === 0 ? undefined : scopes[scopes.length - 1];
}
