import type { TemplateContext } from "../model/context.js";
import type { ScopeStack } from "../model/scope.js";
import type { Node } from "../node/node.js";

/**
 * Per-node resolver bound to one name and compile-time context.
 * Returns `undefined` when no scope exposes the name.
 */
export interface Binding {
  get(scopes: ScopeStack): unknown;
}

/**
 * Value resolution capability consumed by nodes. Returning `null` means the
 * node gets no binding and resolves every non-self name to absent.
 */
export interface ObjectHandler {
  createBinding(name: string, context: TemplateContext, node: Node): Binding | null;
}
