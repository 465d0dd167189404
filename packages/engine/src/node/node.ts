import type { ScopeStack } from "../model/scope.js";
import type { Writer } from "../model/writer.js";

/**
 * A compiled unit of template structure.
 *
 * Every node kind shares this contract: it can run against a scope stack,
 * regenerate the markup it came from, and hold children supplied by its
 * container.
 */
export interface Node {
  /** Identifier inside the tag; `null` for anonymous and root nodes. */
  readonly name: string | null;
  /** Tag marker written after the open delimiter (`""`, `"#"`, `"^"`, ...). */
  readonly kind: string;
  /** Literal text emitted after this node's content, if any was appended. */
  readonly trailingText: string | null;

  /** One-time recursive setup. Repeated calls are no-ops. */
  init(): void;

  get(scopes: ScopeStack): unknown;

  execute(writer: Writer, scopes: ScopeStack): Writer;

  /** Execute against a one-element stack holding `scope`. */
  render(writer: Writer, scope: unknown): Writer;

  /** Write the template source this node and its subtree were compiled from. */
  identity(writer: Writer): void;

  append(text: string): void;

  getChildren(): readonly Node[] | null;

  setChildren(children: readonly Node[]): void;

  /** Shallow copy sharing children and binding. */
  duplicate(): Node;
}

/**
 * Owner of a node's ordered children. Mutable only until sealed.
 */
export interface NodeContainer {
  readonly sealed: boolean;
  getChildren(): readonly Node[] | null;
  setChildren(children: readonly Node[]): void;
  seal(): void;
}
