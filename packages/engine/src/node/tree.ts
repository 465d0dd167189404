import { RenderError, RenderErrorCode } from "../shared/errors.js";
import type { Node, NodeContainer } from "./node.js";

/**
 * Default child container. Children can be replaced during compilation and
 * the init pass; after `seal()` the list is frozen and replacement throws.
 */
export class NodeTree implements NodeContainer {
  private children: readonly Node[] | null;
  private isSealed = false;

  constructor(children: readonly Node[] | null = null) {
    this.children = children === null ? null : children.slice();
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  getChildren(): readonly Node[] | null {
    return this.children;
  }

  setChildren(children: readonly Node[]): void {
    if (this.isSealed) {
      throw new RenderError(
        "Cannot replace children after the tree has been initialized",
        RenderErrorCode.TREE_SEALED,
      );
    }
    this.children = children.slice();
  }

  seal(): void {
    if (this.isSealed) return;
    this.isSealed = true;
    if (this.children !== null) {
      this.children = Object.freeze(this.children.slice());
    }
  }
}
