import { isAbsent, type ScopeStack } from "../model/scope.js";
import type { Writer } from "../model/writer.js";
import { DefaultNode, TagMarker, type NodeInit, type SharedNodeState } from "./default-node.js";

export type SectionNodeInit = Omit<NodeInit, "kind">;

/**
 * Section tag. Arrays render the children once per element with the element
 * as the innermost scope; `true` renders them once in the current scope; any
 * other present value renders them once with the value pushed as a scope.
 * `null`, `undefined`, `false` and `""` render only the trailing text.
 */
export class SectionNode extends DefaultNode {
  constructor(init: SectionNodeInit = {}, shared?: SharedNodeState) {
    super({ ...init, kind: TagMarker.SECTION }, shared);
  }

  override execute(writer: Writer, scopes: ScopeStack): Writer {
    const value = this.get(scopes);
    if (Array.isArray(value)) {
      for (const item of value) {
        writer = this.runChildren(writer, this.addScope(scopes, item));
      }
    } else if (value === true) {
      writer = this.runChildren(writer, scopes);
    } else if (!isAbsent(value) && value !== false && value !== "") {
      writer = this.runChildren(writer, this.addScope(scopes, value));
    }
    return this.appendText(writer);
  }

  override duplicate(): SectionNode {
    const { kind: _kind, ...init } = this.nodeInit();
    return new SectionNode(init, this.sharedState());
  }
}
