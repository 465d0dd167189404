import { isAbsent, type ScopeStack } from "../model/scope.js";
import { writeText, type Writer } from "../model/writer.js";
import { DefaultNode, TagMarker, type NodeInit, type SharedNodeState } from "./default-node.js";

export interface ValueNodeInit extends Omit<NodeInit, "kind" | "container"> {
  /** HTML-escape the value. Defaults to true; false uses the `&` marker. */
  escape?: boolean;
}

/**
 * Variable tag: writes the resolved value, then the trailing text.
 * Absent values write nothing.
 */
export class ValueNode extends DefaultNode {
  readonly escape: boolean;

  constructor(init: ValueNodeInit = {}, shared?: SharedNodeState) {
    const escape = init.escape ?? true;
    super({ ...init, kind: escape ? TagMarker.VARIABLE : TagMarker.UNESCAPED }, shared);
    this.escape = escape;
  }

  override execute(writer: Writer, scopes: ScopeStack): Writer {
    const value = this.get(scopes);
    if (!isAbsent(value)) {
      const text = stringifyValue(value);
      writeText(writer, this.escape ? escapeHtml(text) : text, this.label());
    }
    return this.appendText(writer);
  }

  override duplicate(): ValueNode {
    const { kind: _kind, container: _container, ...init } = this.nodeInit();
    return new ValueNode({ ...init, escape: this.escape }, this.sharedState());
  }
}

/** `String(value)`, except for objects that cannot be converted to a primitive. */
export function stringifyValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null && !("toString" in value) && !(Symbol.toPrimitive in value)) {
    return Object.prototype.toString.call(value);
  }
  return String(value);
}

/**
 * Escape HTML special characters.
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#x27;");
}
