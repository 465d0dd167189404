export type { Node, NodeContainer } from "./node.js";
export { NodeTree } from "./tree.js";
export {
  DefaultNode,
  SELF_REFERENCE,
  TagMarker,
  type NodeInit,
  type SharedNodeState,
} from "./default-node.js";
export { ValueNode, escapeHtml, stringifyValue, type ValueNodeInit } from "./value-node.js";
export { SectionNode, type SectionNodeInit } from "./section-node.js";
export { walkNodes, countNodes } from "./walk.js";
