import type { Node } from "./node.js";

/** Pre-order, depth-first traversal; the root is visited at depth 0. */
export function walkNodes(root: Node, visit: (node: Node, depth: number) => void): void {
  const step = (node: Node, depth: number): void => {
    visit(node, depth);
    const children = node.getChildren();
    if (children === null) return;
    for (const child of children) step(child, depth + 1);
  };
  step(root, 0);
}

export function countNodes(root: Node): number {
  let count = 0;
  walkNodes(root, () => {
    count++;
  });
  return count;
}
