import type { ExpressionNode, LeafNode } from "./types";
import { OPERATOR_SYMBOL } from "./types";

/**
 * Human readable trace of a rolled tree, e.g. `4(d6) + !*6*!(d6) + 3`.
 * A die showing its highest face is wrapped in `!*...*!`.
 */
export function toDisplayString(node: ExpressionNode): string {
  if (node.type === "operation") {
    return `${toDisplayString(node.left)} ${OPERATOR_SYMBOL[node.op]} ${toDisplayString(node.right)}`;
  }
  return renderLeaf(node);
}

function renderLeaf(leaf: LeafNode): string {
  if (!leaf.isDie || leaf.faces === undefined) return `${leaf.value}`;

  const sign = leaf.value < 0 ? "-" : "";
  const roll = Math.abs(leaf.value);
  if (roll === leaf.faces) return `${sign}!*${roll}*!(d${leaf.faces})`;
  return `${sign}${roll}(d${leaf.faces})`;
}

/** Structural dump for debugging: `Op<Leaf<4,d6> + Leaf<3>>`. */
export function toDebugString(node: ExpressionNode): string {
  if (node.type === "operation") {
    return `Op<${toDebugString(node.left)} ${OPERATOR_SYMBOL[node.op]} ${toDebugString(node.right)}>`;
  }
  if (node.isDie) return `Leaf<${node.value},d${node.faces}>`;
  return `Leaf<${node.value}>`;
}
