import type { Node } from "../syntax-objects/node.js";
import type { PhaseContext } from "./phase-context.js";

export type PhaseVisitor = (node: Node, ctx: PhaseContext) => void;

/** Default phase behavior: visit every child under the same context */
export const visitChildren = (
  node: Node,
  ctx: PhaseContext,
  visit: PhaseVisitor
): void => {
  node.children.forEach((child) => visit(child, ctx));
};
