import type { Node } from "../syntax-objects/node.js";
import type { PhaseContext } from "./phase-context.js";
import { visitChildren } from "./walk.js";

/**
 * Runs between control-flow validation and type checking and reports
 * nothing yet.
 * TODO: report non-void functions that can fall off their end without a return
 */
export const advancedControl = (node: Node, ctx: PhaseContext): void => {
  visitChildren(node, ctx, advancedControl);
};
