import type { Node } from "../syntax-objects/node.js";
import type { PhaseContext } from "./phase-context.js";
import { visitChildren } from "./walk.js";

/** Phase 1: registers every struct and function with the global environment */
export const findDecls = (node: Node, ctx: PhaseContext): void => {
  switch (node.syntaxType) {
    case "struct-decl":
      node.type = ctx.globalEnv.addType(
        ctx.phase,
        node.position,
        node.name.raw,
        node
      );
      return;
    case "function-decl":
      node.fn = ctx.globalEnv.addFunction(
        ctx.phase,
        node.position,
        node.name.raw,
        node
      );
      return;
    default:
      visitChildren(node, ctx, findDecls);
  }
};
