import type { Node } from "../syntax-objects/node.js";
import type { PhaseContext } from "./phase-context.js";
import { visitChildren } from "./walk.js";

/** Phase 3: binds every call to the function it names */
export const resolveCalls = (node: Node, ctx: PhaseContext): void => {
  if (node.syntaxType === "call") {
    node.fn = ctx.globalEnv.lookupFunction(
      ctx.phase,
      node.position,
      node.name.raw
    );
  }
  visitChildren(node, ctx, resolveCalls);
};
