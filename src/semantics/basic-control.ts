import { emitDiagnostic } from "../diagnostics/index.js";
import type { Node } from "../syntax-objects/node.js";
import type { PhaseContext } from "./phase-context.js";
import { visitChildren } from "./walk.js";

/** Phase 5: break and continue must sit inside a loop body */
export const basicControl = (node: Node, ctx: PhaseContext): void => {
  switch (node.syntaxType) {
    case "while":
    case "for":
      visitChildren(node, ctx.with({ inLoop: true }), basicControl);
      return;
    case "function-decl":
      visitChildren(node, ctx.with({ inLoop: false }), basicControl);
      return;
    case "break":
    case "continue":
      if (!ctx.inLoop) {
        emitDiagnostic({
          ctx,
          code: "CF0001",
          params: { kind: node.syntaxType },
          phase: ctx.phase,
          position: node.position,
        });
      }
      return;
    default:
      visitChildren(node, ctx, basicControl);
  }
};
