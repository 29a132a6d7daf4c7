import { isExpression, type Node } from "../../syntax-objects/node.js";
import type { PhaseContext } from "../phase-context.js";
import { visitChildren } from "../walk.js";
import { checkTest } from "./check-cond.js";
import { checkExpr } from "./check-expr.js";
import { checkReturn } from "./check-return.js";

/** Phase 6: types every expression and checks it against its context */
export const checkTypes = (node: Node, ctx: PhaseContext): void => {
  if (isExpression(node)) {
    checkExpr(node, ctx);
    return;
  }

  switch (node.syntaxType) {
    case "struct-decl":
      return;
    case "function-decl":
      checkTypes(
        node.body,
        ctx.with({
          localEnv: node.resolvedLocalEnv,
          returnType: node.returnTypeExpr.resolvedType,
        })
      );
      return;
    case "if":
      checkTest(node.test, "if", node.position, ctx);
      checkTypes(node.thenBlock, ctx);
      checkTypes(node.elseBlock, ctx);
      return;
    case "while":
      checkTest(node.test, "while", node.position, ctx);
      checkTypes(node.body, ctx);
      return;
    case "for":
      if (node.init) checkExpr(node.init, ctx);
      if (node.test) checkTest(node.test, "for", node.position, ctx);
      if (node.update) checkExpr(node.update, ctx);
      checkTypes(node.body, ctx);
      return;
    case "return":
      checkReturn(node, ctx);
      return;
    default:
      visitChildren(node, ctx, checkTypes);
  }
};
