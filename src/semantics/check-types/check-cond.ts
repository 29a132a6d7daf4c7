import { emitDiagnostic, type Position } from "../../diagnostics/index.js";
import type { Expression } from "../../syntax-objects/expressions.js";
import type { PhaseContext } from "../phase-context.js";
import { checkExpr } from "./check-expr.js";

/** Loop and branch tests must be boolean */
export const checkTest = (
  test: Expression,
  statement: "if" | "while" | "for",
  position: Position,
  ctx: PhaseContext
): void => {
  const type = checkExpr(test, ctx);
  if (type.is("boolean")) return;
  emitDiagnostic({
    ctx,
    code: "TY0008",
    params: { kind: "non-boolean-test", statement, type: type.name },
    phase: ctx.phase,
    position,
  });
};
