import { emitDiagnostic, type DiagnosticParams } from "../../diagnostics/index.js";
import type { ReturnStmt } from "../../syntax-objects/statements.js";
import type { PhaseContext } from "../phase-context.js";
import { checkExpr } from "./check-expr.js";

/** The returned type must match the declared one exactly, not just convert to it */
export const checkReturn = (stmt: ReturnStmt, ctx: PhaseContext): void => {
  const expected = ctx.resolvedReturnType;
  const actual = stmt.expr ? checkExpr(stmt.expr, ctx) : undefined;
  const report = (params: DiagnosticParams<"TY0008">) =>
    emitDiagnostic({
      ctx,
      code: "TY0008",
      params,
      phase: ctx.phase,
      position: stmt.position,
    });

  if (expected.is("void")) {
    if (actual) report({ kind: "void-return-value" });
    return;
  }

  if (!actual) {
    report({ kind: "missing-return-value", expected: expected.name });
    return;
  }

  if (actual !== expected) {
    report({
      kind: "return-mismatch",
      expected: expected.name,
      actual: actual.name,
    });
  }
};
