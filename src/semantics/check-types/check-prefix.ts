import { emitDiagnostic, type DiagnosticParams } from "../../diagnostics/index.js";
import { exhaustive } from "../../lib/helpers.js";
import type { PrefixOp } from "../../syntax-objects/expressions.js";
import type { PhaseContext } from "../phase-context.js";
import { isNumericType, isReferenceType } from "../type-relations.js";
import type { Type } from "../types.js";
import { checkExpr } from "./check-expr.js";
import { isLvalue } from "./lvalue.js";

export const checkPrefix = (prefix: PrefixOp, ctx: PhaseContext): Type => {
  const operandType = checkExpr(prefix.operand, ctx);
  const report = (params: DiagnosticParams<"TY0004">) =>
    emitDiagnostic({
      ctx,
      code: "TY0004",
      params,
      phase: ctx.phase,
      position: prefix.position,
    });

  switch (prefix.op) {
    case "+":
    case "-":
      if (!isNumericType(operandType)) {
        report({ kind: "numeric-operand", type: operandType.name });
      }
      return operandType;
    case "!":
      if (!operandType.is("boolean")) {
        report({ kind: "boolean-operand", type: operandType.name });
      }
      return ctx.globalEnv.primitive("boolean");
    case "++":
    case "--":
      if (!isLvalue(prefix.operand) || !isNumericType(operandType)) {
        report({ kind: "numeric-lvalue" });
      }
      return operandType;
    case "#":
      if (!isReferenceType(operandType)) {
        report({ kind: "reference-operand", type: operandType.name });
      }
      return ctx.globalEnv.primitive("long");
  }
  return exhaustive(prefix.op);
};
