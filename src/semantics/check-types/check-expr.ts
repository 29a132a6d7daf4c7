import type { Expression } from "../../syntax-objects/expressions.js";
import { exhaustive } from "../../lib/helpers.js";
import type { PhaseContext } from "../phase-context.js";
import type { Type } from "../types.js";
import { checkBinary } from "./check-binary.js";
import { checkAllocation, checkCall } from "./check-call.js";
import { checkArrayIndex, checkFieldAccess } from "./check-member-access.js";
import { checkPrefix } from "./check-prefix.js";

/** Computes, records and returns the type of `expr` */
export const checkExpr = (expr: Expression, ctx: PhaseContext): Type => {
  const type = getExprType(expr, ctx);
  expr.type = type;
  return type;
};

const getExprType = (expr: Expression, ctx: PhaseContext): Type => {
  const env = ctx.globalEnv;
  switch (expr.syntaxType) {
    case "int-literal":
      return env.primitive(expr.isLong ? "long" : "int");
    case "float-literal":
      return env.primitive("float");
    case "string-literal":
      return env.primitive("string");
    case "boolean-literal":
      return env.primitive("boolean");
    case "null-literal":
      return env.primitive("null");
    case "name-expr":
      return ctx.resolvedLocalEnv.getType(
        ctx.phase,
        expr.position,
        expr.name.raw
      );
    case "call":
      return checkCall(expr, ctx);
    case "new-object":
    case "new-array":
      return checkAllocation(expr, ctx);
    case "field-access":
      return checkFieldAccess(expr, ctx);
    case "array-index":
      return checkArrayIndex(expr, ctx);
    case "prefix":
      return checkPrefix(expr, ctx);
    case "binary":
      return checkBinary(expr, ctx);
  }
  return exhaustive(expr);
};
