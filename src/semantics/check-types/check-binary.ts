import { emitDiagnostic, type DiagnosticParams } from "../../diagnostics/index.js";
import { exhaustive } from "../../lib/helpers.js";
import type { BinaryOp } from "../../syntax-objects/expressions.js";
import type { PhaseContext } from "../phase-context.js";
import {
  isCompatible,
  isIntegralType,
  isNumericType,
  joinTypes,
} from "../type-relations.js";
import type { Type } from "../types.js";
import { checkAssign, checkPop, checkPush } from "./check-assign.js";
import { checkExpr } from "./check-expr.js";

export type Operands = {
  node: BinaryOp;
  lhs: Type;
  rhs: Type;
  ctx: PhaseContext;
};

export const checkBinary = (binary: BinaryOp, ctx: PhaseContext): Type => {
  const operands: Operands = {
    node: binary,
    lhs: checkExpr(binary.lhs, ctx),
    rhs: checkExpr(binary.rhs, ctx),
    ctx,
  };

  switch (binary.op) {
    case "+":
      return checkPlus(operands);
    case "-":
    case "*":
    case "/":
      return checkArithmetic(operands);
    case "%":
      return checkModulo(operands);
    case "||":
    case "&&":
      return checkLogical(operands);
    case "<":
    case "<=":
    case ">":
    case ">=":
      return checkRelational(operands);
    case "==":
    case "!=":
      return checkEquality(operands);
    case "=":
      return checkAssign(operands);
    case "<<":
      return checkPush(operands);
    case ">>":
      return checkPop(operands);
  }
  return exhaustive(binary.op);
};

const report = (
  { node, ctx }: Operands,
  params: DiagnosticParams<"TY0005">
) =>
  emitDiagnostic({
    ctx,
    code: "TY0005",
    params,
    phase: ctx.phase,
    position: node.position,
  });

const join = ({ node, lhs, rhs, ctx }: Operands) =>
  joinTypes(ctx.phase, node.position, lhs, rhs, ctx.globalEnv);

export const int = ({ ctx }: Operands) => ctx.globalEnv.primitive("int");

const boolean = ({ ctx }: Operands) => ctx.globalEnv.primitive("boolean");

const checkArithmetic = (operands: Operands): Type => {
  if (isNumericType(operands.lhs) && isNumericType(operands.rhs)) {
    return join(operands);
  }
  report(operands, { kind: "numeric-operands" });
  return int(operands);
};

/** Concatenates when either side is a string, otherwise adds */
const checkPlus = (operands: Operands): Type => {
  const { lhs, rhs } = operands;
  if (!lhs.isPrimitiveType() || !rhs.isPrimitiveType()) {
    report(operands, { kind: "primitive-operands" });
    return int(operands);
  }

  if (lhs.is("void") || lhs.is("null")) {
    report(operands, { kind: "void-or-null-operand", side: "lhs" });
    return int(operands);
  }

  if (rhs.is("void") || rhs.is("null")) {
    report(operands, { kind: "void-or-null-operand", side: "rhs" });
    return int(operands);
  }

  if (lhs.is("boolean") && !rhs.is("string")) {
    report(operands, { kind: "boolean-needs-string", side: "lhs" });
    return int(operands);
  }

  if (rhs.is("boolean") && !lhs.is("string")) {
    report(operands, { kind: "boolean-needs-string", side: "rhs" });
    return int(operands);
  }

  if (lhs.is("string") || rhs.is("string")) {
    return operands.ctx.globalEnv.primitive("string");
  }

  return checkArithmetic(operands);
};

const checkModulo = (operands: Operands): Type => {
  if (isIntegralType(operands.lhs) && isIntegralType(operands.rhs)) {
    return join(operands);
  }
  report(operands, { kind: "integral-operands" });
  return int(operands);
};

const checkLogical = (operands: Operands): Type => {
  if (!operands.lhs.is("boolean") || !operands.rhs.is("boolean")) {
    report(operands, { kind: "boolean-operands" });
  }
  return boolean(operands);
};

const checkRelational = (operands: Operands): Type => {
  const { lhs, rhs } = operands;
  const numeric = isNumericType(lhs) && isNumericType(rhs);
  const strings = lhs.is("string") && rhs.is("string");
  if (!numeric && !strings) {
    report(operands, { kind: "comparable-operands" });
  }
  return boolean(operands);
};

const checkEquality = (operands: Operands): Type => {
  const { lhs, rhs } = operands;
  if (!isCompatible(lhs, rhs) && !isCompatible(rhs, lhs)) {
    report(operands, { kind: "equality-operands" });
  }
  return boolean(operands);
};
