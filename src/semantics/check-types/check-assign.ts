import { emitDiagnostic, type DiagnosticParams } from "../../diagnostics/index.js";
import { isCompatible } from "../type-relations.js";
import type { Type } from "../types.js";
import { int, type Operands } from "./check-binary.js";
import { isLvalue } from "./lvalue.js";

const report = (
  { node, ctx }: Operands,
  params: DiagnosticParams<"TY0007">
) =>
  emitDiagnostic({
    ctx,
    code: "TY0007",
    params,
    phase: ctx.phase,
    position: node.position,
  });

/** Incompatibility and a non-lvalue target are independent; both may be reported */
export const checkAssign = (operands: Operands): Type => {
  const { node, lhs, rhs } = operands;
  if (!isCompatible(rhs, lhs)) report(operands, { kind: "assign-incompatible" });
  if (!isLvalue(node.lhs)) report(operands, { kind: "assign-not-lvalue" });
  return lhs;
};

/** `a << v` appends `v` to array `a` */
export const checkPush = (operands: Operands): Type => {
  const { lhs, rhs } = operands;
  if (!lhs.isArrayType()) {
    report(operands, { kind: "not-array", op: "<<" });
    return int(operands);
  }
  if (!isCompatible(rhs, lhs.elemType)) {
    report(operands, { kind: "push-incompatible" });
  }
  return lhs;
};

/** `a >> v` removes the last element of `a` into `v`, or discards it when `v` is null */
export const checkPop = (operands: Operands): Type => {
  const { node, lhs, rhs } = operands;
  if (!lhs.isArrayType()) {
    report(operands, { kind: "not-array", op: ">>" });
    return int(operands);
  }

  const rhsIsLvalue = isLvalue(node.rhs);
  if (!rhsIsLvalue && !rhs.is("null")) {
    report(operands, { kind: "pop-target" });
  } else if (rhsIsLvalue && !isCompatible(lhs.elemType, rhs)) {
    report(operands, { kind: "pop-incompatible" });
  }
  return lhs;
};
