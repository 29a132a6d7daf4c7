import { emitDiagnostic } from "../../diagnostics/index.js";
import type { ArrayIndex, FieldAccess } from "../../syntax-objects/expressions.js";
import type { PhaseContext } from "../phase-context.js";
import type { Type } from "../types.js";
import { checkExpr } from "./check-expr.js";

export const checkFieldAccess = (
  access: FieldAccess,
  ctx: PhaseContext
): Type => {
  const receiverType = checkExpr(access.receiver, ctx);
  if (receiverType.isPrimitiveType()) {
    emitDiagnostic({
      ctx,
      code: "TY0006",
      params: { kind: "invalid-receiver", type: receiverType.name },
      phase: ctx.phase,
      position: access.position,
    });
    return ctx.globalEnv.primitive("int");
  }

  return receiverType.lookupField(
    ctx.phase,
    access.position,
    access.field.raw,
    ctx.globalEnv
  );
};

export const checkArrayIndex = (index: ArrayIndex, ctx: PhaseContext): Type => {
  const receiverType = checkExpr(index.receiver, ctx);
  const indexType = checkExpr(index.index, ctx);

  if (!receiverType.isArrayType()) {
    emitDiagnostic({
      ctx,
      code: "TY0006",
      params: { kind: "non-array-index", type: receiverType.name },
      phase: ctx.phase,
      position: index.position,
    });
    return ctx.globalEnv.primitive("int");
  }

  if (!indexType.is("int")) {
    emitDiagnostic({
      ctx,
      code: "TY0006",
      params: { kind: "non-int-index", type: indexType.name },
      phase: ctx.phase,
      position: index.position,
    });
    return ctx.globalEnv.primitive("int");
  }

  return receiverType.elemType;
};
