import type { Call, NewArray, NewObject } from "../../syntax-objects/expressions.js";
import type { PhaseContext } from "../phase-context.js";
import type { Type } from "../types.js";
import { checkExpr } from "./check-expr.js";

export const checkCall = (call: Call, ctx: PhaseContext): Type => {
  call.args.forEach((arg) => checkExpr(arg, ctx));
  const fn = call.resolvedFn;
  fn.checkArgs(ctx.phase, call.position, call.args, ctx.globalEnv);
  return fn.resolvedReturnType;
};

/** The allocated type was fixed by type resolution; only its arguments are checked here */
export const checkAllocation = (
  alloc: NewObject | NewArray,
  ctx: PhaseContext
): Type => {
  alloc.args.forEach((arg) => checkExpr(arg, ctx));
  const type = alloc.resolvedType;
  type.checkArgs(ctx.phase, alloc.position, alloc.args, ctx.globalEnv);
  return type;
};
