import { compileExpression } from "../codegen.js";
import type {
  Call,
  Expression,
  NewArray,
  NewObject,
} from "../syntax-objects/expressions.js";

export const compileArgs = (args: readonly Expression[]): string =>
  args.map(compileExpression).join(", ");

export const compileCall = (call: Call): string =>
  `${call.resolvedFn.mangle()}(${compileArgs(call.args)})`;

export const compileNewObject = (alloc: NewObject): string =>
  `uc_make_object<${alloc.resolvedType.mangle()}>(${compileArgs(alloc.args)})`;

export const compileNewArray = (alloc: NewArray): string =>
  `uc_make_array_of<${alloc.elemTypeExpr.resolvedType.mangle()}>(${compileArgs(
    alloc.args
  )})`;
