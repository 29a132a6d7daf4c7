import { compileExpression } from "../codegen.js";
import type { BinaryOp, PrefixOp } from "../syntax-objects/expressions.js";

export const compilePrefix = (prefix: PrefixOp): string => {
  const operand = compileExpression(prefix.operand);
  return prefix.op === "#" ? `uc_id(${operand})` : `${prefix.op}(${operand})`;
};

/** Runtime helpers for operators the host language lacks */
const runtimeCalls: Partial<Record<BinaryOp["op"], string>> = {
  "+": "uc_add",
  "<<": "uc_array_push",
  ">>": "uc_array_pop",
};

export const compileBinary = (binary: BinaryOp): string => {
  const lhs = compileExpression(binary.lhs);
  const rhs = compileExpression(binary.rhs);
  const helper = runtimeCalls[binary.op];
  if (helper) return `${helper}(${lhs}, ${rhs})`;
  if (binary.op === "=") return `${lhs} = ${rhs}`;
  return `(${lhs}) ${binary.op} (${rhs})`;
};
