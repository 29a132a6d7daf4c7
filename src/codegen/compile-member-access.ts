import { compileExpression } from "../codegen.js";
import type { ArrayIndex, FieldAccess } from "../syntax-objects/expressions.js";

/** Objects are held by pointer. `length` is the only field an array has. */
export const compileFieldAccess = (access: FieldAccess): string => {
  const receiver = compileExpression(access.receiver);
  return access.receiver.resolvedType.isArrayType()
    ? `uc_length_field(${receiver})`
    : `${receiver}->UC_VAR(${access.field.raw})`;
};

export const compileArrayIndex = (index: ArrayIndex): string =>
  `uc_array_index(${compileExpression(index.receiver)}, ${compileExpression(
    index.index
  )})`;
