import type { Expression } from "../../syntax-objects/expressions.js";

/**
 * Whether `expr` designates a storage location. Reads the receiver type
 * of field accesses, so the operand must be type checked first.
 */
export const isLvalue = (expr: Expression): boolean => {
  switch (expr.syntaxType) {
    case "name-expr":
    case "array-index":
      return true;
    case "field-access":
      // An array's only field is its read-only length
      return !expr.receiver.resolvedType.isArrayType();
    default:
      return false;
  }
};
