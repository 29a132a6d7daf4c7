import type { Type } from "../semantics/types.js";
import { isExpression, type Node } from "../syntax-objects/node.js";

/**
 * The node's type attribute holder, for kinds that carry one. The
 * attribute itself may still be unresolved.
 */
export const typeHolder = (node: Node): { type?: Type } | undefined => {
  if (isExpression(node)) return node;
  switch (node.syntaxType) {
    case "type-name":
    case "array-type-name":
    case "struct-decl":
      return node;
    default:
      return undefined;
  }
};
