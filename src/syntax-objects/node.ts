import type {
  ArrayTypeName,
  Decl,
  Name,
  Parameter,
  Program,
  TypeName,
  VarDecl,
} from "./declarations.js";
import type { Expression } from "./expressions.js";
import type { Block, Statement } from "./statements.js";

export type Node =
  | Program
  | Decl
  | Name
  | TypeName
  | ArrayTypeName
  | VarDecl
  | Parameter
  | Block
  | Statement
  | Expression;

export type SyntaxType = Node["syntaxType"];

const expressionTypes: ReadonlySet<SyntaxType> = new Set<SyntaxType>([
  "int-literal",
  "float-literal",
  "string-literal",
  "boolean-literal",
  "null-literal",
  "name-expr",
  "call",
  "new-object",
  "new-array",
  "field-access",
  "array-index",
  "prefix",
  "binary",
]);

export const isExpression = (node: Node): node is Expression =>
  expressionTypes.has(node.syntaxType);

/** Visits `node` and every descendant in pre-order */
export const forEachNode = (node: Node, visit: (node: Node) => void): void => {
  visit(node);
  node.children.forEach((child) => forEachNode(child, visit));
};
