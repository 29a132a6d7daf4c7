import {
  formatDiagnostic,
  type DiagnosticEmitter,
} from "../../diagnostics/index.js";
import type { AstBuilder } from "../../syntax-objects/builder.js";
import type { VarDecl } from "../../syntax-objects/declarations.js";
import type { Statement } from "../../syntax-objects/statements.js";

/** struct Point { int x; int y; } declared on lines 1-3 */
export const pointDecl = (b: AstBuilder) =>
  b.struct(1, "Point", [
    b.varDecl(2, b.typeName(2, "int"), "x"),
    b.varDecl(3, b.typeName(3, "int"), "y"),
  ]);

/** A local or field `<type> <name>;`. Array types are written `int[]`. */
export const local = (
  b: AstBuilder,
  type: string,
  name: string,
  position = 1
): VarDecl => {
  const elem = type.replace(/\[\]$/, "");
  const typeExpr =
    elem === type
      ? b.typeName(position, type)
      : b.arrayType(position, b.typeName(position, elem));
  return b.varDecl(position, typeExpr, name);
};

/** void main(string[] args) on line 1 */
export const mainDecl = (
  b: AstBuilder,
  opts: { vars?: VarDecl[]; body?: Statement[] } = {}
) =>
  b.fn(1, {
    returnTypeExpr: b.typeName(1, "void"),
    name: "main",
    params: [b.param(1, b.arrayType(1, b.typeName(1, "string")), "args")],
    vars: opts.vars ?? [],
    body: b.block(1, opts.body ?? []),
  });

export const messages = (diagnostics: DiagnosticEmitter): string[] =>
  diagnostics.diagnostics.map(formatDiagnostic);
