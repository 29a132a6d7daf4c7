import { compileBlock } from "./compile-block.js";
import type { FunctionDecl } from "../syntax-objects/declarations.js";
import type { PhaseContext } from "../semantics/phase-context.js";

/** Return type on its own line, then the name and parameter list one level in */
const genSignature = (decl: FunctionDecl, ctx: PhaseContext) => {
  const params = decl.params
    .map(
      (param) =>
        `${param.typeExpr.resolvedType.mangle()} UC_VAR(${param.name.raw})`
    )
    .join(",");
  ctx.printIndented(decl.returnTypeExpr.resolvedType.mangle(), "\n");
  ctx.indented().printIndented(`${decl.resolvedFn.mangle()}(${params})`);
};

export const genFunctionDecl = (decl: FunctionDecl, ctx: PhaseContext) => {
  genSignature(decl, ctx);
  ctx.print(";\n");
};

export const genFunctionDef = (decl: FunctionDecl, ctx: PhaseContext) => {
  genSignature(decl, ctx);
  ctx.print(" {\n");

  const body = ctx.indented(4);
  decl.vars.forEach((local) =>
    body.printIndented(
      `${local.typeExpr.resolvedType.mangle()} UC_VAR(${local.name.raw});\n`
    )
  );
  compileBlock(decl.body, body);

  ctx.printIndented("}\n");
};
