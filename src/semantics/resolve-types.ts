import { emitDiagnostic } from "../diagnostics/index.js";
import type { FunctionDecl } from "../syntax-objects/declarations.js";
import type { Node } from "../syntax-objects/node.js";
import type { PhaseContext } from "./phase-context.js";
import { visitChildren } from "./walk.js";

/** Phase 2: binds every type name to the type it refers to */
export const resolveTypes = (node: Node, ctx: PhaseContext): void => {
  switch (node.syntaxType) {
    case "type-name": {
      const type = ctx.globalEnv.lookupType(
        ctx.phase,
        node.position,
        node.name.raw
      );
      if (type.is("void") && !ctx.isReturnPosition) {
        emitDiagnostic({
          ctx,
          code: "TY0001",
          params: { kind: "void-outside-return" },
          phase: ctx.phase,
          position: node.position,
        });
      }
      node.type = type;
      return;
    }
    case "array-type-name":
      resolveTypes(node.elemTypeExpr, ctx.with({ isReturnPosition: false }));
      node.type = node.elemTypeExpr.resolvedType.arrayType;
      return;
    case "function-decl":
      resolveFunctionDecl(node, ctx);
      return;
    case "new-object": {
      const type = ctx.globalEnv.lookupType(
        ctx.phase,
        node.position,
        node.name.raw
      );
      if (type.isPrimitiveType()) {
        emitDiagnostic({
          ctx,
          code: "TY0001",
          params: { kind: "primitive-allocation" },
          phase: ctx.phase,
          position: node.position,
        });
      }
      node.type = type;
      node.args.forEach((arg) => resolveTypes(arg, ctx));
      return;
    }
    case "new-array":
      resolveTypes(node.elemTypeExpr, ctx);
      node.type = node.elemTypeExpr.resolvedType.arrayType;
      node.args.forEach((arg) => resolveTypes(arg, ctx));
      return;
    default:
      visitChildren(node, ctx, resolveTypes);
  }
};

const resolveFunctionDecl = (node: FunctionDecl, ctx: PhaseContext) => {
  resolveTypes(node.returnTypeExpr, ctx.with({ isReturnPosition: true }));

  const inner = ctx.with({ isReturnPosition: false });
  node.params.forEach((param) => resolveTypes(param, inner));
  node.vars.forEach((local) => resolveTypes(local, inner));

  // A redefinition shares the first declaration's function object
  const fn = node.fn;
  if (fn?.isUserFunction() && fn.decl === node) {
    fn.returnType = node.returnTypeExpr.resolvedType;
    fn.resetParamTypes();
    fn.addParamTypes(node.params.map((param) => param.typeExpr.resolvedType));
  }

  resolveTypes(node.body, inner);
};
