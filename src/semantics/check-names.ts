import type { Parameter, VarDecl } from "../syntax-objects/declarations.js";
import type { Node } from "../syntax-objects/node.js";
import type { Position } from "../diagnostics/index.js";
import type { PhaseContext } from "./phase-context.js";
import { VarEnv, type VariableKind } from "./var-env.js";
import { visitChildren } from "./walk.js";

/** Phase 4: builds the scope of each declaration, rejecting duplicate names */
export const checkNames = (node: Node, ctx: PhaseContext): void => {
  switch (node.syntaxType) {
    case "struct-decl": {
      const env = node.localEnv ?? new VarEnv(ctx.globalEnv);
      bindAll(env, node.fields, "field", node.position, ctx);
      node.localEnv = env;
      visitChildren(node, ctx.with({ localEnv: env }), checkNames);
      return;
    }
    case "function-decl": {
      const env = node.localEnv ?? new VarEnv(ctx.globalEnv);
      bindAll(env, node.params, "parameter", node.position, ctx);
      bindAll(env, node.vars, "variable", node.position, ctx);
      node.localEnv = env;
      visitChildren(node, ctx.with({ localEnv: env }), checkNames);
      return;
    }
    default:
      visitChildren(node, ctx, checkNames);
  }
};

const bindAll = (
  env: VarEnv,
  decls: readonly (VarDecl | Parameter)[],
  kind: VariableKind,
  position: Position,
  ctx: PhaseContext
) => {
  decls.forEach((decl) =>
    env.addVariable(
      ctx.phase,
      position,
      decl.name.raw,
      decl.typeExpr.resolvedType,
      kind,
      decl
    )
  );
};
