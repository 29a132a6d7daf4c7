import { compileExpression } from "../codegen.js";
import { exhaustive } from "../lib/helpers.js";
import type { PhaseContext } from "../semantics/phase-context.js";
import type { Block, Statement } from "../syntax-objects/statements.js";

/** One statement per line at the context's indentation */
export const compileBlock = (block: Block, ctx: PhaseContext): void => {
  block.statements.forEach((stmt) => {
    ctx.printIndented();
    compileStatement(stmt, ctx);
  });
};

/** Prints `stmt` starting at the current column; nested lines are indented */
export const compileStatement = (stmt: Statement, ctx: PhaseContext): void => {
  switch (stmt.syntaxType) {
    case "expression-statement":
      ctx.print(compileExpression(stmt.expr), ";\n");
      return;
    case "if":
      ctx.print("if (", compileExpression(stmt.test), ") {\n");
      compileBlock(stmt.thenBlock, ctx.indented());
      ctx.printIndented("} else {\n");
      compileBlock(stmt.elseBlock, ctx.indented());
      ctx.printIndented("}\n");
      return;
    case "while":
      ctx.print("while (", compileExpression(stmt.test), ") {\n");
      compileBlock(stmt.body, ctx.indented());
      ctx.printIndented("}\n");
      return;
    case "for": {
      const clause = stmt.init ? compileExpression(stmt.init) : "";
      const test = stmt.test ? compileExpression(stmt.test) : "";
      const update = stmt.update ? compileExpression(stmt.update) : "";
      ctx.print(`for (${clause}; ${test}; ${update}) {\n`);
      compileBlock(stmt.body, ctx.indented());
      ctx.printIndented("}\n");
      return;
    }
    case "break":
      ctx.print("break;\n");
      return;
    case "continue":
      ctx.print("continue;\n");
      return;
    case "return":
      ctx.print("return ", stmt.expr ? compileExpression(stmt.expr) : "", ";\n");
      return;
  }
  return exhaustive(stmt);
};
