import { popPhase, pushPhase } from "./diagnostics/phase-debug.js";
import { exhaustive } from "./lib/helpers.js";
import type { GlobalEnv } from "./semantics/global-env.js";
import { PhaseContext } from "./semantics/phase-context.js";
import type { Decl, Program } from "./syntax-objects/declarations.js";
import type { Expression } from "./syntax-objects/expressions.js";
import { compile as compileLiteral } from "./codegen/compile-literal.js";
import {
  compileCall,
  compileNewArray,
  compileNewObject,
} from "./codegen/compile-call.js";
import {
  compileArrayIndex,
  compileFieldAccess,
} from "./codegen/compile-member-access.js";
import { compileBinary, compilePrefix } from "./codegen/compile-operator.js";
import { genFunctionDecl, genFunctionDef } from "./codegen/compile-function.js";
import { genTypeDecl, genTypeDef } from "./codegen/compile-type.js";
import { genFooter, genHeader } from "./codegen/runtime.js";
import { StringOutput } from "./codegen/output.js";

export type CodegenPass = {
  pass: number;
  heading: string;
  /** Whether a blank line closes the pass */
  spaced: boolean;
  genDecl: (decl: Decl, ctx: PhaseContext) => void;
};

/** Forward declarations first, so definitions may refer to anything */
export const codegenPasses: readonly CodegenPass[] = [
  {
    pass: 1,
    heading: "Forward type declarations",
    spaced: true,
    genDecl: (decl, ctx) => {
      if (decl.syntaxType === "struct-decl") genTypeDecl(decl, ctx);
    },
  },
  {
    pass: 2,
    heading: "Forward function declarations",
    spaced: true,
    genDecl: (decl, ctx) => {
      if (decl.syntaxType === "function-decl") genFunctionDecl(decl, ctx);
    },
  },
  {
    pass: 3,
    heading: "Full type definitions",
    spaced: false,
    genDecl: (decl, ctx) => {
      if (decl.syntaxType === "struct-decl") genTypeDef(decl, ctx);
    },
  },
  {
    pass: 4,
    heading: "Full function definitions",
    spaced: false,
    genDecl: (decl, ctx) => {
      if (decl.syntaxType === "function-decl") genFunctionDef(decl, ctx);
    },
  },
];

export type GenerateCodeOptions = {
  /** Emit only passes numbered up to this one */
  lastPass?: number;
};

/**
 * Lowers a checked program to host source text. The program must have
 * passed every analysis phase without diagnostics.
 */
export const generateCode = (
  program: Program,
  globalEnv: GlobalEnv,
  options: GenerateCodeOptions = {}
): string => {
  const out = new StringOutput();
  const lastPass = options.lastPass ?? 4;

  genHeader(new PhaseContext({ phase: 0, globalEnv, out }));

  codegenPasses
    .filter(({ pass }) => pass <= lastPass)
    .forEach(({ pass, heading, spaced, genDecl }) => {
      pushPhase(`codegen ${pass} ${heading}`);
      const ctx = new PhaseContext({ phase: pass, globalEnv, out, indent: 2 });
      ctx.printIndented(`// ${heading}\n`, "\n");
      program.decls.forEach((decl) => genDecl(decl, ctx));
      if (spaced) ctx.print("\n");
      popPhase(`codegen ${pass} ${heading}`, 0);
    });

  genFooter(new PhaseContext({ phase: 0, globalEnv, out }));
  return out.toString();
};

export const compileExpression = (expr: Expression): string => {
  switch (expr.syntaxType) {
    case "int-literal":
    case "float-literal":
    case "string-literal":
    case "boolean-literal":
    case "null-literal":
      return compileLiteral(expr);
    case "name-expr":
      return `UC_VAR(${expr.name.raw})`;
    case "call":
      return compileCall(expr);
    case "new-object":
      return compileNewObject(expr);
    case "new-array":
      return compileNewArray(expr);
    case "field-access":
      return compileFieldAccess(expr);
    case "array-index":
      return compileArrayIndex(expr);
    case "prefix":
      return compilePrefix(expr);
    case "binary":
      return compileBinary(expr);
  }
  return exhaustive(expr);
};
